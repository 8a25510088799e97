import process from 'node:process'
import pino, {type DestinationStream, type Logger} from 'pino'
import type {RunContainerResult} from '../engine/types.js'
import type {StageId} from '../types.js'

/** Reference to a stage for display and keying purposes. */
export type StageRef = {
  id: StageId;
  displayName: string;
}

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. BUILD_START
 * 2. For each stage, in order (builder, runner):
 *    a. STAGE_STARTING
 *    b. STAGE_FINISHED
 *       OR STAGE_FAILED - the build stops
 *       OR STAGE_SKIPPED - fingerprint unchanged
 *       OR STAGE_WOULD_RUN - dry run
 * 3. BUILD_FINISHED OR BUILD_FAILED
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  workspaceId: string;
  projectName: string;
  version: string;
}

export type StageStartingEvent = {
  event: 'STAGE_STARTING';
  workspaceId: string;
  stage: StageRef;
}

export type StageSkippedEvent = {
  event: 'STAGE_SKIPPED';
  workspaceId: string;
  stage: StageRef;
  runId: string;
}

export type StageRetryingEvent = {
  event: 'STAGE_RETRYING';
  workspaceId: string;
  stage: StageRef;
  attempt: number;
  maxRetries: number;
}

export type StageFinishedEvent = {
  event: 'STAGE_FINISHED';
  workspaceId: string;
  stage: StageRef;
  runId: string;
  durationMs?: number;
  artifactSize?: number;
  imageId?: string;
}

export type StageFailedEvent = {
  event: 'STAGE_FAILED';
  workspaceId: string;
  stage: StageRef;
  exitCode?: number;
  error: string;
}

export type StageWouldRunEvent = {
  event: 'STAGE_WOULD_RUN';
  workspaceId: string;
  stage: StageRef;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  workspaceId: string;
  image: string;
  version: string;
  durationMs: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  workspaceId: string;
  error: string;
}

export type BuildEvent =
  | BuildStartEvent
  | StageStartingEvent
  | StageSkippedEvent
  | StageRetryingEvent
  | StageFinishedEvent
  | StageFailedEvent
  | StageWouldRunEvent
  | BuildFinishedEvent
  | BuildFailedEvent

/**
 * Interface for reporting build events.
 */
export type Reporter = {
  /** Reports build and stage state transitions */
  emit(event: BuildEvent): void;
  /** Reports container logs (stdout/stderr) */
  log(workspaceId: string, stage: StageRef, stream: 'stdout' | 'stderr', line: string): void;
  /** Reports container execution result */
  result(workspaceId: string, stage: StageRef, result: RunContainerResult): void;
}

export const stageRefs: Record<StageId, StageRef> = {
  builder: {id: 'builder', displayName: 'Resolve dependencies'},
  runner: {id: 'runner', displayName: 'Package runtime image'}
}

/**
 * Logger shared by the scanner, the notifier and the JSON reporter.
 * Level comes from `LOG_LEVEL`, `info` by default. Writes to stderr so
 * stdout carries command output only.
 */
export function createLogger(name: string, destination: DestinationStream = pino.destination(2)): Logger {
  return pino({name, level: process.env.LOG_LEVEL ?? 'info'}, destination)
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation. The events are the
 * output of `build --json`, so they go to stdout.
 */
export class ConsoleReporter implements Reporter {
  constructor(private readonly logger: Logger = createLogger('scanpack', pino.destination(1))) {}

  emit(event: BuildEvent): void {
    if (event.event === 'STAGE_FAILED' || event.event === 'BUILD_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }

  log(workspaceId: string, stage: StageRef, stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({workspaceId, stageId: stage.id, stream, line})
  }

  result(workspaceId: string, stage: StageRef, result: RunContainerResult): void {
    this.logger.info({workspaceId, stageId: stage.id, result})
  }
}
