import {createWriteStream} from 'node:fs'
import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {setTimeout} from 'node:timers/promises'
import type {OnLogLine, Workspace} from '../engine/index.js'
import {ScanpackError} from '../errors.js'
import type {StageId} from '../types.js'
import type {StateManager} from './state.js'
import {closeStream} from './utils.js'

/**
 * Returns the committed run recorded for a stage when its fingerprint
 * still matches and the run directory still exists.
 */
export async function reusableRun(workspace: Workspace, state: StateManager, stageId: StageId, fingerprint: string): Promise<string | undefined> {
  const cached = state.getStage(stageId)
  if (cached?.fingerprint !== fingerprint) {
    return undefined
  }

  const runs = await workspace.listRuns()
  return runs.includes(cached.runId) ? cached.runId : undefined
}

export type RetryOptions = {
  retries: number;
  delayMs: number;
  onRetry: (attempt: number, maxRetries: number) => void;
}

/**
 * Runs `fn`, retrying on transient scanpack errors.
 */
export async function withRetries<T>(fn: () => Promise<T>, {retries, delayMs, onRetry}: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (error instanceof ScanpackError && error.transient && attempt < retries) {
        onRetry(attempt + 1, retries)
        await setTimeout(delayMs)
        continue
      }

      throw error
    }
  }
}

export type LogSink = {
  onLogLine: OnLogLine;
  close(): Promise<void>;
}

/**
 * Tees container output into `stdout.log` / `stderr.log` of a staging run.
 */
export function createLogSink(stagingPath: string, forward: OnLogLine): LogSink {
  const stdoutLog = createWriteStream(join(stagingPath, 'stdout.log'))
  const stderrLog = createWriteStream(join(stagingPath, 'stderr.log'))

  return {
    onLogLine(log) {
      if (log.stream === 'stdout') {
        stdoutLog.write(log.line + '\n')
      } else {
        stderrLog.write(log.line + '\n')
      }

      forward(log)
    },
    async close() {
      await closeStream(stdoutLog)
      await closeStream(stderrLog)
    }
  }
}

export async function writeMeta(stagingPath: string, meta: Record<string, unknown>): Promise<void> {
  await writeFile(join(stagingPath, 'meta.json'), JSON.stringify(meta, null, 2), 'utf8')
}

/**
 * Commits a staging run and records it as the stage's current run.
 */
export async function commitStageRun(
  workspace: Workspace,
  state: StateManager,
  stageId: StageId,
  runId: string,
  fingerprint: string,
  imageId?: string
): Promise<void> {
  await workspace.commitRun(runId)
  await workspace.linkRun(stageId, runId)
  state.setStage(stageId, runId, fingerprint, imageId)
  await state.save()
}
