import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {ContainerExecutor, RunContainerRequest, RunContainerResult, Workspace} from '../engine/index.js'
import {ArtifactNotFoundError, LeakageError, ResolutionError} from '../errors.js'
import type {PackagingConfig} from '../types.js'
import {entrypointRelativePath} from './contract.js'
import {bootstrapCommands, resolveCommands, shellQuote} from './dockerfile.js'
import {stageRefs, type Reporter} from './reporter.js'
import {lockDigest, prepareSourceContext, sourceDigest} from './source-context.js'
import {commitStageRun, createLogSink, reusableRun, withRetries, writeMeta} from './stage.js'
import {StateManager} from './state.js'
import {dirSize, pathExists} from './utils.js'

/** Where the builder container copies the finished workdir. */
export const handoffContainerPath = '/output'

const toolPath = 'export PATH=/root/.local/bin:$PATH'

export function builderSetupScript(config: PackagingConfig): string {
  return ['set -e', toolPath, ...bootstrapCommands(config)].join('\n')
}

export function builderRunScript(config: PackagingConfig): string {
  const {workdir} = config
  return [
    'set -e',
    toolPath,
    `cd ${shellQuote(workdir)}`,
    ...resolveCommands(config),
    `cp -a ${shellQuote(`${workdir}/.`)} ${handoffContainerPath}/`
  ].join('\n')
}

/**
 * Fingerprint of the lock specification and of the tooling that resolves it.
 * Stamped on the image as `io.scanpack.lock-fingerprint`.
 */
export function lockFingerprint(config: PackagingConfig, locks: Record<string, string>): string {
  return StateManager.fingerprint({
    baseImage: config.baseImage,
    workdir: config.workdir,
    executable: config.executable,
    plugins: config.builder.plugins,
    systemPackages: config.builder.systemPackages,
    locks
  })
}

export type BuilderPlan = {
  fingerprint: string;
  lockFingerprint: string;
  /** Committed run reusable as is. */
  cachedRunId?: string;
}

export type BuilderStageOptions = {
  workspace: Workspace;
  state: StateManager;
  config: PackagingConfig;
  projectDir: string;
  version: string;
  /** Extra ignore patterns for the source context (e.g. the workdir root). */
  ignores?: string[];
}

/**
 * Resolves the locked dependency closure into `<workdir>/.venv` inside a
 * disposable container and commits the whole workdir, minus `.git`, as the
 * hand-off artifact.
 */
export class BuilderStage {
  constructor(
    private readonly executor: ContainerExecutor,
    private readonly reporter: Reporter
  ) {}

  async plan({workspace, state, config, projectDir, version, ignores}: BuilderStageOptions): Promise<BuilderPlan> {
    const locks = await lockDigest(projectDir, config.builder.lockFiles)
    const lockPrint = lockFingerprint(config, locks)
    const fingerprint = StateManager.fingerprint({
      lock: lockPrint,
      sources: await sourceDigest(projectDir, ignores),
      version
    })

    return {
      fingerprint,
      lockFingerprint: lockPrint,
      cachedRunId: await reusableRun(workspace, state, 'builder', fingerprint)
    }
  }

  /**
   * Executes the builder unless `plan.cachedRunId` is set and `force` is not.
   * @returns Committed run ID
   */
  async run(options: BuilderStageOptions, plan: BuilderPlan, force = false): Promise<string> {
    const {workspace} = options
    const stage = stageRefs.builder

    if (plan.cachedRunId && !force) {
      await workspace.linkRun(stage.id, plan.cachedRunId)
      this.reporter.emit({event: 'STAGE_SKIPPED', workspaceId: workspace.id, stage, runId: plan.cachedRunId})
      return plan.cachedRunId
    }

    this.reporter.emit({event: 'STAGE_STARTING', workspaceId: workspace.id, stage})
    const runId = workspace.generateRunId()
    const stagingPath = await workspace.prepareRun(runId)

    try {
      return await this.execute(options, plan, runId, stagingPath)
    } catch (error) {
      await workspace.discardRun(runId)
      this.reporter.emit({
        event: 'STAGE_FAILED',
        workspaceId: workspace.id,
        stage,
        exitCode: error instanceof ResolutionError ? error.exitCode : undefined,
        error: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async execute(
    options: BuilderStageOptions,
    plan: BuilderPlan,
    runId: string,
    stagingPath: string
  ): Promise<string> {
    const {workspace, state, config, version} = options
    const stage = stageRefs.builder
    // Outside the checkout, which may itself hold the workspace root
    const contextPath = await mkdtemp(join(tmpdir(), 'scanpack-context-'))
    let result: RunContainerResult
    try {
      result = await this.resolve(options, runId, stagingPath, contextPath)
    } finally {
      await rm(contextPath, {recursive: true, force: true})
    }

    this.reporter.result(workspace.id, stage, result)

    await writeMeta(stagingPath, {
      runId,
      stageId: stage.id,
      startedAt: result.startedAt.toISOString(),
      finishedAt: result.finishedAt.toISOString(),
      durationMs: result.finishedAt.getTime() - result.startedAt.getTime(),
      exitCode: result.exitCode,
      image: config.baseImage,
      version,
      plugins: config.builder.plugins,
      systemPackages: config.builder.systemPackages,
      lockFiles: config.builder.lockFiles,
      lockFingerprint: plan.lockFingerprint,
      fingerprint: plan.fingerprint,
      status: result.exitCode === 0 ? 'success' : 'failure'
    })

    if (result.exitCode !== 0) {
      throw new ResolutionError(result.exitCode, {cause: result.error})
    }

    await this.verifyHandoff(workspace.runStagingArtifactsPath(runId), config)
    await commitStageRun(workspace, state, stage.id, runId, plan.fingerprint)

    const artifactSize = await dirSize(workspace.runArtifactsPath(runId))
    this.reporter.emit({
      event: 'STAGE_FINISHED',
      workspaceId: workspace.id,
      stage,
      runId,
      durationMs: result.finishedAt.getTime() - result.startedAt.getTime(),
      artifactSize
    })
    return runId
  }

  /**
   * Runs the builder container over a filtered copy of the checkout.
   */
  private async resolve(
    {workspace, config, projectDir, version, ignores}: BuilderStageOptions,
    runId: string,
    stagingPath: string,
    contextPath: string
  ): Promise<RunContainerResult> {
    const stage = stageRefs.builder
    await prepareSourceContext(projectDir, contextPath, ignores)
    await workspace.prepareCache('pip-cache')
    await workspace.prepareCache('poetry-cache')

    const request: RunContainerRequest = {
      name: `scanpack-${workspace.id}-builder-${Date.now()}`,
      image: config.baseImage,
      setup: {
        cmd: ['sh', '-c', builderSetupScript(config)],
        caches: [{name: 'pip-cache', containerPath: '/root/.cache/pip'}]
      },
      cmd: ['sh', '-c', builderRunScript(config)],
      env: {PIP_DISABLE_PIP_VERSION_CHECK: '1', POETRY_DYNAMIC_VERSIONING_BYPASS: version},
      output: {stagingRunId: runId, containerPath: handoffContainerPath},
      caches: [{name: 'poetry-cache', containerPath: '/root/.cache/pypoetry'}],
      sources: [{hostPath: contextPath, containerPath: config.workdir}],
      timeoutSec: config.builder.timeoutSec
    }

    const sink = createLogSink(stagingPath, ({stream, line}) => {
      this.reporter.log(workspace.id, stage, stream, line)
    })

    try {
      return await withRetries(async () => this.executor.run(workspace, request, sink.onLogLine), {
        retries: config.builder.retries,
        delayMs: config.builder.retryDelayMs,
        onRetry: (attempt, maxRetries) => {
          this.reporter.emit({event: 'STAGE_RETRYING', workspaceId: workspace.id, stage, attempt, maxRetries})
        }
      })
    } finally {
      await sink.close()
    }
  }

  /**
   * The hand-off must expose the entrypoint and must not carry `.git`.
   */
  private async verifyHandoff(artifactsPath: string, config: PackagingConfig): Promise<void> {
    const entrypoint = entrypointRelativePath(config)
    if (!await pathExists(join(artifactsPath, entrypoint))) {
      throw new ArtifactNotFoundError(`Resolved environment has no entrypoint at ${config.workdir}/${entrypoint}`)
    }

    if (await pathExists(join(artifactsPath, '.git'))) {
      throw new LeakageError([`${config.workdir}/.git`])
    }
  }
}
