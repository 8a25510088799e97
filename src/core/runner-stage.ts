import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import type {BuildImageResult, ContainerExecutor, Workspace} from '../engine/index.js'
import {ArtifactNotFoundError, ImageBuildError} from '../errors.js'
import type {PackagingConfig} from '../types.js'
import {contractFromConfig, contractLabels, contractToLabels, entrypointRelativePath} from './contract.js'
import {renderRunnerDockerfile} from './dockerfile.js'
import {stageRefs, type Reporter} from './reporter.js'
import {commitStageRun, createLogSink, reusableRun, withRetries, writeMeta} from './stage.js'
import {StateManager} from './state.js'
import {pathExists} from './utils.js'
import {versionTag} from './version.js'

/**
 * Primary tag followed by a `<repository>:<version>` tag.
 */
export function imageTags(tag: string, version: string): string[] {
  const slash = tag.lastIndexOf('/')
  const colon = tag.lastIndexOf(':')
  const repository = colon > slash ? tag.slice(0, colon) : tag
  const versioned = `${repository}:${versionTag(version)}`
  return versioned === tag ? [tag] : [tag, versioned]
}

export function imageLabels(config: PackagingConfig, version: string, lockFingerprint: string): Record<string, string> {
  return {
    ...contractToLabels(contractFromConfig(config)),
    [contractLabels.lockFingerprint]: lockFingerprint,
    [contractLabels.version]: version,
    [contractLabels.title]: config.name
  }
}

export type RunnerPlan = {
  dockerfile: string;
  tags: string[];
  labels: Record<string, string>;
  fingerprint: string;
  cachedRunId?: string;
}

export type RunnerStageOptions = {
  workspace: Workspace;
  state: StateManager;
  config: PackagingConfig;
  builderRunId: string;
  version: string;
  lockFingerprint: string;
  /** Overrides `config.tag`. */
  tag?: string;
}

export type RunnerResult = {
  runId: string;
  image: string;
  imageId?: string;
}

/**
 * Builds the runtime image from the builder's hand-off directory alone.
 */
export class RunnerStage {
  constructor(
    private readonly executor: ContainerExecutor,
    private readonly reporter: Reporter
  ) {}

  /**
   * The stage is reusable only while every tag still points at the image
   * the recorded run built.
   */
  async plan({workspace, state, config, builderRunId, version, lockFingerprint, tag}: RunnerStageOptions): Promise<RunnerPlan> {
    const dockerfile = renderRunnerDockerfile(config)
    const tags = imageTags(tag ?? config.tag, version)
    const labels = imageLabels(config, version, lockFingerprint)
    const fingerprint = StateManager.fingerprint({builderRunId, dockerfile, tags, labels})

    let cachedRunId = await reusableRun(workspace, state, 'runner', fingerprint)
    if (cachedRunId && !await this.tagsPointAt(tags, state.getStage('runner')?.imageId)) {
      cachedRunId = undefined
    }

    return {dockerfile, tags, labels, fingerprint, cachedRunId}
  }

  private async tagsPointAt(tags: string[], imageId: string | undefined): Promise<boolean> {
    if (imageId === undefined) {
      return false
    }

    for (const tag of tags) {
      const info = await this.executor.inspectImage(tag)
      if (info?.id !== imageId) {
        return false
      }
    }

    return true
  }

  async run(options: RunnerStageOptions, plan: RunnerPlan, force = false): Promise<RunnerResult> {
    const {workspace, config, builderRunId} = options
    const stage = stageRefs.runner
    const image = plan.tags[0]

    if (plan.cachedRunId && !force) {
      await workspace.linkRun(stage.id, plan.cachedRunId)
      this.reporter.emit({event: 'STAGE_SKIPPED', workspaceId: workspace.id, stage, runId: plan.cachedRunId})
      return {runId: plan.cachedRunId, image}
    }

    this.reporter.emit({event: 'STAGE_STARTING', workspaceId: workspace.id, stage})
    const runId = workspace.generateRunId()
    const stagingPath = await workspace.prepareRun(runId)

    try {
      const handoff = workspace.runArtifactsPath(builderRunId)
      const entrypoint = entrypointRelativePath(config)
      if (!await pathExists(join(handoff, entrypoint))) {
        throw new ArtifactNotFoundError(`Builder run ${builderRunId} has no ${entrypoint} to package`)
      }

      return await this.execute(options, plan, runId, stagingPath, handoff)
    } catch (error) {
      await workspace.discardRun(runId)
      this.reporter.emit({
        event: 'STAGE_FAILED',
        workspaceId: workspace.id,
        stage,
        exitCode: error instanceof ImageBuildError ? error.exitCode : undefined,
        error: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async execute(
    {workspace, state, config, builderRunId, version}: RunnerStageOptions,
    plan: RunnerPlan,
    runId: string,
    stagingPath: string,
    handoff: string
  ): Promise<RunnerResult> {
    const stage = stageRefs.runner
    const image = plan.tags[0]

    // Outside the build context so it never lands in the image
    const dockerfilePath = join(stagingPath, 'Dockerfile')
    await writeFile(dockerfilePath, plan.dockerfile, 'utf8')

    const sink = createLogSink(stagingPath, ({stream, line}) => {
      this.reporter.log(workspace.id, stage, stream, line)
    })

    let result: BuildImageResult
    try {
      result = await withRetries(async () => this.executor.buildImage({
        dockerfilePath,
        contextPath: handoff,
        tags: plan.tags,
        labels: plan.labels
      }, sink.onLogLine), {
        retries: config.builder.retries,
        delayMs: config.builder.retryDelayMs,
        onRetry: (attempt, maxRetries) => {
          this.reporter.emit({event: 'STAGE_RETRYING', workspaceId: workspace.id, stage, attempt, maxRetries})
        }
      })
    } finally {
      await sink.close()
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
      tags: plan.tags,
      version,
      builderRunId,
      imageId: result.imageId,
      fingerprint: plan.fingerprint,
      status: result.exitCode === 0 ? 'success' : 'failure'
    })

    if (result.exitCode !== 0) {
      throw new ImageBuildError(image, result.exitCode, {cause: result.error})
    }

    await commitStageRun(workspace, state, stage.id, runId, plan.fingerprint, result.imageId)
    this.reporter.emit({
      event: 'STAGE_FINISHED',
      workspaceId: workspace.id,
      stage,
      runId,
      durationMs: result.finishedAt.getTime() - result.startedAt.getTime(),
      imageId: result.imageId
    })
    return {runId, image, imageId: result.imageId}
  }
}
