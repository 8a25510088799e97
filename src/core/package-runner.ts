import process from 'node:process'
import {isAbsolute, relative, resolve, sep} from 'node:path'
import {type ContainerExecutor, Workspace} from '../engine/index.js'
import type {PackagingConfig, StageId} from '../types.js'
import {BuilderStage, type BuilderPlan} from './builder-stage.js'
import {loadConfig} from './config-loader.js'
import {stageRefs, type Reporter} from './reporter.js'
import {RunnerStage} from './runner-stage.js'
import {StateManager} from './state.js'
import {deriveVersion} from './version.js'

export type BuildOptions = {
  /** Workspace ID. Defaults to the project name. */
  workspace?: string;
  /** Skip the cache for every stage, or for the listed ones. */
  force?: true | StageId[];
  /** Report which stages would run without executing anything. */
  dryRun?: boolean;
  /** Overrides the configured image tag. */
  tag?: string;
}

export type BuildResult = {
  builderRunId?: string;
  runnerRunId?: string;
  image: string;
  version: string;
}

/**
 * Runs the builder stage then the runner stage for a project.
 *
 * Orchestration flow:
 * 1. Load `.scanpack.yml` and open the workspace
 * 2. Clean up staging and containers left over by a crash
 * 3. Derive the application version from the checkout
 * 4. Builder: reuse the committed environment when its fingerprint matches
 * 5. Runner: build the image over the hand-off directory
 *
 * A failed stage stops the build: the runner never sees a partial environment.
 */
export class PackageRunner {
  private readonly builder: BuilderStage
  private readonly runner: RunnerStage

  constructor(
    private readonly executor: ContainerExecutor,
    private readonly reporter: Reporter,
    private readonly workdirRoot: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.builder = new BuilderStage(executor, reporter)
    this.runner = new RunnerStage(executor, reporter)
  }

  async build(projectDir: string, options: BuildOptions = {}): Promise<BuildResult> {
    const root = resolve(projectDir)
    const config = await loadConfig(root, this.env)
    const workspace = await Workspace.openOrCreate(this.workdirRoot, options.workspace ?? config.name)
    const startedAt = Date.now()

    try {
      await workspace.cleanupStaging()
      if (!options.dryRun) {
        await this.executor.check()
        await this.executor.cleanupContainers(workspace.id)
      }

      const state = new StateManager(workspace.root)
      await state.load()

      const version = await deriveVersion(root)
      this.reporter.emit({event: 'BUILD_START', workspaceId: workspace.id, projectName: config.name, version})

      const forced = (stageId: StageId) => options.force === true || (options.force?.includes(stageId) ?? false)
      const builderOptions = {workspace, state, config, projectDir: root, version, ignores: this.contextIgnores(root)}
      const builderPlan = await this.builder.plan(builderOptions)
      const image = options.tag ?? config.tag

      if (options.dryRun) {
        return await this.dryRun({workspace, state, config, version, image, tag: options.tag, builderPlan, forced})
      }

      const builderRunId = await this.builder.run(builderOptions, builderPlan, forced('builder'))

      const runnerOptions = {
        workspace,
        state,
        config,
        builderRunId,
        version,
        lockFingerprint: builderPlan.lockFingerprint,
        tag: options.tag
      }
      const runnerPlan = await this.runner.plan(runnerOptions)
      const runner = await this.runner.run(runnerOptions, runnerPlan, forced('runner'))

      this.reporter.emit({
        event: 'BUILD_FINISHED',
        workspaceId: workspace.id,
        image: runner.image,
        version,
        durationMs: Date.now() - startedAt
      })
      return {builderRunId, runnerRunId: runner.runId, image: runner.image, version}
    } catch (error) {
      this.reporter.emit({
        event: 'BUILD_FAILED',
        workspaceId: workspace.id,
        error: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async dryRun({workspace, state, config, version, image, tag, builderPlan, forced}: {
    workspace: Workspace;
    state: StateManager;
    config: PackagingConfig;
    version: string;
    image: string;
    tag?: string;
    builderPlan: BuilderPlan;
    forced: (stageId: StageId) => boolean;
  }): Promise<BuildResult> {
    const builderRunId = forced('builder') ? undefined : builderPlan.cachedRunId
    if (builderRunId) {
      this.reporter.emit({event: 'STAGE_SKIPPED', workspaceId: workspace.id, stage: stageRefs.builder, runId: builderRunId})
    } else {
      this.reporter.emit({event: 'STAGE_WOULD_RUN', workspaceId: workspace.id, stage: stageRefs.builder})
    }

    let runnerRunId: string | undefined
    if (builderRunId && !forced('runner')) {
      const plan = await this.runner.plan({
        workspace, state, config, builderRunId, version, lockFingerprint: builderPlan.lockFingerprint, tag
      })
      runnerRunId = plan.cachedRunId
    }

    if (runnerRunId) {
      this.reporter.emit({event: 'STAGE_SKIPPED', workspaceId: workspace.id, stage: stageRefs.runner, runId: runnerRunId})
    } else {
      this.reporter.emit({event: 'STAGE_WOULD_RUN', workspaceId: workspace.id, stage: stageRefs.runner})
    }

    return {builderRunId, runnerRunId, image, version}
  }

  /**
   * The workdir root is excluded from the source context when it lives
   * inside the project.
   */
  private contextIgnores(projectDir: string): string[] {
    const rel = relative(projectDir, this.workdirRoot)
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      return []
    }

    return [rel.split(sep).join('/') + '/']
  }
}
