import {access, mkdir, readdir, rename, rm, symlink} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {WorkspaceError, StagingError} from '../errors.js'

/**
 * Isolated build area for one packaged project.
 *
 * A workspace provides:
 * - **staging/**: Temporary write location while a stage executes
 * - **runs/**: Committed stage outputs (immutable, read-only)
 * - **caches/**: Persistent read-write caches (pip and poetry downloads)
 * - **stage-runs/**: One symlink per stage, pointing at its last committed run
 * - **state.json**: Managed by the orchestration layer for build caching
 *
 * ## Run Lifecycle
 *
 * Each stage execution produces a **run**, a directory holding
 * `artifacts/` (the stage's hand-off), its logs and `meta.json`.
 *
 * 1. `prepareRun()` creates `staging/{runId}/` with `artifacts/` subdirectory
 * 2. The stage writes into `staging/{runId}/artifacts/`
 * 3. Success: `commitRun()` atomically moves it to `runs/{runId}/`
 *    OR Failure: `discardRun()` deletes `staging/{runId}/`
 *
 * Nothing of a discarded run survives, so a failed resolution never leaves a
 * partial environment behind.
 */
export class Workspace {
  /**
   * Creates a new workspace with staging, runs, and caches directories.
   * @param workdirRoot - Root directory for all workspaces
   * @param id - Optional workspace ID (auto-generated if omitted)
   */
  static async create(workdirRoot: string, id?: string): Promise<Workspace> {
    const workspaceId = id ?? Workspace.generateId()
    Workspace.validateWorkspaceId(workspaceId)
    const root = join(workdirRoot, workspaceId)
    await mkdir(join(root, 'staging'), {recursive: true})
    await mkdir(join(root, 'runs'), {recursive: true})
    await mkdir(join(root, 'caches'), {recursive: true})
    return new Workspace(workspaceId, root)
  }

  /**
   * Opens an existing workspace.
   * @throws If workspace does not exist
   */
  static async open(workdirRoot: string, id: string): Promise<Workspace> {
    Workspace.validateWorkspaceId(id)
    const root = join(workdirRoot, id)
    try {
      await access(root)
    } catch (error) {
      throw new WorkspaceError('WORKSPACE_NOT_FOUND', `Workspace not found: ${id}`, {cause: error})
    }

    return new Workspace(id, root)
  }

  /**
   * Opens the workspace, creating it on first use.
   */
  static async openOrCreate(workdirRoot: string, id: string): Promise<Workspace> {
    try {
      return await Workspace.open(workdirRoot, id)
    } catch (error) {
      if (error instanceof WorkspaceError && error.code === 'WORKSPACE_NOT_FOUND') {
        return Workspace.create(workdirRoot, id)
      }

      throw error
    }
  }

  /**
   * Lists all workspace IDs under the given root directory.
   * @returns Sorted array of workspace names (directories)
   */
  static async list(workdirRoot: string): Promise<string[]> {
    try {
      const entries = await readdir(workdirRoot, {withFileTypes: true})
      return entries.filter(e => e.isDirectory()).map(e => e.name).sort()
    } catch {
      return []
    }
  }

  /**
   * Removes a workspace directory.
   * @throws If the workspace ID is invalid
   */
  static async remove(workdirRoot: string, id: string): Promise<void> {
    Workspace.validateWorkspaceId(id)
    await rm(join(workdirRoot, id), {recursive: true, force: true})
  }

  private static validateWorkspaceId(id: string): void {
    if (id.includes('..') || id.includes('/')) {
      throw new WorkspaceError('INVALID_WORKSPACE_ID', `Invalid workspace ID: ${id}`)
    }
  }

  /**
   * Generates a unique identifier using timestamp and UUID.
   * @returns Unique ID in format: `{timestamp}-{uuid-prefix}`
   */
  private static generateId(): string {
    return `${Date.now()}-${randomUUID().slice(0, 8)}`
  }

  private constructor(
    readonly id: string,
    readonly root: string
  ) {}

  /**
   * Generates a unique run identifier.
   * @returns Run ID in format: `{timestamp}-{uuid-prefix}`
   */
  generateRunId(): string {
    return Workspace.generateId()
  }

  runStagingPath(runId: string): string {
    this.validateName(runId, 'INVALID_RUN_ID', 'run ID')
    return join(this.root, 'staging', runId)
  }

  runStagingArtifactsPath(runId: string): string {
    return join(this.runStagingPath(runId), 'artifacts')
  }

  runPath(runId: string): string {
    this.validateName(runId, 'INVALID_RUN_ID', 'run ID')
    return join(this.root, 'runs', runId)
  }

  runArtifactsPath(runId: string): string {
    return join(this.runPath(runId), 'artifacts')
  }

  /**
   * Prepares a staging directory for a new run.
   * Creates both the run directory and its artifacts subdirectory.
   * @returns Absolute path to the created staging directory
   */
  async prepareRun(runId: string): Promise<string> {
    try {
      const path = this.runStagingPath(runId)
      await mkdir(join(path, 'artifacts'), {recursive: true})
      return path
    } catch (error) {
      throw new StagingError(`Failed to prepare run ${runId}`, {cause: error})
    }
  }

  /**
   * Commits a staging run to the runs directory.
   * Uses atomic rename operation for consistency.
   */
  async commitRun(runId: string): Promise<void> {
    try {
      await rename(this.runStagingPath(runId), this.runPath(runId))
    } catch (error) {
      throw new StagingError(`Failed to commit run ${runId}`, {cause: error})
    }
  }

  /**
   * Creates a symlink from `stage-runs/{stageId}` to the committed run.
   * Replaces any existing symlink for the same stage.
   */
  async linkRun(stageId: string, runId: string): Promise<void> {
    this.validateName(stageId, 'INVALID_STAGE_ID', 'stage ID')
    const dir = join(this.root, 'stage-runs')
    await mkdir(dir, {recursive: true})
    const linkPath = join(dir, stageId)
    await rm(linkPath, {force: true})
    await symlink(join('..', 'runs', runId), linkPath)
  }

  /**
   * Discards a staging run (on execution failure).
   */
  async discardRun(runId: string): Promise<void> {
    try {
      await rm(this.runStagingPath(runId), {recursive: true, force: true})
    } catch (error) {
      throw new StagingError(`Failed to discard run ${runId}`, {cause: error})
    }
  }

  /**
   * Removes all staging directories.
   * Called before each build to clean up runs interrupted by a crash.
   */
  async cleanupStaging(): Promise<void> {
    const stagingDir = join(this.root, 'staging')
    let entries
    try {
      entries = await readdir(stagingDir, {withFileTypes: true})
    } catch {
      return
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        await rm(join(stagingDir, entry.name), {recursive: true, force: true})
      }
    }
  }

  /**
   * Lists all committed run IDs in this workspace.
   */
  async listRuns(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.root, 'runs'), {withFileTypes: true})
      return entries.filter(e => e.isDirectory()).map(e => e.name)
    } catch {
      return []
    }
  }

  /**
   * Removes runs not in the given set of active run IDs.
   * @returns Number of runs removed
   */
  async pruneRuns(activeRunIds: Set<string>): Promise<number> {
    const allRuns = await this.listRuns()
    let removed = 0
    for (const runId of allRuns) {
      if (!activeRunIds.has(runId)) {
        await rm(join(this.root, 'runs', runId), {recursive: true, force: true})
        removed++
      }
    }

    return removed
  }

  /**
   * Returns the cache directory path.
   * @throws If cache name is invalid
   */
  cachePath(cacheName: string): string {
    this.validateName(cacheName, 'INVALID_CACHE_NAME', 'cache name')
    return join(this.root, 'caches', cacheName)
  }

  /**
   * Creates the cache directory if it doesn't exist.
   */
  async prepareCache(cacheName: string): Promise<string> {
    const path = this.cachePath(cacheName)
    await mkdir(path, {recursive: true})
    return path
  }

  async listCaches(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.root, 'caches'), {withFileTypes: true})
      return entries.filter(e => e.isDirectory()).map(e => e.name)
    } catch {
      return []
    }
  }

  /**
   * Rejects anything that is not alphanumeric, dash or underscore,
   * so identifiers can never escape the workspace root.
   */
  private validateName(name: string, code: string, label: string): void {
    if (!/^[\w-]+$/.test(name)) {
      throw new WorkspaceError(code, `Invalid ${label}: ${name}. Must contain only alphanumeric characters, dashes, and underscores.`)
    }
  }
}
