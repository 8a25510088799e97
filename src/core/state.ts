import {readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {createHash} from 'node:crypto'
import {isStageId, type StageId} from '../types.js'

/**
 * Cached execution state for a single stage.
 */
export type StageState = {
  /** Run ID produced by the stage */
  runId: string;
  /** SHA256 fingerprint of everything the stage's output depends on */
  fingerprint: string;
  /** Image the runner stage built; its tags must still point at it */
  imageId?: string;
}

/**
 * Workspace state containing the last committed run of each stage.
 * Persisted as state.json in the workspace directory.
 */
export type BuildState = {
  stages: Partial<Record<StageId, StageState>>;
}

/** Values a fingerprint is computed over. */
export type FingerprintComponent = string | string[] | Record<string, string> | undefined

/**
 * Manages caching state between builds.
 *
 * ## Fingerprint Algorithm
 *
 * Components are hashed in key order. Arrays keep their order (a plugin
 * list is ordered), records are hashed with sorted entries, and undefined
 * components are skipped:
 * ```
 * SHA256(key1 + JSON(value1) + key2 + JSON(value2) + ...)
 * ```
 *
 * The builder's fingerprint covers the lock files' content, so an
 * unchanged lock specification reuses the committed environment. The
 * runner's fingerprint covers the builder run ID, so a new environment
 * always produces a new image.
 */
export class StateManager {
  static fingerprint(components: Record<string, FingerprintComponent>): string {
    const hash = createHash('sha256')
    for (const key of Object.keys(components).sort((a, b) => a.localeCompare(b))) {
      const value = components[key]
      if (value === undefined) {
        continue
      }

      hash.update(key)
      if (typeof value === 'string' || Array.isArray(value)) {
        hash.update(JSON.stringify(value))
      } else {
        hash.update(JSON.stringify(Object.entries(value).sort((a, b) => a[0].localeCompare(b[0]))))
      }
    }

    return hash.digest('hex')
  }

  private state: BuildState = {stages: {}}
  private readonly path: string

  /**
   * @param workspaceRoot - Absolute path to workspace directory
   */
  constructor(workspaceRoot: string) {
    this.path = join(workspaceRoot, 'state.json')
  }

  /**
   * Loads cached state from state.json.
   * A missing or unreadable file yields an empty state.
   */
  async load(): Promise<void> {
    let content: string
    try {
      content = await readFile(this.path, 'utf8')
    } catch {
      this.state = {stages: {}}
      return
    }

    this.state = parseState(content)
  }

  async save(): Promise<void> {
    await writeFile(this.path, JSON.stringify(this.state, null, 2), 'utf8')
  }

  getStage(stageId: StageId): StageState | undefined {
    return this.state.stages[stageId]
  }

  /**
   * Lists all stages with their run IDs.
   */
  listStages(): Array<{stageId: StageId; runId: string}> {
    const rows: Array<{stageId: StageId; runId: string}> = []
    for (const [stageId, stage] of Object.entries(this.state.stages)) {
      if (stage && isStageId(stageId)) {
        rows.push({stageId, runId: stage.runId})
      }
    }

    return rows
  }

  /**
   * Returns the set of run IDs currently referenced by state.
   */
  activeRunIds(): Set<string> {
    return new Set(this.listStages().map(s => s.runId))
  }

  setStage(stageId: StageId, runId: string, fingerprint: string, imageId?: string): void {
    this.state.stages[stageId] = imageId === undefined ? {runId, fingerprint} : {runId, fingerprint, imageId}
  }
}

function parseState(content: string): BuildState {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch {
    return {stages: {}}
  }

  const state: BuildState = {stages: {}}
  if (typeof raw !== 'object' || raw === null || !('stages' in raw)) {
    return state
  }

  const {stages} = raw
  if (typeof stages !== 'object' || stages === null) {
    return state
  }

  for (const [stageId, value] of Object.entries(stages)) {
    if (isStageId(stageId) && isStageState(value)) {
      state.stages[stageId] = typeof value.imageId === 'string'
        ? {runId: value.runId, fingerprint: value.fingerprint, imageId: value.imageId}
        : {runId: value.runId, fingerprint: value.fingerprint}
    }
  }

  return state
}

function isStageState(value: unknown): value is StageState {
  return typeof value === 'object' && value !== null
    && 'runId' in value && typeof value.runId === 'string'
    && 'fingerprint' in value && typeof value.fingerprint === 'string'
    && (!('imageId' in value) || typeof value.imageId === 'string')
}
