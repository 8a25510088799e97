import {execSync} from 'node:child_process'
import {mkdir, mkdtemp, readdir, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import {ContainerExecutor, type OnLogLine} from '../engine/executor.js'
import type {
  BuildImageRequest,
  BuildImageResult,
  ImageInfo,
  RunContainerRequest,
  RunContainerResult,
  RunImageRequest
} from '../engine/types.js'
import type {Workspace} from '../engine/workspace.js'
import type {BuildEvent, Reporter} from '../core/reporter.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'scanpack-test-'))
}

/**
 * Silent reporter: all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */},
  result() {/* noop */}
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]} {
  const events: BuildEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log() {/* noop */},
    result() {/* noop */}
  }

  return {reporter, events}
}

/**
 * Checks if Docker is available on the host (synchronous for use at module level).
 */
export function isDockerAvailable(): boolean {
  try {
    execSync('docker version', {stdio: 'ignore'})
    return true
  } catch {
    return false
  }
}

/**
 * Checks if git is installed on the host.
 */
export function isGitAvailable(): boolean {
  try {
    execSync('git --version', {stdio: 'ignore'})
    return true
  } catch {
    return false
  }
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(root, path)
    await mkdir(dirname(fullPath), {recursive: true})
    await writeFile(fullPath, content, 'utf8')
  }
}

export type FakeExecutorOptions = {
  /** Entrypoint binary the fake builder writes under `.venv/bin/`. */
  executable?: string;
  builderExitCode?: number;
  writeEntrypoint?: boolean;
  writeGit?: boolean;
  buildExitCode?: number;
  /** Errors thrown by successive `run` calls before they succeed. */
  runErrors?: Error[];
  imageFiles?: string[];
  runExitCode?: number;
}

/**
 * In-process stand-in for Docker. The builder container "resolves" by
 * writing a fake entrypoint into the output mount; images live in memory.
 */
export class FakeExecutor extends ContainerExecutor {
  readonly runRequests: RunContainerRequest[] = []
  readonly buildRequests: BuildImageRequest[] = []
  readonly runImageRequests: RunImageRequest[] = []
  /** Sorted top-level entries of each builder's source context, as seen while it runs. */
  readonly contextEntries: string[][] = []
  readonly images = new Map<string, ImageInfo>()
  checked = 0

  constructor(private readonly options: FakeExecutorOptions = {}) {
    super()
  }

  async check(): Promise<void> {
    this.checked++
  }

  async cleanupContainers(): Promise<void> {
    // Nothing to clean
  }

  async killRunningContainers(): Promise<void> {
    // Nothing running
  }

  async run(workspace: Workspace, request: RunContainerRequest, onLogLine: OnLogLine): Promise<RunContainerResult> {
    this.runRequests.push(request)
    for (const source of request.sources ?? []) {
      this.contextEntries.push((await readdir(source.hostPath)).sort())
    }

    const error = this.options.runErrors?.shift()
    if (error) {
      throw error
    }

    const startedAt = new Date()
    const output = workspace.runStagingArtifactsPath(request.output.stagingRunId)
    onLogLine({stream: 'stdout', line: 'Installing dependencies from lock file'})

    const exitCode = this.options.builderExitCode ?? 0
    if (exitCode !== 0) {
      onLogLine({stream: 'stderr', line: 'Unable to find installation candidates'})
      return {exitCode, startedAt, finishedAt: new Date()}
    }

    if (this.options.writeEntrypoint ?? true) {
      await writeFiles(output, {[`.venv/bin/${this.options.executable ?? 'tool'}`]: '#!/app/.venv/bin/python\n'})
    }

    if (this.options.writeGit) {
      await writeFiles(output, {'.git/HEAD': 'ref: refs/heads/main\n'})
    }

    return {exitCode, startedAt, finishedAt: new Date()}
  }

  async buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult> {
    this.buildRequests.push(request)
    const startedAt = new Date()
    onLogLine({stream: 'stderr', line: '#1 [internal] load build definition from Dockerfile'})

    const exitCode = this.options.buildExitCode ?? 0
    if (exitCode !== 0) {
      return {exitCode, startedAt, finishedAt: new Date(), error: 'docker build failed'}
    }

    const id = `sha256:${String(this.buildRequests.length).padStart(64, '0')}`
    for (const tag of request.tags) {
      this.images.set(tag, {id, labels: request.labels ?? {}, entrypoint: [], cmd: [], workingDir: ''})
    }

    return {exitCode, startedAt, finishedAt: new Date(), imageId: id}
  }

  async runImage(request: RunImageRequest): Promise<RunContainerResult> {
    this.runImageRequests.push(request)
    const now = new Date()
    return {exitCode: this.options.runExitCode ?? 0, startedAt: now, finishedAt: now}
  }

  async inspectImage(image: string): Promise<ImageInfo | undefined> {
    return this.images.get(image)
  }

  async listImageFiles(): Promise<string[]> {
    return this.options.imageFiles ?? []
  }
}
