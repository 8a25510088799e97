import process from 'node:process'
import {mkdtemp, readFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {execa} from 'execa'
import * as tar from 'tar'
import {DockerNotAvailableError, ImagePullError, ContainerTimeoutError, ImageNotFoundError} from '../errors.js'
import type {
  BuildImageRequest,
  BuildImageResult,
  ImageInfo,
  RunContainerRequest,
  RunContainerResult,
  RunImageRequest
} from './types.js'
import {ContainerExecutor, type OnLogLine} from './executor.js'
import type {Workspace} from './workspace.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept; everything else is stripped
 * so that host secrets (API keys, tokens, credentials) never leak,
 * even if a `-e KEY` (without value) were accidentally added.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

/**
 * Arguments for `docker create` of a disposable build container.
 * Image and command are appended by the caller.
 */
export function createContainerArgs(workspace: Workspace, request: RunContainerRequest): string[] {
  const args = [
    'create',
    '--name',
    request.name,
    '--network',
    'bridge',
    '--label',
    'scanpack=true',
    '--label',
    `scanpack.workspace=${workspace.id}`
  ]

  if (request.env) {
    for (const [key, value] of Object.entries(request.env)) {
      args.push('-e', `${key}=${value}`)
    }
  }

  // Mount caches (persistent, read-write)
  if (request.caches) {
    for (const cache of request.caches) {
      args.push('-v', `${workspace.cachePath(cache.name)}:${cache.containerPath}:rw`)
    }
  }

  // Mount setup-only caches (not duplicating any already in request.caches)
  if (request.setup.caches) {
    const existingNames = new Set(request.caches?.map(c => c.name))
    for (const cache of request.setup.caches) {
      if (!existingNames.has(cache.name)) {
        args.push('-v', `${workspace.cachePath(cache.name)}:${cache.containerPath}:rw`)
      }
    }
  }

  // Mount output (staging run artifacts, read-write)
  const outputHostPath = workspace.runStagingArtifactsPath(request.output.stagingRunId)
  args.push('-v', `${outputHostPath}:${request.output.containerPath}:rw`)

  return args
}

/**
 * Arguments for `docker build`.
 * Labels are sorted so that identical requests yield identical command lines.
 */
export function buildImageArgs(request: BuildImageRequest, iidFile: string): string[] {
  const args = ['build', '--file', request.dockerfilePath, '--iidfile', iidFile]

  if (request.pull) {
    args.push('--pull')
  }

  const labels = Object.entries(request.labels ?? {}).sort((a, b) => a[0].localeCompare(b[0]))
  for (const [key, value] of labels) {
    args.push('--label', `${key}=${value}`)
  }

  for (const tag of request.tags) {
    args.push('--tag', tag)
  }

  args.push(request.contextPath)
  return args
}

/**
 * Arguments for `docker run` of a runtime image.
 * Without arguments nothing follows the image, so its CMD applies.
 */
export function runImageArgs(request: RunImageRequest): string[] {
  const args = ['run', '--rm', '--name', request.name, '--label', 'scanpack=true']

  if (request.env) {
    for (const [key, value] of Object.entries(request.env)) {
      args.push('-e', `${key}=${value}`)
    }
  }

  if (request.mounts) {
    for (const mount of request.mounts) {
      args.push('-v', `${mount.hostPath}:${mount.containerPath}:${mount.readOnly === false ? 'rw' : 'ro'}`)
    }
  }

  if (request.entrypoint !== undefined) {
    args.push('--entrypoint', request.entrypoint)
  }

  args.push(request.image, ...request.args)
  return args
}

/**
 * Narrow the JSON printed by `docker image inspect --format '{{json .}}'`.
 */
export function parseImageInspect(json: string): ImageInfo {
  const raw: unknown = JSON.parse(json)
  if (!isRecord(raw) || typeof raw.Id !== 'string') {
    throw new TypeError('Unexpected docker image inspect output')
  }

  const config = isRecord(raw.Config) ? raw.Config : {}
  const labels: Record<string, string> = {}
  if (isRecord(config.Labels)) {
    for (const [key, value] of Object.entries(config.Labels)) {
      if (typeof value === 'string') {
        labels[key] = value
      }
    }
  }

  return {
    id: raw.Id,
    labels,
    entrypoint: stringArray(config.Entrypoint),
    cmd: stringArray(config.Cmd),
    workingDir: typeof config.WorkingDir === 'string' ? config.WorkingDir : ''
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

export class DockerCliExecutor extends ContainerExecutor {
  private readonly env = dockerCliEnv()
  private readonly activeContainers = new Set<string>()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  /**
   * Force-remove all containers currently being executed by this process.
   */
  async killRunningContainers(): Promise<void> {
    const names = [...this.activeContainers]
    if (names.length === 0) {
      return
    }

    await execa('docker', ['rm', '-f', ...names], {env: this.env, reject: false})
  }

  /**
   * Remove any leftover scanpack containers for the given workspace.
   * Called before a build to clean up after crashes.
   */
  async cleanupContainers(workspaceId: string): Promise<void> {
    const {stdout, exitCode} = await execa('docker', [
      'ps', '-a', '--filter', `label=scanpack.workspace=${workspaceId}`, '-q'
    ], {env: this.env, reject: false})

    if (exitCode !== 0) {
      return
    }

    const ids = stdout.trim().split('\n').filter(Boolean)
    if (ids.length > 0) {
      await execa('docker', ['rm', '-f', ...ids], {env: this.env, reject: false})
    }
  }

  async buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult> {
    const startedAt = new Date()
    const iidDir = await mkdtemp(join(tmpdir(), 'scanpack-iid-'))
    const iidFile = join(iidDir, 'image.id')

    try {
      const proc = execa('docker', buildImageArgs(request, iidFile), {
        env: {...this.env, DOCKER_BUILDKIT: '1'},
        reject: false
      })
      await this.streamLogs(proc, onLogLine)
      const result = await proc
      const exitCode = result.exitCode ?? 1

      if (exitCode !== 0) {
        return {exitCode, startedAt, finishedAt: new Date(), error: 'docker build failed'}
      }

      const imageId = (await readFile(iidFile, 'utf8')).trim()
      return {exitCode, startedAt, finishedAt: new Date(), imageId}
    } finally {
      await rm(iidDir, {recursive: true, force: true})
    }
  }

  async runImage(request: RunImageRequest, onLogLine: OnLogLine): Promise<RunContainerResult> {
    const startedAt = new Date()
    this.activeContainers.add(request.name)

    try {
      const proc = execa('docker', runImageArgs(request), {env: this.env, reject: false})
      await this.streamLogs(proc, onLogLine)
      const result = await proc
      return {exitCode: result.exitCode ?? 1, startedAt, finishedAt: new Date()}
    } finally {
      this.activeContainers.delete(request.name)
    }
  }

  async inspectImage(image: string): Promise<ImageInfo | undefined> {
    const {stdout, exitCode} = await execa('docker', ['image', 'inspect', '--format', '{{json .}}', image], {
      env: this.env,
      reject: false
    })

    if (exitCode !== 0) {
      return undefined
    }

    return parseImageInspect(stdout)
  }

  /**
   * Lists the image filesystem: `docker create` + `docker export`, then
   * the exported archive is read through tar without extracting it.
   */
  async listImageFiles(image: string): Promise<string[]> {
    const created = await execa('docker', ['create', image], {env: this.env, reject: false})
    if (created.exitCode !== 0) {
      throw new ImageNotFoundError(image, {cause: new Error(created.stderr)})
    }

    const containerId = created.stdout.trim()
    this.activeContainers.add(containerId)
    const exportDir = await mkdtemp(join(tmpdir(), 'scanpack-export-'))

    try {
      const archive = join(exportDir, 'rootfs.tar')
      await execa('docker', ['export', '--output', archive, containerId], {env: this.env})

      const entries: string[] = []
      await tar.t({
        file: archive,
        onReadEntry(entry) {
          entries.push(entry.path.replace(/^\.?\//, ''))
        }
      })
      return entries
    } finally {
      await rm(exportDir, {recursive: true, force: true})
      await this.cleanup(containerId)
    }
  }

  /**
   * Two-phase execution: docker create (sleep), docker exec (setup), docker exec (run).
   */
  async run(workspace: Workspace, request: RunContainerRequest, onLogLine: OnLogLine): Promise<RunContainerResult> {
    const startedAt = new Date()

    // Sleep entrypoint keeps the container alive between the two phases
    const args = createContainerArgs(workspace, request)
    args.push('--entrypoint', 'sleep', request.image, 'infinity')

    let exitCode = 0
    let error: string | undefined
    this.activeContainers.add(request.name)

    try {
      await execa('docker', args, {env: this.env})

      await this.copySources(request)

      await execa('docker', ['start', request.name], {env: this.env})

      exitCode = await this.dockerExec(request, request.setup.cmd, onLogLine)
      if (exitCode !== 0) {
        return {exitCode, startedAt, finishedAt: new Date(), error: 'setup phase failed'}
      }

      exitCode = await this.dockerExec(request, request.cmd, onLogLine)
    } catch (error_) {
      ({exitCode, error} = this.handleRunError(error_, request))
    } finally {
      await this.cleanup(request.name)
    }

    return {exitCode, startedAt, finishedAt: new Date(), error}
  }

  /**
   * Copy source directories into the container's writable layer.
   */
  private async copySources(request: RunContainerRequest): Promise<void> {
    if (request.sources) {
      for (const source of request.sources) {
        await execa('docker', ['cp', `${source.hostPath}/.`, `${request.name}:${source.containerPath}`], {env: this.env})
      }
    }
  }

  /**
   * Execute a command in a running container, streaming logs.
   */
  private async dockerExec(
    request: RunContainerRequest,
    cmd: string[],
    onLogLine: OnLogLine
  ): Promise<number> {
    const proc = execa('docker', ['exec', request.name, ...cmd], {
      env: this.env,
      reject: false,
      timeout: request.timeoutSec ? request.timeoutSec * 1000 : undefined
    })

    await this.streamLogs(proc, onLogLine)

    const result = await proc
    if (result.timedOut) {
      throw new ContainerTimeoutError(request.timeoutSec ?? 0)
    }

    return result.exitCode ?? 1
  }

  /**
   * Stream stdout/stderr from a subprocess via iterables.
   */
  private async streamLogs(
    proc: ReturnType<typeof execa>,
    onLogLine: OnLogLine
  ): Promise<void> {
    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()

    await Promise.all([stdoutDone, stderrDone])
  }

  /**
   * Map docker failures to typed errors; anything else becomes a failed result.
   */
  private handleRunError(error_: unknown, request: RunContainerRequest): {exitCode: number; error: string | undefined} {
    if (error_ instanceof ContainerTimeoutError) {
      throw error_
    }

    const stderr = error_ instanceof Error && 'stderr' in error_ ? String(error_.stderr) : ''
    if (/unable to find image|pull access denied|manifest unknown/i.test(stderr)) {
      throw new ImagePullError(request.image, {cause: error_})
    }

    return {
      exitCode: 1,
      error: error_ instanceof Error ? error_.message : String(error_)
    }
  }

  /**
   * Force-remove a container and release tracking.
   */
  private async cleanup(name: string): Promise<void> {
    this.activeContainers.delete(name)
    await execa('docker', ['rm', '-f', '-v', name], {env: this.env, reject: false})
  }
}
