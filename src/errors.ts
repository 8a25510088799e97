export class ScanpackError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ScanpackError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends ScanpackError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ImagePullError extends DockerError {
  constructor(image: string, options?: {cause?: unknown}) {
    super('IMAGE_PULL_FAILED', `Failed to pull image "${image}"`, options)
    this.name = 'ImagePullError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ContainerTimeoutError extends DockerError {
  constructor(timeoutSec: number, options?: {cause?: unknown}) {
    super('CONTAINER_TIMEOUT', `Container exceeded timeout of ${timeoutSec}s`, options)
    this.name = 'ContainerTimeoutError'
  }
}

export class ImageBuildError extends DockerError {
  constructor(
    readonly tag: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('IMAGE_BUILD_FAILED', `docker build for "${tag}" failed with exit code ${exitCode}`, options)
    this.name = 'ImageBuildError'
  }
}

export class ImageNotFoundError extends DockerError {
  constructor(image: string, options?: {cause?: unknown}) {
    super('IMAGE_NOT_FOUND', `Image not found: "${image}"`, options)
    this.name = 'ImageNotFoundError'
  }
}

// -- Workspace errors --------------------------------------------------------

export class WorkspaceError extends ScanpackError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'WorkspaceError'
  }
}

export class ArtifactNotFoundError extends WorkspaceError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('ARTIFACT_NOT_FOUND', message, options)
    this.name = 'ArtifactNotFoundError'
  }
}

export class StagingError extends WorkspaceError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

// -- Build errors ------------------------------------------------------------

export class BuildError extends ScanpackError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildError'
  }
}

export class ResolutionError extends BuildError {
  constructor(
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('RESOLUTION_FAILED', `Dependency resolution failed with exit code ${exitCode}`, options)
    this.name = 'ResolutionError'
  }
}

export class LeakageError extends BuildError {
  constructor(
    readonly paths: string[],
    options?: {cause?: unknown}
  ) {
    super('LEAKAGE_DETECTED', `Build output contains paths that must not ship: ${paths.join(', ')}`, options)
    this.name = 'LeakageError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigError extends ScanpackError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigError'
  }
}

export class ValidationError extends ConfigError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

// -- Scanner & notification errors ------------------------------------------

export class ScanError extends ScanpackError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ScanError'
  }
}

export class InputDirectoryNotFoundError extends ScanError {
  constructor(directory: string, options?: {cause?: unknown}) {
    super('INPUT_DIRECTORY_NOT_FOUND', `Input directory does not exist: ${directory}`, options)
    this.name = 'InputDirectoryNotFoundError'
  }
}

export class NotifyError extends ScanpackError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('NOTIFY_FAILED', message, options)
    this.name = 'NotifyError'
  }

  override get transient(): boolean {
    return true
  }
}
