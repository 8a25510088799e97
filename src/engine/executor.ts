import type {
  BuildImageRequest,
  BuildImageResult,
  ImageInfo,
  RunContainerRequest,
  RunContainerResult,
  RunImageRequest
} from './types.js'
import type {Workspace} from './workspace.js'

/**
 * Log line from container execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during container execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for executing containers and building images.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses Docker CLI
 *
 * The executor is responsible for:
 * - Running disposable build containers with sources, caches and an output mount
 * - Building images from a context directory
 * - Starting runtime images with caller arguments
 * - Streaming logs in real-time
 * - Cleaning up containers after execution
 */
export abstract class ContainerExecutor {
  /**
   * Verifies that the executor is available and functional.
   * @throws If the executor is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Remove leftover containers for the given workspace.
   * Called before a build to clean up after crashes.
   */
  abstract cleanupContainers(workspaceId: string): Promise<void>

  /**
   * Force-remove all containers currently being executed by this process.
   * Called from signal handlers (SIGINT/SIGTERM) to prevent orphaned containers.
   */
  abstract killRunningContainers(): Promise<void>

  /**
   * Executes a disposable container: the setup phase, then the command.
   * @param workspace - Workspace for resolving staging and cache paths
   */
  abstract run(workspace: Workspace, request: RunContainerRequest, onLogLine: OnLogLine): Promise<RunContainerResult>

  /**
   * Builds an image. A non-zero exit code is returned, not thrown.
   */
  abstract buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult>

  /**
   * Starts a runtime image and waits for it to exit.
   * The exit code is the entrypoint's, untranslated.
   */
  abstract runImage(request: RunImageRequest, onLogLine: OnLogLine): Promise<RunContainerResult>

  /**
   * @returns Image metadata, or undefined when the image does not exist locally
   */
  abstract inspectImage(image: string): Promise<ImageInfo | undefined>

  /**
   * Lists every path in the image's flattened filesystem, without a leading slash.
   */
  abstract listImageFiles(image: string): Promise<string[]>
}
