/**
 * Host directory bound into a container.
 */
export type BindMount = {
  /** Absolute path on the host */
  hostPath: string;
  /** Absolute path in the container */
  containerPath: string;
  /** Read-only unless set to false */
  readOnly?: boolean;
}

/**
 * Read-write mount for the output of an execution.
 *
 * The container writes to the staging run's artifacts directory during execution.
 * After successful execution, the staging run is committed to runs/.
 * On failure, the staging run is discarded.
 */
export type OutputMount = {
  /** Identifier of the run being created (in staging/ during execution) */
  stagingRunId: string;
  /** Path where output will be mounted inside the container (typically /output) */
  containerPath: string;
}

/**
 * Read-write mount of a persistent cache directory.
 *
 * Caches are workspace-scoped persistent directories that survive
 * across executions (pip and poetry download caches, for instance).
 */
export type CacheMount = {
  /** Cache name (e.g., "pip-cache") */
  name: string;
  /** Path where cache will be mounted in container */
  containerPath: string;
}

/**
 * Setup phase executed before the main command, in the same container.
 * Used for tool bootstrap.
 */
export type SetupPhase = {
  /** Command and arguments for the setup phase. */
  cmd: string[];
  /** Additional caches needed only during setup. */
  caches?: CacheMount[];
}

/**
 * Request to execute a disposable build container. Both phases run on the
 * bridge network: bootstrap and resolution download packages.
 */
export type RunContainerRequest = {
  /** Container name (used for Docker container identification) */
  name: string;
  /** Docker image to run (e.g., python:3.12-slim) */
  image: string;
  /** Command and arguments to execute */
  cmd: string[];
  setup: SetupPhase;
  /** Environment variables to pass to the container */
  env?: Record<string, string>;
  /** Output location to mount as read-write volume */
  output: OutputMount;
  /** Persistent caches to mount as read-write volumes */
  caches?: CacheMount[];
  /** Host directories copied into the container's writable layer (not bind-mounted) */
  sources?: BindMount[];
  /** Execution timeout in seconds (undefined = no timeout) */
  timeoutSec?: number;
}

/**
 * Result of a container execution.
 */
export type RunContainerResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Execution start timestamp */
  startedAt: Date;
  /** Execution end timestamp */
  finishedAt: Date;
  /** Error message if execution failed */
  error?: string;
}

/**
 * Request to build an image from a context directory.
 * The Dockerfile lives outside the context so it never lands in the image.
 */
export type BuildImageRequest = {
  dockerfilePath: string;
  contextPath: string;
  /** Image references to apply; the first one is the primary tag. */
  tags: string[];
  labels?: Record<string, string>;
  /** Always attempt to pull a newer version of the base image */
  pull?: boolean;
}

export type BuildImageResult = RunContainerResult & {
  /** Image ID, when the build succeeded */
  imageId?: string;
}

/**
 * Request to start a runtime image under its invocation contract.
 * The container is removed once it exits.
 */
export type RunImageRequest = {
  name: string;
  image: string;
  /** Arguments passed to the entrypoint. Empty = the image's CMD applies. */
  args: string[];
  /** Replaces the image's entrypoint */
  entrypoint?: string;
  mounts?: BindMount[];
  env?: Record<string, string>;
}

/**
 * Subset of `docker image inspect` used by scanpack.
 */
export type ImageInfo = {
  id: string;
  labels: Record<string, string>;
  entrypoint: string[];
  cmd: string[];
  workingDir: string;
}
