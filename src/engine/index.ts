export {Workspace} from './workspace.js'
export {ContainerExecutor, type LogLine, type OnLogLine} from './executor.js'
export {DockerCliExecutor, buildImageArgs, createContainerArgs, parseImageInspect, runImageArgs} from './docker-executor.js'
export type {
  BindMount,
  BuildImageRequest,
  BuildImageResult,
  CacheMount,
  ImageInfo,
  OutputMount,
  RunContainerRequest,
  RunContainerResult,
  RunImageRequest,
  SetupPhase
} from './types.js'
