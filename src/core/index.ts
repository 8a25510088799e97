export {PackageRunner} from './package-runner.js'
export type {BuildOptions, BuildResult} from './package-runner.js'
export {BuilderStage, builderRunScript, builderSetupScript, lockFingerprint} from './builder-stage.js'
export type {BuilderPlan, BuilderStageOptions} from './builder-stage.js'
export {RunnerStage, imageLabels, imageTags} from './runner-stage.js'
export type {RunnerPlan, RunnerResult, RunnerStageOptions} from './runner-stage.js'
export {loadConfig, parseProjectFile, resolveConfig, configFileName, defaults} from './config-loader.js'
export {
  contractLabels,
  contractFromConfig,
  contractFromLabels,
  contractToLabels,
  entrypointPath,
  resolveInvocation,
  runtimeArgs
} from './contract.js'
export type {InvocationOverrides} from './contract.js'
export {renderMultiStageDockerfile, renderRunnerDockerfile} from './dockerfile.js'
export {auditEntries, auditImage, toolingPaths} from './image-audit.js'
export type {AuditReport, AuditTarget} from './image-audit.js'
export {deriveVersion, parseDescribe, versionTag, FALLBACK_VERSION} from './version.js'
export {StateManager} from './state.js'
export {ConsoleReporter, createLogger, stageRefs} from './reporter.js'
export type {
  Reporter,
  StageRef,
  BuildEvent,
  BuildStartEvent,
  StageStartingEvent,
  StageSkippedEvent,
  StageRetryingEvent,
  StageFinishedEvent,
  StageFailedEvent,
  StageWouldRunEvent,
  BuildFinishedEvent,
  BuildFailedEvent
} from './reporter.js'
export {dirSize, formatSize, formatDuration} from './utils.js'
