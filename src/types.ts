// ---------------------------------------------------------------------------
// Shared packaging domain types.
//
// Used by the stages, the orchestrator, the CLI and the scanner. The project
// file (.scanpack.yml) is parsed into a ProjectDefinition, then resolved with
// defaults into a PackagingConfig.
// ---------------------------------------------------------------------------

// -- Project definition (as written in .scanpack.yml) -----------------------

export type BuilderDefinition = {
  plugins?: string[];
  systemPackages?: string[];
  lockFiles?: string[];
  timeoutSec?: number;
  retries?: number;
  retryDelayMs?: number;
}

export type ScannerDefinition = {
  inputDirectory?: string;
  videoExtensions?: string[];
  subtitleExtensions?: string[];
  ignoredFolderPatterns?: string[];
  /** Daily run time, `HH:MM`. */
  runTime?: string;
  deleteEmptyFolders?: boolean;
}

export type TelegramDefinition = {
  enabled?: boolean;
  token?: string;
  chatId?: string;
  level?: NotificationLevel;
}

/** A project file as written, before defaults are applied. */
export type ProjectDefinition = {
  name?: string;
  executable?: string;
  baseImage?: string;
  workdir?: string;
  mountPath?: string;
  inputFlag?: string;
  tag?: string;
  builder?: BuilderDefinition;
  scanner?: ScannerDefinition;
  notify?: {telegram?: TelegramDefinition};
}

// -- Resolved configuration --------------------------------------------------

/** Which notifications get sent: everything, only successes, or only errors. */
export type NotificationLevel = 'all' | 'success' | 'error'

export type BuilderConfig = {
  /** Dependency-tool plugins installed before resolution (e.g. dynamic versioning). */
  plugins: string[];
  /** Distribution packages the builder needs (e.g. git). */
  systemPackages: string[];
  /** Files (relative to the project root) that define the lock specification. */
  lockFiles: string[];
  timeoutSec?: number;
  retries: number;
  retryDelayMs: number;
}

export type ScannerConfig = {
  inputDirectory: string;
  videoExtensions: string[];
  subtitleExtensions: string[];
  ignoredFolderPatterns: string[];
  runTime: string;
  deleteEmptyFolders: boolean;
}

export type TelegramConfig = {
  enabled: boolean;
  token?: string;
  chatId?: string;
  level: NotificationLevel;
}

/**
 * Fully resolved project configuration.
 * Every optional field of the project file has been filled with its default.
 */
export type PackagingConfig = {
  name: string;
  /** Entrypoint binary name inside `<workdir>/.venv/bin/`. */
  executable: string;
  /** Base image shared by both stages, pinned to an explicit tag. */
  baseImage: string;
  /** Absolute working path in both stages. */
  workdir: string;
  /** Conventional absolute mount path for the caller's input directory. */
  mountPath: string;
  inputFlag: string;
  /** Image reference produced by the runner stage. */
  tag: string;
  builder: BuilderConfig;
  scanner: ScannerConfig;
  telegram: TelegramConfig;
}

// -- Invocation contract -----------------------------------------------------

/**
 * What a runtime image promises its caller: a fixed entrypoint,
 * default arguments, and the conventional mount path.
 */
export type InvocationContract = {
  entrypoint: string;
  defaultArgs: string[];
  mountPath: string;
}

/** Effective invocation for one container start. Never persisted. */
export type InvocationRecord = {
  entrypoint: string;
  args: string[];
  /** True when the caller supplied no arguments and the image defaults apply. */
  usesDefaultArgs: boolean;
  /** True when the caller replaced the contract's entrypoint. */
  entrypointOverridden: boolean;
  mount?: {hostPath: string; containerPath: string};
}

/** Stage identifiers, in execution order. */
export type StageId = 'builder' | 'runner'

export const stageIds: readonly StageId[] = ['builder', 'runner']

export function isStageId(value: string): value is StageId {
  return value === 'builder' || value === 'runner'
}
