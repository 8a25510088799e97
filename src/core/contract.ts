import process from 'node:process'
import {isAbsolute, resolve} from 'node:path'
import {ValidationError} from '../errors.js'
import type {InvocationContract, InvocationRecord, PackagingConfig} from '../types.js'

export const contractLabels = {
  entrypoint: 'io.scanpack.entrypoint',
  defaultArgs: 'io.scanpack.default-args',
  mountPath: 'io.scanpack.mount-path',
  lockFingerprint: 'io.scanpack.lock-fingerprint',
  version: 'org.opencontainers.image.version',
  title: 'org.opencontainers.image.title'
} as const

/** Path of the packaged executable inside the resolved environment. */
export function entrypointPath(config: Pick<PackagingConfig, 'workdir' | 'executable'>): string {
  return `${config.workdir}/.venv/bin/${config.executable}`
}

/** Entrypoint path relative to the workdir, as it appears in the hand-off directory. */
export function entrypointRelativePath(config: Pick<PackagingConfig, 'executable'>): string {
  return `.venv/bin/${config.executable}`
}

export function contractFromConfig(config: PackagingConfig): InvocationContract {
  return {
    entrypoint: entrypointPath(config),
    defaultArgs: [config.inputFlag, config.mountPath],
    mountPath: config.mountPath
  }
}

/**
 * Labels stamped on the runtime image so a later invocation can honour
 * the contract without the project file.
 */
export function contractToLabels(contract: InvocationContract): Record<string, string> {
  return {
    [contractLabels.entrypoint]: contract.entrypoint,
    [contractLabels.defaultArgs]: JSON.stringify(contract.defaultArgs),
    [contractLabels.mountPath]: contract.mountPath
  }
}

/**
 * Reads the contract back from image labels.
 * @returns The contract, or undefined when the image was not built by scanpack
 */
export function contractFromLabels(labels: Record<string, string>): InvocationContract | undefined {
  const entrypoint = labels[contractLabels.entrypoint]
  const defaultArgsJson = labels[contractLabels.defaultArgs]
  const mountPath = labels[contractLabels.mountPath]
  if (!entrypoint || !defaultArgsJson || !mountPath) {
    return undefined
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(defaultArgsJson)
  } catch (error) {
    throw new ValidationError(`Label ${contractLabels.defaultArgs} is not valid JSON`, {cause: error})
  }

  if (!Array.isArray(parsed) || !parsed.every((arg): arg is string => typeof arg === 'string')) {
    throw new ValidationError(`Label ${contractLabels.defaultArgs} must be a JSON array of strings`)
  }

  return {entrypoint, defaultArgs: parsed, mountPath}
}

export type InvocationOverrides = {
  /** Caller arguments. Empty or absent: the defaults apply. */
  args?: string[];
  /** Put the caller arguments after the defaults instead of replacing them. */
  append?: boolean;
  /** Replaces the contract's entrypoint. */
  entrypoint?: string;
  /** Host directory bound at the contract mount path. */
  mountDir?: string;
}

/**
 * Resolves the effective invocation of one container start, following
 * container semantics: caller arguments replace the default arguments,
 * or follow them with `append`.
 *
 * @param cwd - Base for a relative mount directory
 */
export function resolveInvocation(contract: InvocationContract, overrides: InvocationOverrides = {}, cwd: string = process.cwd()): InvocationRecord {
  const callerArgs = overrides.args ?? []
  const entrypointOverridden = overrides.entrypoint !== undefined && overrides.entrypoint !== contract.entrypoint
  // A replaced entrypoint drops the image's default arguments
  const usesDefaultArgs = callerArgs.length === 0 && !entrypointOverridden

  let args: string[]
  if (usesDefaultArgs) {
    args = [...contract.defaultArgs]
  } else if (overrides.append && !entrypointOverridden) {
    args = [...contract.defaultArgs, ...callerArgs]
  } else {
    args = [...callerArgs]
  }

  const record: InvocationRecord = {
    entrypoint: overrides.entrypoint ?? contract.entrypoint,
    args,
    usesDefaultArgs,
    entrypointOverridden
  }

  if (overrides.mountDir !== undefined) {
    record.mount = {
      hostPath: isAbsolute(overrides.mountDir) ? overrides.mountDir : resolve(cwd, overrides.mountDir),
      containerPath: contract.mountPath
    }
  }

  return record
}

/**
 * Arguments to hand to the container runtime for an invocation record.
 * When the defaults apply nothing is passed, so the image's own CMD stays
 * authoritative.
 */
export function runtimeArgs(record: InvocationRecord): string[] {
  return record.usesDefaultArgs ? [] : record.args
}
