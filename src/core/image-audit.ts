import type {ContainerExecutor} from '../engine/index.js'
import {ImageNotFoundError, ValidationError} from '../errors.js'
import {contractFromLabels} from './contract.js'

/** Build tooling that must never reach a runtime image, relative to `/`. */
export const toolingPaths = [
  'root/.local/bin/poetry',
  'root/.local/bin/pipx',
  'root/.local/share/pipx',
  'root/.local/share/pypoetry',
  'usr/bin/git',
  'usr/bin/gcc',
  'usr/bin/make'
]

export type AuditTarget = {
  workdir: string;
  executable: string;
}

export type AuditReport = {
  /** Offending entries, as listed in the image. */
  leaks: string[];
  entrypoint: string;
  entrypointFound: boolean;
  ok: boolean;
}

function stripSlashes(path: string): string {
  return path.replace(/^\/+/, '').replace(/\/+$/, '')
}

/**
 * Checks an image's file listing for repository metadata, build tooling and
 * the packaged entrypoint.
 */
export function auditEntries(entries: string[], {workdir, executable}: AuditTarget): AuditReport {
  const root = stripSlashes(workdir)
  const forbidden = [`${root}/.git`, ...toolingPaths]
  const entrypoint = `${root}/.venv/bin/${executable}`

  const leaks: string[] = []
  let entrypointFound = false

  for (const raw of entries) {
    const entry = stripSlashes(raw)
    if (entry === entrypoint) {
      entrypointFound = true
    }

    if (forbidden.some(path => entry === path || entry.startsWith(path + '/'))) {
      leaks.push(entry)
    }
  }

  return {
    leaks,
    entrypoint: `/${entrypoint}`,
    entrypointFound,
    ok: leaks.length === 0 && entrypointFound
  }
}

/**
 * Audits a local image. The workdir and executable come from the contract
 * labels unless given.
 */
export async function auditImage(executor: ContainerExecutor, image: string, overrides: Partial<AuditTarget> = {}): Promise<AuditReport> {
  const info = await executor.inspectImage(image)
  if (!info) {
    throw new ImageNotFoundError(image)
  }

  const target = overrides.workdir && overrides.executable
    ? {workdir: overrides.workdir, executable: overrides.executable}
    : targetFromEntrypoint(contractFromLabels(info.labels)?.entrypoint ?? info.entrypoint[0], overrides)

  return auditEntries(await executor.listImageFiles(image), target)
}

function targetFromEntrypoint(entrypoint: string | undefined, overrides: Partial<AuditTarget>): AuditTarget {
  const match = entrypoint ? /^(\/.*)\/\.venv\/bin\/([^/]+)$/.exec(entrypoint) : null
  if (!match) {
    throw new ValidationError('Cannot infer the workdir and executable from the image; pass them explicitly')
  }

  return {
    workdir: overrides.workdir ?? match[1],
    executable: overrides.executable ?? match[2]
  }
}
