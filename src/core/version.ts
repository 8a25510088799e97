import {execa} from 'execa'

/** Version used when the checkout has no repository or no release tag. */
export const FALLBACK_VERSION = '0.0.0'

/**
 * Turns `git describe --tags --long --dirty` output into a PEP 440 version, the way
 * dynamic versioning derives it from repository history:
 *
 * - `v1.2.3-0-gabc1234` → `1.2.3`
 * - `v1.2.3-4-gabc1234` → `1.2.3.post4.dev0+abc1234`
 * - `v1.2.3-0-gabc1234-dirty` → `1.2.3+dirty`
 *
 * @returns The version, or undefined when the output is not a release tag description
 */
export function parseDescribe(output: string): string | undefined {
  const match = /^v?(\d+(?:\.\d+)*(?:[-.]?(?:a|b|rc)\d+)?)-(\d+)-g([\da-f]+)(-dirty)?$/.exec(output.trim())
  if (!match) {
    return undefined
  }

  const [, base, distanceText, commit, dirty] = match
  const distance = Number(distanceText)
  const local: string[] = []
  let version = base

  if (distance > 0) {
    version += `.post${distance}.dev0`
    local.push(commit)
  }

  if (dirty) {
    local.push('dirty')
  }

  return local.length > 0 ? `${version}+${local.join('.')}` : version
}

/**
 * Derives the application version from the source checkout's history.
 * Falls back to {@link FALLBACK_VERSION} when git, the repository or a
 * release tag is missing.
 */
export async function deriveVersion(projectDir: string): Promise<string> {
  const result = await execa('git', ['describe', '--tags', '--long', '--dirty', '--match', 'v*'], {
    cwd: projectDir,
    reject: false
  })

  if (result.exitCode !== 0) {
    return FALLBACK_VERSION
  }

  return parseDescribe(result.stdout) ?? FALLBACK_VERSION
}

/**
 * Image tags cannot carry `+`; local version segments are joined with `-`.
 */
export function versionTag(version: string): string {
  return version.replaceAll('+', '-')
}
