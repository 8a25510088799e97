import {createHash} from 'node:crypto'
import {cp, readdir, readFile, readlink} from 'node:fs/promises'
import {join, relative, resolve, sep} from 'node:path'
import ignore from 'ignore'
import {ArtifactNotFoundError} from '../errors.js'

/**
 * Never part of a build context. `.git` stays in: the builder derives the
 * application version from repository history and purges it afterwards.
 */
export const DEFAULT_IGNORES = [
  'node_modules',
  '.venv',
  '__pycache__',
  '*.pyc',
  '.DS_Store',
  '.env',
  '.scanpack'
]

/**
 * Builds the predicate used to filter the source checkout.
 * Combines the defaults, the project's `.dockerignore` and any extra patterns
 * (e.g. the scanpack workdir when it lives inside the project).
 */
export async function buildIgnoreFilter(projectDir: string, extraPatterns: string[] = []): Promise<(path: string) => boolean> {
  const ig = ignore().add(DEFAULT_IGNORES).add(extraPatterns)

  try {
    const dockerignore = await readFile(resolve(projectDir, '.dockerignore'), 'utf8')
    ig.add(dockerignore)
  } catch {
    // No .dockerignore
  }

  return (path: string) => {
    if (path === '') {
      return false
    }

    // Test both variants to handle directory-only patterns (e.g. "dist/")
    // which only match when the path has a trailing slash.
    return ig.ignores(path) || ig.ignores(path + '/')
  }
}

/**
 * Copies the source checkout into `targetDir`, skipping ignored paths.
 * Ignore rules see POSIX-style paths relative to the project root.
 */
export async function prepareSourceContext(projectDir: string, targetDir: string, extraPatterns: string[] = []): Promise<void> {
  const root = resolve(projectDir)
  const shouldIgnore = await buildIgnoreFilter(root, extraPatterns)

  await cp(root, targetDir, {
    recursive: true,
    verbatimSymlinks: true,
    filter(source) {
      const rel = relative(root, source).split(sep).join('/')
      return !shouldIgnore(rel)
    }
  })
}

/**
 * Digest of the lock specification: each file's name and content, in the
 * configured order. Every lock file must exist; the builder cannot produce a
 * reproducible closure without them.
 */
export async function lockDigest(projectDir: string, lockFiles: string[]): Promise<Record<string, string>> {
  const digests: Record<string, string> = {}
  for (const file of lockFiles) {
    let content: Buffer
    try {
      content = await readFile(join(projectDir, file))
    } catch (error) {
      throw new ArtifactNotFoundError(`Lock file not found: ${file}`, {cause: error})
    }

    digests[file] = createHash('sha256').update(content).digest('hex')
  }

  return digests
}

/**
 * Content digest of the source checkout as the builder sees it, minus `.git`.
 * Paths are visited in sorted order; symlinks contribute their target.
 */
export async function sourceDigest(projectDir: string, extraPatterns: string[] = []): Promise<string> {
  const root = resolve(projectDir)
  const shouldIgnore = await buildIgnoreFilter(root, [...extraPatterns, '.git'])
  const hash = createHash('sha256')

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, {withFileTypes: true})
    entries.sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)))

    for (const entry of entries) {
      const fullPath = join(dir, entry.name)
      const rel = relative(root, fullPath).split(sep).join('/')
      if (shouldIgnore(rel)) {
        continue
      }

      if (entry.isDirectory()) {
        hash.update(`d:${rel}\0`)
        await walk(fullPath)
      } else if (entry.isSymbolicLink()) {
        hash.update(`l:${rel}\0${await readlink(fullPath)}\0`)
      } else if (entry.isFile()) {
        hash.update(`f:${rel}\0`)
        hash.update(await readFile(fullPath))
        hash.update('\0')
      }
    }
  }

  await walk(root)
  return hash.digest('hex')
}
