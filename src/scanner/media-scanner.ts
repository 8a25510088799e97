import {readdir, rmdir, stat} from 'node:fs/promises'
import {join, relative, sep} from 'node:path'
import type {Logger} from 'pino'
import {InputDirectoryNotFoundError} from '../errors.js'
import type {ScannerConfig} from '../types.js'
import {createLogger} from '../core/reporter.js'

export type FolderStats = {
  count: number;
  subtitleCount: number;
  size: number;
  newYesterday: number;
}

export type ScanStats = {
  /** Video files. */
  total: number;
  subtitleCount: number;
  /** Bytes, videos and subtitles together. */
  totalSize: number;
  newYesterday: number;
  /** Keyed by path relative to the input directory, `.` for the root. */
  byFolder: Record<string, FolderStats>;
}

export type MediaScannerOptions = {
  logger?: Logger;
  /** Clock used for the "new yesterday" window. */
  now?: () => Date;
}

/**
 * Bounds of the local calendar day before `now`.
 */
export function yesterdayWindow(now: Date): {start: Date; end: Date} {
  const end = new Date(now.getFullYear(), now.getMonth(), now.getDate())
  const start = new Date(end.getFullYear(), end.getMonth(), end.getDate() - 1)
  return {start, end}
}

/**
 * Walks a media directory and reports video and subtitle statistics.
 * Symlinks are never followed.
 */
export class MediaScanner {
  private readonly logger: Logger
  private readonly now: () => Date
  private readonly ignoredPrefixes: string[]

  constructor(private readonly config: ScannerConfig, options: MediaScannerOptions = {}) {
    this.logger = options.logger ?? createLogger('scanner')
    this.now = options.now ?? (() => new Date())
    this.ignoredPrefixes = config.ignoredFolderPatterns
      .map(pattern => pattern.trim().replace(/^\^/, ''))
      .filter(pattern => pattern.length > 0)
  }

  get inputDirectory(): string {
    return this.config.inputDirectory
  }

  isIgnored(folderName: string): boolean {
    return this.ignoredPrefixes.some(prefix => folderName.startsWith(prefix))
  }

  async scan(): Promise<ScanStats> {
    await this.assertInputDirectory()

    const stats: ScanStats = {total: 0, subtitleCount: 0, totalSize: 0, newYesterday: 0, byFolder: {}}
    const window = yesterdayWindow(this.now())
    const videoExtensions = this.config.videoExtensions.map(ext => ext.toLowerCase())
    const subtitleExtensions = this.config.subtitleExtensions.map(ext => ext.toLowerCase())

    const visit = async (dir: string): Promise<void> => {
      let entries
      try {
        entries = await readdir(dir, {withFileTypes: true})
      } catch (error) {
        this.logger.warn({dir, err: error}, 'Cannot read folder')
        return
      }

      const videos: string[] = []
      const subtitles: string[] = []
      const subdirs: string[] = []

      for (const entry of entries) {
        if (entry.isDirectory()) {
          if (!this.isIgnored(entry.name)) {
            subdirs.push(entry.name)
          }
        } else if (entry.isFile()) {
          const name = entry.name.toLowerCase()
          if (videoExtensions.some(ext => name.endsWith(ext))) {
            videos.push(entry.name)
          } else if (subtitleExtensions.some(ext => name.endsWith(ext))) {
            subtitles.push(entry.name)
          }
        }
      }

      if (videos.length > 0 || subtitles.length > 0) {
        const folder: FolderStats = {count: videos.length, subtitleCount: subtitles.length, size: 0, newYesterday: 0}

        for (const name of [...videos, ...subtitles]) {
          const filePath = join(dir, name)
          try {
            const info = await stat(filePath)
            folder.size += info.size
            if (info.mtime >= window.start && info.mtime < window.end) {
              folder.newYesterday++
            }
          } catch (error) {
            this.logger.warn({file: filePath, err: error}, 'Cannot stat file')
          }
        }

        stats.byFolder[this.folderKey(dir)] = folder
        stats.total += folder.count
        stats.subtitleCount += folder.subtitleCount
        stats.totalSize += folder.size
        stats.newYesterday += folder.newYesterday
      }

      for (const name of subdirs.sort()) {
        await visit(join(dir, name))
      }
    }

    await visit(this.config.inputDirectory)
    return stats
  }

  /**
   * Removes folders left empty, deepest first. The input directory and
   * ignored folders are never touched.
   * @returns Number of folders removed
   */
  async pruneEmptyFolders(): Promise<number> {
    await this.assertInputDirectory()

    const prune = async (dir: string, isRoot: boolean): Promise<number> => {
      let removed = 0
      const entries = await readdir(dir, {withFileTypes: true})
      for (const entry of entries) {
        if (entry.isDirectory() && !this.isIgnored(entry.name)) {
          removed += await prune(join(dir, entry.name), false)
        }
      }

      if (!isRoot && (await readdir(dir)).length === 0) {
        await rmdir(dir)
        this.logger.info({dir}, 'Removed empty folder')
        removed++
      }

      return removed
    }

    return prune(this.config.inputDirectory, true)
  }

  private folderKey(dir: string): string {
    const rel = relative(this.config.inputDirectory, dir)
    return rel === '' ? '.' : rel.split(sep).join('/')
  }

  private async assertInputDirectory(): Promise<void> {
    try {
      const info = await stat(this.config.inputDirectory)
      if (info.isDirectory()) {
        return
      }
    } catch (error) {
      throw new InputDirectoryNotFoundError(this.config.inputDirectory, {cause: error})
    }

    throw new InputDirectoryNotFoundError(this.config.inputDirectory)
  }
}
