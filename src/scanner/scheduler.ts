import process from 'node:process'
import {Cron} from 'croner'
import type {Logger} from 'pino'
import {ValidationError} from '../errors.js'
import {createLogger} from '../core/reporter.js'
import type {ScannerConfig} from '../types.js'
import {MediaScanner, type ScanStats} from './media-scanner.js'
import {formatScanReport} from './scan-report.js'
import type {TelegramNotifier} from './telegram-notifier.js'

/** `HH:MM` to a cron pattern firing once a day. */
export function dailyCronPattern(runTime: string): string {
  const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(runTime)
  if (!match) {
    throw new ValidationError(`Invalid run time "${runTime}", expected HH:MM`)
  }

  return `${Number(match[2])} ${Number(match[1])} * * *`
}

export type ScanJobOptions = {
  notifier?: TelegramNotifier;
  logger?: Logger;
  now?: () => Date;
  /** Prune empty folders after the scan. */
  prune?: boolean;
}

export type ScanJobResult = {
  stats: ScanStats;
  report: string;
  notified: boolean;
  pruned?: number;
}

/**
 * One scan: walk, report, notify, then optionally prune.
 */
export async function runScanJob(config: ScannerConfig, options: ScanJobOptions = {}): Promise<ScanJobResult> {
  const logger = options.logger ?? createLogger('scanner')
  const now = options.now ?? (() => new Date())
  const scanner = new MediaScanner(config, {logger, now})

  logger.info({directory: config.inputDirectory}, 'Scan started')
  const startedAt = Date.now()
  const stats = await scanner.scan()
  const report = formatScanReport(stats, {
    directory: config.inputDirectory,
    scannedAt: now(),
    durationMs: Date.now() - startedAt,
    rssBytes: process.memoryUsage().rss
  })
  logger.info({total: stats.total, subtitles: stats.subtitleCount, size: stats.totalSize, newYesterday: stats.newYesterday}, 'Scan finished')

  const notified = options.notifier ? await options.notifier.send(report, 'success') : false

  const result: ScanJobResult = {stats, report, notified}
  if (options.prune) {
    result.pruned = await scanner.pruneEmptyFolders()
    logger.info({removed: result.pruned}, 'Empty folders pruned')
  }

  return result
}

/**
 * Runs the scan job every day at `config.runTime`. Overlapping ticks are
 * skipped while a scan is still running.
 */
export function scheduleDailyScan(config: ScannerConfig, options: ScanJobOptions = {}): Cron {
  const logger = options.logger ?? createLogger('scanner')
  const job = new Cron(dailyCronPattern(config.runTime), {
    name: 'media-scan',
    protect: true,
    catch(error: unknown) {
      logger.error({err: error}, 'Scheduled scan failed')
    }
  }, async () => {
    await runScanJob(config, {...options, logger, prune: options.prune ?? config.deleteEmptyFolders})
  })

  logger.info({runTime: config.runTime, next: job.nextRun()?.toISOString()}, 'Daily scan scheduled')
  return job
}
