/**
 * Library exports for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {PackageRunner, DockerCliExecutor, ConsoleReporter} from 'scanpack'
 *
 * const runner = new PackageRunner(new DockerCliExecutor(), new ConsoleReporter(), '/tmp/scanpack')
 * const {image, version} = await runner.build('./my-tool')
 * ```
 */

export * from './engine/index.js'
export * from './core/index.js'
export {MediaScanner, yesterdayWindow} from './scanner/media-scanner.js'
export type {FolderStats, ScanStats, MediaScannerOptions} from './scanner/media-scanner.js'
export {TelegramNotifier} from './scanner/telegram-notifier.js'
export type {FetchLike, NotificationKind, TelegramNotifierOptions} from './scanner/telegram-notifier.js'
export {escapeHtml, formatScanReport, formatBuildFailed, formatBuildSucceeded} from './scanner/scan-report.js'
export {dailyCronPattern, runScanJob, scheduleDailyScan} from './scanner/scheduler.js'
export type {ScanJobOptions, ScanJobResult} from './scanner/scheduler.js'
export * from './errors.js'
export type * from './types.js'
export {stageIds, isStageId} from './types.js'
