import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadConfig} from '../../core/config-loader.js'
import {formatSize} from '../../core/utils.js'
import {runScanJob, scheduleDailyScan} from '../../scanner/scheduler.js'
import type {ScanStats} from '../../scanner/media-scanner.js'
import {TelegramNotifier} from '../../scanner/telegram-notifier.js'
import {getGlobalOptions} from '../utils.js'

function printStats(stats: ScanStats, directory: string): void {
  console.log(chalk.bold(`\n${directory}`))
  console.log(`  Videos:        ${stats.total}`)
  console.log(`  Subtitles:     ${stats.subtitleCount}`)
  console.log(`  Total size:    ${formatSize(stats.totalSize)}`)
  console.log(`  New yesterday: ${stats.newYesterday}`)

  const folders = Object.keys(stats.byFolder).sort()
  if (folders.length > 0) {
    const width = Math.max('FOLDER'.length, ...folders.map(f => f.length))
    console.log(chalk.bold(`\n  ${'FOLDER'.padEnd(width)}  VIDEOS  SUBS      SIZE`))
    for (const folder of folders) {
      const row = stats.byFolder[folder]
      console.log(`  ${folder.padEnd(width)}  ${String(row.count).padStart(6)}  ${String(row.subtitleCount).padStart(4)}  ${formatSize(row.size).padStart(8)}`)
    }
  }

  console.log()
}

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Report video and subtitle statistics for a media directory')
    .argument('[dir]', 'Directory to scan (default: scanner.inputDirectory)')
    .option('--once', 'Scan once and exit instead of scheduling a daily scan')
    .option('--project <dir>', 'Directory holding .scanpack.yml (default: current directory)')
    .action(async (dirArg: string | undefined, options: {once?: boolean; project?: string}, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const config = await loadConfig(resolve(options.project ?? process.cwd()))
      const scanner = dirArg ? {...config.scanner, inputDirectory: resolve(dirArg)} : config.scanner
      const notifier = new TelegramNotifier(config.telegram)

      const report = (stats: ScanStats) => {
        if (json) {
          console.log(JSON.stringify(stats))
        } else {
          printStats(stats, scanner.inputDirectory)
        }
      }

      if (options.once) {
        const {stats} = await runScanJob(scanner, {notifier})
        report(stats)
        return
      }

      const {stats} = await runScanJob(scanner, {notifier, prune: scanner.deleteEmptyFolders})
      report(stats)

      const job = scheduleDailyScan(scanner, {notifier})
      const stop = () => {
        job.stop()
      }

      process.once('SIGINT', stop)
      process.once('SIGTERM', stop)
    })
}
