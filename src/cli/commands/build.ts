import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {loadConfig} from '../../core/config-loader.js'
import {PackageRunner} from '../../core/package-runner.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {formatBuildFailed, formatBuildSucceeded} from '../../scanner/scan-report.js'
import {TelegramNotifier} from '../../scanner/telegram-notifier.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {getGlobalOptions, parseForce} from '../utils.js'

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Resolve dependencies, then package the runtime image')
    .argument('[project]', 'Source checkout (default: current directory)')
    .option('-w, --workspace <name>', 'Workspace name (default: project name)')
    .option('-f, --force [stages]', 'Skip cache for all stages, or a comma-separated list (builder,runner)')
    .option('-t, --tag <image>', 'Image reference to write (default: from .scanpack.yml)')
    .option('--dry-run', 'Show which stages would run without executing')
    .option('--verbose', 'Stream container logs in real-time (interactive mode)')
    .action(async (projectArg: string | undefined, options: {workspace?: string; force?: string | boolean; tag?: string; dryRun?: boolean; verbose?: boolean}, cmd: Command) => {
      const {workdir, json} = getGlobalOptions(cmd)
      const projectDir = resolve(projectArg ?? process.cwd())
      const config = await loadConfig(projectDir)
      const executor = new DockerCliExecutor()
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const runner = new PackageRunner(executor, reporter, resolve(workdir))
      const notifier = new TelegramNotifier(config.telegram)

      const onSignal = (signal: NodeJS.Signals) => {
        void (async () => {
          await executor.killRunningContainers()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      const startedAt = Date.now()
      try {
        const result = await runner.build(projectDir, {
          workspace: options.workspace,
          force: parseForce(options.force),
          dryRun: options.dryRun,
          tag: options.tag
        })

        if (json) {
          console.log(JSON.stringify(result))
        }

        if (!options.dryRun) {
          await notifier.send(formatBuildSucceeded(result.image, result.version, Date.now() - startedAt), 'success')
        }
      } catch (error: unknown) {
        if (!options.dryRun) {
          await notifier.send(formatBuildFailed(config.name, error instanceof Error ? error.message : String(error)), 'error')
        }

        throw error
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
