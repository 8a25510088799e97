import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {auditImage} from '../../core/image-audit.js'
import {getGlobalOptions} from '../utils.js'

export function registerAuditCommand(program: Command): void {
  program
    .command('audit')
    .description('Check an image for leaked build tooling and a reachable entrypoint')
    .argument('<image>', 'Image reference')
    .option('--workdir-path <path>', 'Working path inside the image (default: from labels)')
    .option('--executable <name>', 'Entrypoint binary name (default: from labels)')
    .action(async (image: string, options: {workdirPath?: string; executable?: string}, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const executor = new DockerCliExecutor()
      await executor.check()

      const report = await auditImage(executor, image, {workdir: options.workdirPath, executable: options.executable})
      if (!report.ok) {
        process.exitCode = 1
      }

      if (json) {
        console.log(JSON.stringify(report))
        return
      }

      console.log(report.entrypointFound
        ? `${chalk.green('✓')} entrypoint ${report.entrypoint}`
        : `${chalk.red('✗')} entrypoint ${report.entrypoint} missing`)

      if (report.leaks.length === 0) {
        console.log(`${chalk.green('✓')} no build tooling or repository metadata`)
        return
      }

      console.log(`${chalk.red('✗')} ${report.leaks.length} leaked path${report.leaks.length > 1 ? 's' : ''}:`)
      for (const path of report.leaks) {
        console.log(chalk.red(`  /${path}`))
      }
    })
}
