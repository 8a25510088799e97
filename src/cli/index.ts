#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {ScanpackError} from '../errors.js'
import {registerAuditCommand} from './commands/audit.js'
import {registerBuildCommand} from './commands/build.js'
import {registerCleanCommand} from './commands/clean.js'
import {registerDockerfileCommand} from './commands/dockerfile.js'
import {registerListCommand} from './commands/list.js'
import {registerLogsCommand} from './commands/logs.js'
import {registerRmCommand} from './commands/rm.js'
import {registerRunCommand} from './commands/run.js'
import {registerScanCommand} from './commands/scan.js'

async function main() {
  const program = new Command()

  program
    .name('scanpack')
    .description('Package a media-metadata batch tool into a runtime image and run it')
    .version('0.1.0')
    .option('--workdir <path>', 'Workspaces root directory', process.env.SCANPACK_WORKDIR ?? './.scanpack')
    .option('--json', 'Output structured JSON logs')
    .enablePositionalOptions()

  registerBuildCommand(program)
  registerDockerfileCommand(program)
  registerRunCommand(program)
  registerAuditCommand(program)
  registerScanCommand(program)
  registerListCommand(program)
  registerLogsCommand(program)
  registerRmCommand(program)
  registerCleanCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof ScanpackError) {
    console.error(chalk.red(`${error.code}: ${error.message}`))
  } else {
    console.error('Fatal error:', error)
  }

  process.exitCode = 1
}
