import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {loadConfig} from '../../core/config-loader.js'
import {renderMultiStageDockerfile, renderRunnerDockerfile} from '../../core/dockerfile.js'

export function registerDockerfileCommand(program: Command): void {
  program
    .command('dockerfile')
    .description('Print the equivalent multi-stage Dockerfile')
    .argument('[project]', 'Source checkout (default: current directory)')
    .option('--runner-only', 'Print only the runner stage, as built over the hand-off directory')
    .action(async (projectArg: string | undefined, options: {runnerOnly?: boolean}) => {
      const config = await loadConfig(resolve(projectArg ?? process.cwd()))
      process.stdout.write(options.runnerOnly ? renderRunnerDockerfile(config) : renderMultiStageDockerfile(config))
    })
}
