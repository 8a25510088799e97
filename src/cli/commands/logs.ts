import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {Workspace} from '../../engine/workspace.js'
import {StateManager} from '../../core/state.js'
import {isStageId} from '../../types.js'
import {getGlobalOptions} from '../utils.js'

async function readLog(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8')
  } catch {
    return undefined
  }
}

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show logs from the last run of a stage')
    .argument('<workspace>', 'Workspace name')
    .argument('<stage>', 'builder or runner')
    .option('-s, --stream <stream>', 'Show only stdout or stderr', 'both')
    .action(async (workspaceName: string, stageId: string, options: {stream: string}, cmd: Command) => {
      const {workdir} = getGlobalOptions(cmd)
      if (!isStageId(stageId)) {
        console.error(chalk.red(`Unknown stage: ${stageId} (expected builder or runner)`))
        process.exitCode = 1
        return
      }

      const workspace = await Workspace.open(resolve(workdir), workspaceName)
      const state = new StateManager(workspace.root)
      await state.load()

      const stageState = state.getStage(stageId)
      if (!stageState) {
        console.error(chalk.red(`No run found for stage: ${stageId}`))
        process.exitCode = 1
        return
      }

      const runDir = workspace.runPath(stageState.runId)

      if (options.stream === 'both' || options.stream === 'stdout') {
        const stdout = await readLog(join(runDir, 'stdout.log'))
        if (stdout) {
          process.stdout.write(stdout)
        }
      }

      if (options.stream === 'both' || options.stream === 'stderr') {
        const stderr = await readLog(join(runDir, 'stderr.log'))
        if (stderr) {
          if (options.stream === 'both') {
            console.error(chalk.red('── stderr ──'))
          }

          process.stderr.write(stderr)
        }
      }
    })
}
