import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {Workspace} from '../../engine/workspace.js'
import {StateManager} from '../../core/state.js'
import {getGlobalOptions} from '../utils.js'

async function pruneStaleRuns(workdirRoot: string, names: string[]): Promise<number> {
  let removed = 0
  for (const name of names) {
    const workspace = await Workspace.open(workdirRoot, name)
    const state = new StateManager(workspace.root)
    await state.load()
    await workspace.cleanupStaging()
    removed += await workspace.pruneRuns(state.activeRunIds())
  }

  return removed
}

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove all workspaces')
    .option('--runs', 'Keep workspaces, remove only runs no stage points at')
    .action(async (options: {runs?: boolean}, cmd: Command) => {
      const {workdir} = getGlobalOptions(cmd)
      const workdirRoot = resolve(workdir)
      const names = await Workspace.list(workdirRoot)

      if (names.length === 0) {
        console.log(chalk.gray('No workspaces to clean.'))
        return
      }

      if (options.runs) {
        const removed = await pruneStaleRuns(workdirRoot, names)
        console.log(chalk.green(`Removed ${removed} stale run${removed === 1 ? '' : 's'}.`))
        return
      }

      for (const name of names) {
        await Workspace.remove(workdirRoot, name)
      }

      console.log(chalk.green(`Removed ${names.length} workspace${names.length > 1 ? 's' : ''}.`))
    })
}
