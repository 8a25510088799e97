import type {Command} from 'commander'
import {ValidationError} from '../errors.js'
import {isStageId, type StageId} from '../types.js'

export type GlobalOptions = {
  workdir: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * `--force` alone forces every stage; `--force builder,runner` the listed ones.
 */
export function parseForce(value: string | boolean | undefined): true | StageId[] | undefined {
  if (value === true) {
    return true
  }

  if (typeof value !== 'string') {
    return undefined
  }

  const stages: StageId[] = []
  for (const name of value.split(',').map(s => s.trim()).filter(Boolean)) {
    if (!isStageId(name)) {
      throw new ValidationError(`Unknown stage "${name}" (expected builder or runner)`)
    }

    stages.push(name)
  }

  return stages
}
