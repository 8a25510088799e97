import process from 'node:process'
import type {Command} from 'commander'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import type {ContainerExecutor, OnLogLine} from '../../engine/executor.js'
import type {ImageInfo} from '../../engine/types.js'
import {defaults} from '../../core/config-loader.js'
import {contractFromLabels, resolveInvocation, runtimeArgs} from '../../core/contract.js'
import {pathExists} from '../../core/utils.js'
import {ImageNotFoundError, InputDirectoryNotFoundError} from '../../errors.js'
import type {InvocationContract} from '../../types.js'

/**
 * Contract of an image: its scanpack labels, or its own configuration for
 * images built elsewhere.
 */
export function imageContract(info: ImageInfo): InvocationContract {
  return contractFromLabels(info.labels) ?? {
    entrypoint: info.entrypoint.join(' '),
    defaultArgs: info.cmd,
    mountPath: defaults.mountPath
  }
}

export type RunOptions = {
  mount?: string;
  entrypoint?: string;
  append?: boolean;
}

/**
 * Starts `image` under its contract.
 * @returns The application's exit code, untranslated
 */
export async function runUnderContract(
  executor: ContainerExecutor,
  image: string,
  args: string[],
  options: RunOptions,
  onLogLine: OnLogLine
): Promise<number> {
  const info = await executor.inspectImage(image)
  if (!info) {
    throw new ImageNotFoundError(image)
  }

  const record = resolveInvocation(imageContract(info), {
    args,
    append: options.append,
    entrypoint: options.entrypoint,
    mountDir: options.mount
  })

  if (record.mount && !await pathExists(record.mount.hostPath)) {
    throw new InputDirectoryNotFoundError(record.mount.hostPath)
  }

  const result = await executor.runImage({
    name: `scanpack-run-${Date.now()}`,
    image,
    args: runtimeArgs(record),
    entrypoint: record.entrypointOverridden ? record.entrypoint : undefined,
    mounts: record.mount ? [{...record.mount, readOnly: false}] : undefined
  }, onLogLine)

  return result.exitCode
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Start a runtime image under its invocation contract')
    .argument('<image>', 'Image reference')
    .argument('[args...]', 'Arguments replacing the default ones')
    .option('-m, --mount <dir>', 'Host directory bound at the contract mount path')
    .option('--entrypoint <path>', 'Replace the entrypoint')
    .option('--append', 'Pass the arguments after the default ones')
    .passThroughOptions()
    .action(async (image: string, args: string[], options: RunOptions) => {
      const executor = new DockerCliExecutor()
      await executor.check()

      const onSignal = (signal: NodeJS.Signals) => {
        void (async () => {
          await executor.killRunningContainers()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        process.exitCode = await runUnderContract(executor, image, args, options, ({stream, line}) => {
          if (stream === 'stdout') {
            process.stdout.write(line + '\n')
          } else {
            process.stderr.write(line + '\n')
          }
        })
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
