import type {PackagingConfig} from '../types.js'
import {entrypointPath} from './contract.js'

/**
 * Quotes a word for `sh`. Words made only of safe characters pass through.
 */
export function shellQuote(word: string): string {
  if (/^[\w./:=@%+-]+$/.test(word)) {
    return word
  }

  return `'${word.replaceAll('\'', String.raw`'\''`)}'`
}

/**
 * Tool bootstrap for the builder: system packages, pipx, poetry, its plugins
 * and the in-project virtualenv setting. Needs network access.
 */
export function bootstrapCommands(config: Pick<PackagingConfig, 'builder'>): string[] {
  const commands: string[] = []
  const {systemPackages, plugins} = config.builder

  if (systemPackages.length > 0) {
    commands.push(`apt-get update && apt-get install -y --no-install-recommends ${systemPackages.map(p => shellQuote(p)).join(' ')} && rm -rf /var/lib/apt/lists/*`)
  }

  commands.push('pip install --no-cache-dir pipx', 'pipx ensurepath', 'pipx install poetry')

  for (const plugin of plugins) {
    commands.push(`poetry self add ${shellQuote(plugin)}`)
  }

  commands.push('poetry config virtualenvs.in-project true')
  return commands
}

/**
 * Resolution of the locked closure into `<workdir>/.venv`, then the purge of
 * repository metadata. Runs inside the workdir.
 */
export function resolveCommands(config: Pick<PackagingConfig, 'workdir'>): string[] {
  return [
    'poetry install --no-interaction',
    `rm -rf ${shellQuote(`${config.workdir}/.git`)}`
  ]
}

/**
 * Dockerfile of the runner stage. It is built over the hand-off directory
 * alone, so `COPY .` brings in the resolved environment and nothing else.
 */
export function renderRunnerDockerfile(config: PackagingConfig): string {
  const lines = [
    `FROM ${config.baseImage}`,
    `WORKDIR ${config.workdir}`,
    `COPY . ${config.workdir}/`,
    `ENTRYPOINT ${JSON.stringify([entrypointPath(config)])}`,
    `CMD ${JSON.stringify([config.inputFlag, config.mountPath])}`
  ]

  return lines.join('\n') + '\n'
}

/**
 * Single-file equivalent of the two stages, for a plain `docker build`
 * run from the project root.
 */
export function renderMultiStageDockerfile(config: PackagingConfig): string {
  const {workdir} = config
  const resolve = resolveCommands(config)

  const lines = [
    `FROM ${config.baseImage} AS builder`,
    '',
    `WORKDIR ${workdir}`,
    '',
    'ENV PATH=/root/.local/bin:$PATH',
    `RUN ${bootstrapCommands(config).join(' && \\\n    ')}`,
    '',
    'COPY . .',
    '',
    `RUN ${resolve.join(' && \\\n    ')}`,
    '',
    '',
    `FROM ${config.baseImage} AS runner`,
    '',
    `WORKDIR ${workdir}`,
    '',
    `COPY --from=builder ${workdir}/ ${workdir}/`,
    '',
    `ENTRYPOINT ${JSON.stringify([entrypointPath(config)])}`,
    `CMD ${JSON.stringify([config.inputFlag, config.mountPath])}`
  ]

  return lines.join('\n') + '\n'
}
