import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {RunContainerResult} from '../engine/types.js'
import type {BuildEvent, Reporter, StageFailedEvent, StageFinishedEvent, StageRef} from '../core/reporter.js'
import {formatDuration, formatSize} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly stageSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        console.log(chalk.bold(`\n▶ Build: ${chalk.cyan(event.projectName)} ${chalk.gray(event.version)}\n`))
        break
      }

      case 'STAGE_STARTING': {
        const spinner = ora({text: event.stage.displayName, prefixText: '  '}).start()
        this.stageSpinners.set(event.stage.id, spinner)
        break
      }

      case 'STAGE_SKIPPED': {
        this.persist(event.stage, chalk.gray('⊙'), chalk.gray(`${event.stage.displayName} (cached)`))
        break
      }

      case 'STAGE_RETRYING': {
        const spinner = this.stageSpinners.get(event.stage.id)
        if (spinner) {
          spinner.text = `${event.stage.displayName} (retry ${event.attempt}/${event.maxRetries})`
        }

        break
      }

      case 'STAGE_FINISHED': {
        this.handleStageFinished(event)
        break
      }

      case 'STAGE_FAILED': {
        this.handleStageFailed(event)
        break
      }

      case 'STAGE_WOULD_RUN': {
        this.persist(event.stage, chalk.yellow('○'), chalk.yellow(`${event.stage.displayName} (would run)`))
        break
      }

      case 'BUILD_FINISHED': {
        console.log(chalk.bold.green(`\n✓ Built ${event.image} (${formatDuration(event.durationMs)})\n`))
        break
      }

      case 'BUILD_FAILED': {
        console.log(chalk.bold.red(`\n✗ Build failed: ${event.error}\n`))
        break
      }
    }
  }

  log(_workspaceId: string, stage: StageRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const spinner = this.stageSpinners.get(stage.id)
      const prefix = chalk.gray(`  [${stage.id}]`)
      if (spinner) {
        spinner.clear()
        console.log(`${prefix} ${line}`)
        spinner.render()
      } else {
        console.log(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(stage.id)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(stage.id, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  result(_workspaceId: string, _stage: StageRef, _result: RunContainerResult): void {
    // Results shown via state updates
  }

  private persist(stage: StageRef, symbol: string, text: string): void {
    const spinner = this.stageSpinners.get(stage.id)
    if (spinner) {
      spinner.stopAndPersist({symbol, text})
      this.stageSpinners.delete(stage.id)
    } else {
      console.log(`  ${symbol} ${text}`)
    }
  }

  private handleStageFinished(event: StageFinishedEvent): void {
    const details: string[] = []
    if (typeof event.durationMs === 'number') {
      details.push(formatDuration(event.durationMs))
    }

    if (typeof event.artifactSize === 'number' && event.artifactSize > 0) {
      details.push(formatSize(event.artifactSize))
    }

    if (event.imageId) {
      details.push(event.imageId.replace(/^sha256:/, '').slice(0, 12))
    }

    const suffix = details.length > 0 ? ` (${details.join(', ')})` : ''
    this.persist(event.stage, chalk.green('✓'), chalk.green(`${event.stage.displayName}${suffix}`))
    this.stderrBuffers.delete(event.stage.id)
  }

  private handleStageFailed(event: StageFailedEvent): void {
    const exitInfo = event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`
    this.persist(event.stage, chalk.red('✗'), chalk.red(`${event.stage.displayName}${exitInfo}`))

    const stderr = this.stderrBuffers.get(event.stage.id)
    if (stderr && stderr.length > 0) {
      console.log(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.log(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(event.stage.id)
  }
}
