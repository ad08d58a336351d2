import process from 'node:process'
import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {BuildEvent, Reporter, StepAppliedEvent, StepFailedEvent, StepRef} from '../core/reporter.js'
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
  private readonly stepSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        const mode = event.dryRun ? chalk.yellow(' (dry run)') : ''
        console.error(chalk.bold(`\n▶ Build: ${chalk.cyan(event.manifestName)}${mode}\n`))
        break
      }

      case 'STEP_CACHE_HIT': {
        this.persist(event.step, chalk.gray('⊙'), chalk.gray(`${event.step.displayName} (cached)`))
        break
      }

      case 'STEP_CACHE_CORRUPTED': {
        console.error(chalk.yellow(`  ! ${event.step.displayName}: cached layer discarded (${event.reason})`))
        break
      }

      case 'STEP_CACHE_MISS': {
        break
      }

      case 'STEP_STARTING': {
        const spinner = ora({text: event.step.displayName, prefixText: ' ', stream: process.stderr}).start()
        this.stepSpinners.set(event.step.id, spinner)
        break
      }

      case 'STEP_LOG': {
        this.handleLog(event.step, event.stream, event.line)
        break
      }

      case 'STEP_APPLIED': {
        this.handleStepApplied(event)
        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'STEP_WOULD_RUN': {
        this.persist(event.step, chalk.yellow('○'), chalk.yellow(`${event.step.displayName} (would run)`))
        break
      }

      case 'BUILD_FINISHED': {
        const summary = `${event.commandsRun} run, ${event.cachedSteps} cached`
        const image = event.imageId ? ` ${chalk.cyan(event.imageId.slice(0, 12))}` : ''
        console.error(chalk.bold.green(`\n✓ Build completed${image} (${summary})\n`))
        break
      }

      case 'BUILD_FAILED': {
        console.error(chalk.bold.red(`\n✗ Build failed: ${event.message}\n`))
        break
      }

      case 'STATS_NOT_SAVED': {
        console.error(chalk.yellow(`  ! Build history not saved (${event.message})`))
        break
      }
    }
  }

  private persist(step: StepRef, symbol: string, text: string): void {
    const spinner = this.stepSpinners.get(step.id)
    if (spinner) {
      spinner.stopAndPersist({symbol, text})
      this.stepSpinners.delete(step.id)
    } else {
      console.error(`  ${symbol} ${text}`)
    }
  }

  private handleLog(step: StepRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const spinner = this.stepSpinners.get(step.id)
      const prefix = chalk.gray(`  [${step.id}]`)
      if (spinner) {
        spinner.clear()
        console.error(`${prefix} ${line}`)
        spinner.render()
      } else {
        console.error(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(step.id)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(step.id, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private handleStepApplied(event: StepAppliedEvent): void {
    if (event.cached) {
      return
    }

    const details: string[] = []
    if (typeof event.durationMs === 'number') {
      details.push(formatDuration(event.durationMs))
    }

    if (typeof event.layerSize === 'number' && event.layerSize > 0) {
      details.push(formatSize(event.layerSize))
    }

    const suffix = details.length > 0 ? ` (${details.join(', ')})` : ''
    this.persist(event.step, chalk.green('✓'), chalk.green(`${event.step.displayName}${suffix}`))
    this.stderrBuffers.delete(event.step.id)
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const exitInfo = event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`
    this.persist(event.step, chalk.red('✗'), chalk.red(`${event.step.displayName}${exitInfo}`))

    const stderr = this.stderrBuffers.get(event.step.id)
    if (stderr && stderr.length > 0) {
      console.error(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.error(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(event.step.id)
  }
}
