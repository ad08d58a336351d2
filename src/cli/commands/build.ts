import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {CommandFailedError, ConfigError} from '../../errors.js'
import {buildReporter, createBuilder, getGlobalOptions} from '../utils.js'

type BuildCommandOptions = {
  context?: string;
  dryRun?: boolean;
  verbose?: boolean;
  timeout?: string;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build the image of a manifest')
    .argument('[manifest]', 'Manifest file or directory (default: current directory)')
    .option('-C, --context <path>', 'Build context directory (overrides the manifest)')
    .option('--dry-run', 'Show which steps would run without executing anything')
    .option('--verbose', 'Stream command output in real time (interactive mode)')
    .option('--timeout <seconds>', 'Cancel the build after this many seconds')
    .action(async (manifest: string | undefined, options: BuildCommandOptions, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const builder = await createBuilder(cmd, buildReporter({json, verbose: options.verbose}))

      const controller = new AbortController()
      const signals = [controller.signal]
      if (options.timeout !== undefined) {
        const seconds = Number(options.timeout)
        if (!Number.isFinite(seconds) || seconds <= 0) {
          throw new ConfigError(`Invalid --timeout: ${options.timeout}`)
        }

        signals.push(AbortSignal.timeout(seconds * 1000))
      }

      const onSignal = () => {
        controller.abort(new Error('Interrupted'))
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const {image} = await builder.build(manifest, {
          context: options.context,
          dryRun: options.dryRun,
          signal: AbortSignal.any(signals)
        })
        if (image) {
          console.log(image.rootfs)
        }
      } catch (error: unknown) {
        if (error instanceof CommandFailedError) {
          printCommandFailure(error)
        }

        throw error
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}

function printCommandFailure(error: CommandFailedError): void {
  console.error(chalk.red(`Step ${chalk.bold(error.stepId)} exited with code ${error.exitCode}`))
  console.error(chalk.gray(`$ ${error.command}`))
  if (error.stdout) {
    console.error(chalk.bold('── stdout ──'))
    console.error(error.stdout.trimEnd())
  }

  if (error.stderr) {
    console.error(chalk.bold.red('── stderr ──'))
    console.error(error.stderr.trimEnd())
  }
}
