#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {StrataError} from '../errors.js'
import {registerBuildCommand} from './commands/build.js'
import {registerCacheCommand} from './commands/cache.js'
import {registerImagesCommand} from './commands/images.js'
import {registerPlanCommand} from './commands/plan.js'
import {registerRmImageCommand} from './commands/rm-image.js'

async function main() {
  const program = new Command()

  program
    .name('strata')
    .description('Layered build planner with content-addressed step caching')
    .version('0.1.0')
    .option('--workdir <path>', 'Root of staging builds and images (default: .strata, or STRATA_WORKDIR)')
    .option('--cache-dir <path>', 'Layer cache directory (default: <workdir>/cache, or STRATA_CACHE_DIR)')
    .option('--max-cache-size <size>', 'Cache size bound, e.g. 2GB (or STRATA_MAX_CACHE_SIZE)')
    .option('--json', 'Output structured JSON logs')

  registerBuildCommand(program)
  registerPlanCommand(program)
  registerImagesCommand(program)
  registerRmImageCommand(program)
  registerCacheCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof StrataError) {
    console.error(chalk.red(`${error.name}: ${error.message}`))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
