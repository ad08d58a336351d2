import process from 'node:process'
import type {Command} from 'commander'
import {Builder} from '../core/builder.js'
import {loadConfig, type StrataConfig} from '../core/config.js'
import type {Reporter} from '../core/reporter.js'
import {parseSize} from '../core/utils.js'
import {ConfigError} from '../errors.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  workdir?: string;
  cacheDir?: string;
  maxCacheSize?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/** Settings given on the command line; they override `.strata.yml` and the environment. */
export function cliOverrides(options: GlobalOptions): StrataConfig {
  const overrides: StrataConfig = {}
  if (options.workdir) {
    overrides.workdir = options.workdir
  }

  if (options.cacheDir) {
    overrides.cacheDir = options.cacheDir
  }

  if (options.maxCacheSize) {
    const size = parseSize(options.maxCacheSize)
    if (size === undefined) {
      throw new ConfigError(`Invalid --max-cache-size: ${options.maxCacheSize}`)
    }

    overrides.maxCacheSize = size
  }

  return overrides
}

/**
 * Builder configured from `.strata.yml` in the working directory, the
 * `STRATA_*` environment and the global flags of `cmd`.
 */
export async function createBuilder(cmd: Command, reporter?: Reporter): Promise<Builder> {
  const cwd = process.cwd()
  const config = await loadConfig(cwd)
  return new Builder({config, overrides: cliOverrides(getGlobalOptions(cmd)), reporter, cwd})
}

/**
 * Reporter of the build command. Under `--json` none is given, so the
 * builder logs JSON lines at its configured level.
 */
export function buildReporter(options: {json?: boolean; verbose?: boolean}): Reporter | undefined {
  return options.json ? undefined : new InteractiveReporter({verbose: options.verbose})
}

/** Left-aligned text table with a bold-able header line. */
export function formatTable(header: string[], rows: string[][]): string[] {
  const widths = header.map((title, column) => Math.max(title.length, ...rows.map(row => row[column].length)))
  const format = (cells: string[]) => cells.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd()
  return [format(header), ...rows.map(row => format(row))]
}

export function shortDigest(digest: string): string {
  return digest.slice(0, 12)
}
