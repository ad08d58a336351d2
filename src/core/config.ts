import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from '../errors.js'
import {isMissingFileError} from '../engine/system.js'
import {parseSize} from './utils.js'

export const CONFIG_FILENAME = '.strata.yml'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = typeof LOG_LEVELS[number]

/**
 * Effective settings of a build.
 */
export type Settings = {
  /** Root of staging and committed images. */
  workdir: string;
  /** Layer cache directory (default: `<workdir>/cache`). */
  cacheDir: string;
  /** Cache size bound in bytes; unbounded when undefined. */
  maxCacheSize?: number;
  missRateAlpha: number;
  reorderThreshold: number;
  /** Bytes of command output kept for failure reports. */
  maxOutputBytes: number;
  shell: string;
  logLevel: LogLevel;
}

/** Settings as written in `.strata.yml`; every field is optional. */
export type StrataConfig = {
  workdir?: string;
  cacheDir?: string;
  maxCacheSize?: number;
  missRateAlpha?: number;
  reorderThreshold?: number;
  maxOutputBytes?: number;
  shell?: string;
  logLevel?: LogLevel;
}

export const DEFAULT_WORKDIR = '.strata'

/**
 * Loads the project-level `.strata.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 * @throws ConfigError when the file is not a valid configuration
 */
export async function loadConfig(dir: string): Promise<StrataConfig> {
  let content: string
  try {
    content = await readFile(join(dir, CONFIG_FILENAME), 'utf8')
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error: unknown) {
    throw new ConfigError(`${CONFIG_FILENAME} is not valid YAML`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  return parseConfig(parsed)
}

/** Validates a configuration document. Sizes accept `512MB`-style strings. */
export function parseConfig(input: unknown): StrataConfig {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping`)
  }

  const config: StrataConfig = {}
  for (const [key, value] of Object.entries(input)) {
    switch (key) {
      case 'workdir':
      case 'cacheDir':
      case 'shell': {
        config[key] = expectString(key, value)
        break
      }

      case 'maxCacheSize':
      case 'maxOutputBytes': {
        config[key] = toSize(key, value)
        break
      }

      case 'missRateAlpha':
      case 'reorderThreshold': {
        config[key] = expectRatio(key, value)
        break
      }

      case 'logLevel': {
        config.logLevel = toLogLevel(key, value)
        break
      }

      default: {
        throw new ConfigError(`Unknown setting in ${CONFIG_FILENAME}: ${key}`)
      }
    }
  }

  return config
}

/**
 * Merges configuration sources. Later sources win:
 * defaults, `.strata.yml`, `STRATA_*` environment variables, `overrides`.
 */
export function resolveSettings(
  config: StrataConfig,
  env: Record<string, string | undefined> = process.env,
  overrides: StrataConfig = {}
): Settings {
  const fromEnv: StrataConfig = {}
  if (env.STRATA_WORKDIR) {
    fromEnv.workdir = env.STRATA_WORKDIR
  }

  if (env.STRATA_CACHE_DIR) {
    fromEnv.cacheDir = env.STRATA_CACHE_DIR
  }

  if (env.STRATA_MAX_CACHE_SIZE) {
    fromEnv.maxCacheSize = toSize('STRATA_MAX_CACHE_SIZE', env.STRATA_MAX_CACHE_SIZE)
  }

  if (env.STRATA_LOG_LEVEL) {
    fromEnv.logLevel = toLogLevel('STRATA_LOG_LEVEL', env.STRATA_LOG_LEVEL)
  }

  const pick = <K extends keyof StrataConfig>(key: K): StrataConfig[K] => overrides[key] ?? fromEnv[key] ?? config[key]
  const workdir = pick('workdir') ?? DEFAULT_WORKDIR

  return {
    workdir,
    cacheDir: pick('cacheDir') ?? join(workdir, 'cache'),
    maxCacheSize: pick('maxCacheSize'),
    missRateAlpha: pick('missRateAlpha') ?? 0.3,
    reorderThreshold: pick('reorderThreshold') ?? 0.05,
    maxOutputBytes: pick('maxOutputBytes') ?? 1_000_000,
    shell: pick('shell') ?? 'sh',
    logLevel: pick('logLevel') ?? 'info'
  }
}

function expectString(key: string, value: unknown): string {
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`Invalid ${key}: expected a non-empty string`)
  }

  return value
}

function expectRatio(key: string, value: unknown): number {
  if (typeof value !== 'number' || value < 0 || value > 1) {
    throw new ConfigError(`Invalid ${key}: expected a number between 0 and 1`)
  }

  return value
}

function toSize(key: string, value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return value
  }

  if (typeof value === 'string') {
    const size = parseSize(value)
    if (size !== undefined) {
      return size
    }
  }

  throw new ConfigError(`Invalid ${key}: expected a byte count or a size such as 512MB`)
}

function toLogLevel(key: string, value: unknown): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value)
  if (!level) {
    throw new ConfigError(`Invalid ${key}: expected one of ${LOG_LEVELS.join(', ')}`)
  }

  return level
}
