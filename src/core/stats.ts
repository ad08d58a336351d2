import {randomUUID} from 'node:crypto'
import {mkdir, readFile, rename, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {KeyLock} from '../engine/key-lock.js'
import {isMissingFileError} from '../engine/system.js'

/** Miss rate assumed for a step that has never been built. */
export const PRIOR_MISS_RATE = 0.5

/** Default smoothing factor of the miss rate. */
export const DEFAULT_ALPHA = 0.3

/**
 * Build history of one step.
 */
export type StepStats = {
  /** Exponentially weighted rate of cache misses, in [0, 1]. */
  missRate: number;
  /** Number of builds that reached the step. */
  builds: number;
  /** Digest of the step's own inputs in its last build. */
  inputDigest?: string;
}

/**
 * Persistence of per-step statistics.
 *
 * The planner reads statistics while ordering steps and writes them back
 * after a build. Keys are opaque to the store.
 */
export type FrequencyStore = {
  load(): Promise<void>;
  get(key: string): StepStats | undefined;
  /** Applies the entries and persists them, keeping entries saved meanwhile by other builds. */
  update(entries: ReadonlyMap<string, StepStats>): Promise<void>;
  /** Forgets every statistic, in memory and on disk. */
  clear(): Promise<void>;
}

/**
 * `rate' = alpha * miss + (1 - alpha) * rate`, starting from the prior.
 */
export function updateMissRate(previous: number | undefined, miss: boolean, alpha = DEFAULT_ALPHA): number {
  return (alpha * (miss ? 1 : 0)) + ((1 - alpha) * (previous ?? PRIOR_MISS_RATE))
}

/**
 * Keeps statistics in memory only. Used by tests and one-off builds.
 */
export class MemoryFrequencyStore implements FrequencyStore {
  private readonly stats = new Map<string, StepStats>()

  constructor(initial?: Record<string, StepStats>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.stats.set(key, value)
    }
  }

  async load(): Promise<void> {
    // Nothing to read
  }

  get(key: string): StepStats | undefined {
    return this.stats.get(key)
  }

  async update(entries: ReadonlyMap<string, StepStats>): Promise<void> {
    for (const [key, value] of entries) {
      this.stats.set(key, value)
    }
  }

  async clear(): Promise<void> {
    this.stats.clear()
  }
}

// Serializes updates of one stats file within the process
const saves = new KeyLock()

/**
 * Statistics persisted as `stats.json` in the cache directory, so they live
 * exactly as long as the cache does.
 *
 * A missing or unreadable file means no history: every step starts at the
 * prior. An update re-reads the file under a per-file lock, merges its
 * entries and writes through a uniquely named temporary file and a rename,
 * so builds sharing a cache in one process never lose each other's entries.
 */
export class FileFrequencyStore implements FrequencyStore {
  private readonly stats = new Map<string, StepStats>()
  private readonly path: string

  /**
   * @param cacheRoot - Absolute path to the cache directory
   */
  constructor(private readonly cacheRoot: string) {
    this.path = join(cacheRoot, 'stats.json')
  }

  async load(): Promise<void> {
    this.stats.clear()
    for (const [key, value] of Object.entries(await this.read())) {
      this.stats.set(key, value)
    }
  }

  get(key: string): StepStats | undefined {
    return this.stats.get(key)
  }

  async update(entries: ReadonlyMap<string, StepStats>): Promise<void> {
    await saves.withLock(this.path, async () => {
      const merged = {...await this.read(), ...Object.fromEntries(entries)}
      await mkdir(this.cacheRoot, {recursive: true})
      const temporary = `${this.path}.${randomUUID()}.tmp`
      await writeFile(temporary, JSON.stringify({steps: merged}, null, 2), 'utf8')
      await rename(temporary, this.path)

      this.stats.clear()
      for (const [key, value] of Object.entries(merged)) {
        this.stats.set(key, value)
      }
    })
  }

  async clear(): Promise<void> {
    this.stats.clear()
    await rm(this.path, {force: true})
  }

  private async read(): Promise<Record<string, StepStats>> {
    let content: string
    try {
      content = await readFile(this.path, 'utf8')
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return {}
      }

      throw error
    }

    return parseStats(content)
  }
}

/** Valid entries of a stats document; anything malformed is left out. */
function parseStats(content: string): Record<string, StepStats> {
  let document: unknown
  try {
    document = JSON.parse(content)
  } catch {
    return {}
  }

  if (typeof document !== 'object' || document === null || !('steps' in document)) {
    return {}
  }

  const {steps} = document
  if (typeof steps !== 'object' || steps === null) {
    return {}
  }

  const result: Record<string, StepStats> = {}
  for (const [key, value] of Object.entries(steps)) {
    if (isStepStats(value)) {
      result[key] = value
    }
  }

  return result
}

function isStepStats(value: unknown): value is StepStats {
  return typeof value === 'object' && value !== null
    && 'missRate' in value && typeof value.missRate === 'number'
    && value.missRate >= 0 && value.missRate <= 1
    && 'builds' in value && typeof value.builds === 'number'
    && (!('inputDigest' in value) || value.inputDigest === undefined || typeof value.inputDigest === 'string')
}
