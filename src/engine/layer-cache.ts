import process from 'node:process'
import {randomUUID} from 'node:crypto'
import {mkdir, readFile, readdir, rename, rm, stat, utimes, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {CacheCorruptionError, CacheError} from '../errors.js'
import type {FilesystemDelta, Fingerprint} from '../types.js'
import {hashFile, packDelta} from './filesystem.js'
import {KeyLock} from './key-lock.js'
import {isAlreadyExistsError, isMissingFileError, isProcessAlive} from './system.js'

const ENTRY_FILE = 'entry.json'
const ARCHIVE_FILE = 'layer.tgz'

/** Metadata persisted beside each layer archive. */
export type CacheEntryMeta = {
  key: Fingerprint;
  /** Key of the layer this one was built on top of. */
  parent?: Fingerprint;
  stepId: string;
  delta: FilesystemDelta;
  /** Archive size in bytes (0 when the layer only removes paths). */
  size: number;
  /** SHA-256 of the archive; absent when there is no archive. */
  archiveDigest?: string;
  createdAt: string;
}

/** A verified cache entry, ready to be replayed. */
export type CachedLayer = CacheEntryMeta & {
  archivePath?: string;
  lastUsedAt: Date;
}

export type LookupResult =
  | {status: 'hit'; layer: CachedLayer}
  | {status: 'miss'}
  | {status: 'corrupt'; error: CacheCorruptionError}

/** A layer captured by the executor, to be published under its key. */
export type NewLayer = {
  stepId: string;
  delta: FilesystemDelta;
  /** Directory the delta's added and modified paths are read from. */
  sourceRoot: string;
  parent?: Fingerprint;
}

export type LayerCacheOptions = {
  /** Total archive bytes kept; least recently used entries are evicted beyond it. */
  maxSize?: number;
  /** Clock used for recency; tests inject a deterministic one. */
  now?: () => Date;
}

/**
 * Content-addressed store of build layers.
 *
 * ## Layout
 *
 * - **layers/{key}/entry.json**: entry metadata (delta, parent, digest)
 * - **layers/{key}/layer.tgz**: added and modified files of the layer
 * - **staging/**: entries being written or evicted, never read
 *
 * ## Writes
 *
 * An entry is assembled in `staging/` and published with a single directory
 * rename, so a reader either sees a complete entry or none. When two writers
 * race on a key the first rename wins; the loser discards its copy and
 * returns the published entry.
 *
 * ## Eviction
 *
 * Recency is the mtime of `entry.json`, refreshed on every hit. After each
 * write the least recently used entries are removed until the total archive
 * size fits `maxSize`. Retained keys (layers of a build in progress, the
 * parent of an entry being written) are never evicted.
 */
export class LayerCache {
  /**
   * Opens (or creates) a cache directory.
   * Staging leftovers of processes that no longer run are removed.
   */
  static async open(root: string, options?: LayerCacheOptions): Promise<LayerCache> {
    await mkdir(join(root, 'layers'), {recursive: true})
    await mkdir(join(root, 'staging'), {recursive: true})
    const cache = new LayerCache(root, options)
    await cache.cleanupStaging()
    return cache
  }

  readonly maxSize?: number
  private readonly now: () => Date
  private readonly lock = new KeyLock()
  private readonly retained = new Map<string, number>()

  private constructor(
    readonly root: string,
    options?: LayerCacheOptions
  ) {
    this.maxSize = options?.maxSize
    this.now = options?.now ?? (() => new Date())
  }

  entryPath(key: Fingerprint): string {
    validateKey(key)
    return join(this.root, 'layers', key)
  }

  /**
   * Looks a key up and verifies the entry.
   * A corrupt entry is evicted before being reported.
   */
  async lookup(key: Fingerprint): Promise<LookupResult> {
    let layer: CachedLayer | undefined
    try {
      layer = await this.readEntry(key, {verify: true})
    } catch (error: unknown) {
      if (error instanceof CacheCorruptionError) {
        await this.evict(key)
        return {status: 'corrupt', error}
      }

      throw error
    }

    if (!layer) {
      return {status: 'miss'}
    }

    const lastUsedAt = this.now()
    await utimes(join(this.entryPath(key), ENTRY_FILE), lastUsedAt, lastUsedAt)
    return {status: 'hit', layer: {...layer, lastUsedAt}}
  }

  /** Verified layer for `key`, or undefined on a miss (corrupt entries count as misses). */
  async get(key: Fingerprint): Promise<CachedLayer | undefined> {
    const result = await this.lookup(key)
    return result.status === 'hit' ? result.layer : undefined
  }

  /** True when an entry is published under `key`. Does not verify or touch it. */
  async has(key: Fingerprint): Promise<boolean> {
    try {
      await stat(join(this.entryPath(key), ENTRY_FILE))
      return true
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return false
      }

      throw error
    }
  }

  /**
   * Publishes a layer under `key`.
   * Returns the existing entry when the key is already present.
   */
  async put(key: Fingerprint, layer: NewLayer): Promise<CachedLayer> {
    validateKey(key)
    const published = await this.lock.withLock(key, async () => {
      const existing = await this.lookup(key)
      if (existing.status === 'hit') {
        return existing.layer
      }

      return this.writeEntry(key, layer)
    })

    if (this.maxSize !== undefined) {
      const release = this.retain(key)
      try {
        await this.prune(this.maxSize)
      } finally {
        release()
      }
    }

    return published
  }

  /**
   * Protects `key` from eviction until the returned function is called.
   * Retains are counted; the release function is idempotent.
   */
  retain(key: Fingerprint): () => void {
    this.retained.set(key, (this.retained.get(key) ?? 0) + 1)
    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      const count = (this.retained.get(key) ?? 1) - 1
      if (count <= 0) {
        this.retained.delete(key)
      } else {
        this.retained.set(key, count)
      }
    }
  }

  isRetained(key: Fingerprint): boolean {
    return this.retained.has(key)
  }

  /**
   * Lists published entries, most recently used first.
   * Entries failing verification of their metadata are evicted and left out.
   */
  async list(): Promise<CachedLayer[]> {
    const keys = await this.keys()
    const layers: CachedLayer[] = []
    for (const key of keys) {
      try {
        const layer = await this.readEntry(key, {verify: false})
        if (layer) {
          layers.push(layer)
        }
      } catch (error: unknown) {
        if (!(error instanceof CacheCorruptionError)) {
          throw error
        }

        await this.evict(key)
      }
    }

    return layers.sort((a, b) => b.lastUsedAt.getTime() - a.lastUsedAt.getTime() || a.key.localeCompare(b.key))
  }

  /** Total archive bytes of published entries. */
  async totalSize(): Promise<number> {
    const layers = await this.list()
    return layers.reduce((total, layer) => total + layer.size, 0)
  }

  /**
   * Removes an entry. The entry directory is first moved out of `layers/`
   * so that concurrent readers never see a half-deleted entry.
   */
  async evict(key: Fingerprint): Promise<void> {
    const trash = this.stagingDir('evict')
    try {
      await rename(this.entryPath(key), trash)
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return
      }

      throw new CacheError('CACHE_EVICT_FAILED', `Failed to evict cache entry ${key}`, {cause: error})
    }

    await rm(trash, {recursive: true, force: true})
  }

  /**
   * Evicts least recently used entries until the total size fits `maxSize`.
   * @returns Keys of the evicted entries
   */
  async prune(maxSize: number): Promise<string[]> {
    const layers = await this.list()
    let total = layers.reduce((sum, layer) => sum + layer.size, 0)
    const evicted: string[] = []

    for (const layer of layers.reverse()) {
      if (total <= maxSize) {
        break
      }

      if (this.isRetained(layer.key)) {
        continue
      }

      await this.evict(layer.key)
      total -= layer.size
      evicted.push(layer.key)
    }

    return evicted
  }

  /** Removes every entry and every staging directory. */
  async reset(): Promise<void> {
    await rm(join(this.root, 'layers'), {recursive: true, force: true})
    await rm(join(this.root, 'staging'), {recursive: true, force: true})
    await mkdir(join(this.root, 'layers'), {recursive: true})
    await mkdir(join(this.root, 'staging'), {recursive: true})
  }

  private async keys(): Promise<string[]> {
    const entries = await readdir(join(this.root, 'layers'), {withFileTypes: true})
    return entries.filter(e => e.isDirectory()).map(e => e.name)
  }

  private async writeEntry(key: Fingerprint, layer: NewLayer): Promise<CachedLayer> {
    const releaseParent = layer.parent ? this.retain(layer.parent) : undefined
    const staging = this.stagingDir('put')

    try {
      await mkdir(staging, {recursive: true})
      const archive = join(staging, ARCHIVE_FILE)
      const packed = await packDelta(layer.sourceRoot, layer.delta, archive)

      const createdAt = this.now()
      const meta: CacheEntryMeta = {
        key,
        parent: layer.parent,
        stepId: layer.stepId,
        delta: layer.delta,
        size: packed ? (await stat(archive)).size : 0,
        archiveDigest: packed ? await hashFile(archive) : undefined,
        createdAt: createdAt.toISOString()
      }
      await writeFile(join(staging, ENTRY_FILE), JSON.stringify(meta, null, 2), 'utf8')
      await utimes(join(staging, ENTRY_FILE), createdAt, createdAt)

      try {
        await rename(staging, this.entryPath(key))
      } catch (error: unknown) {
        if (!isAlreadyExistsError(error)) {
          throw new CacheError('CACHE_WRITE_FAILED', `Failed to publish cache entry ${key}`, {cause: error})
        }

        // Another process published the same key first
        const winner = await this.lookup(key)
        if (winner.status === 'hit') {
          return winner.layer
        }

        throw new CacheError('CACHE_WRITE_FAILED', `Cache entry ${key} was published concurrently but could not be read`, {cause: error})
      }

      return {
        ...meta,
        archivePath: packed ? join(this.entryPath(key), ARCHIVE_FILE) : undefined,
        lastUsedAt: createdAt
      }
    } finally {
      await rm(staging, {recursive: true, force: true})
      releaseParent?.()
    }
  }

  private async readEntry(key: Fingerprint, options: {verify: boolean}): Promise<CachedLayer | undefined> {
    const dir = this.entryPath(key)
    const metaPath = join(dir, ENTRY_FILE)

    let raw: string
    let lastUsedAt: Date
    try {
      raw = await readFile(metaPath, 'utf8')
      lastUsedAt = (await stat(metaPath)).mtime
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return undefined
      }

      throw error
    }

    const meta = parseEntryMeta(key, raw)
    const archivePath = meta.archiveDigest ? join(dir, ARCHIVE_FILE) : undefined

    if (options.verify && archivePath && meta.archiveDigest) {
      let digest: string
      try {
        digest = await hashFile(archivePath)
      } catch (error: unknown) {
        if (isMissingFileError(error)) {
          throw new CacheCorruptionError(key, 'layer archive is missing', {cause: error})
        }

        throw error
      }

      if (digest !== meta.archiveDigest) {
        throw new CacheCorruptionError(key, 'layer archive digest mismatch')
      }
    }

    return {...meta, archivePath, lastUsedAt}
  }

  private async cleanupStaging(): Promise<void> {
    const stagingRoot = join(this.root, 'staging')
    const entries = await readdir(stagingRoot, {withFileTypes: true})
    for (const entry of entries) {
      const pid = Number.parseInt(entry.name.split('-')[0] ?? '', 10)
      if (Number.isNaN(pid) || !isProcessAlive(pid)) {
        await rm(join(stagingRoot, entry.name), {recursive: true, force: true})
      }
    }
  }

  private stagingDir(purpose: string): string {
    return join(this.root, 'staging', `${process.pid}-${purpose}-${randomUUID()}`)
  }
}

function validateKey(key: string): void {
  if (!/^[\w-]+$/.test(key)) {
    throw new CacheError('INVALID_CACHE_KEY', `Invalid cache key: ${key}. Must contain only alphanumeric characters, dashes, and underscores.`)
  }
}

function parseEntryMeta(key: string, raw: string): CacheEntryMeta {
  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch (error: unknown) {
    throw new CacheCorruptionError(key, 'entry metadata is not valid JSON', {cause: error})
  }

  if (!isEntryMeta(value)) {
    throw new CacheCorruptionError(key, 'entry metadata is malformed')
  }

  if (value.key !== key) {
    throw new CacheCorruptionError(key, `entry metadata names key ${value.key}`)
  }

  return value
}

function isEntryMeta(value: unknown): value is CacheEntryMeta {
  if (typeof value !== 'object' || value === null) {
    return false
  }

  return 'key' in value && typeof value.key === 'string'
    && 'stepId' in value && typeof value.stepId === 'string'
    && 'size' in value && typeof value.size === 'number'
    && 'createdAt' in value && typeof value.createdAt === 'string'
    && 'delta' in value && isDelta(value.delta)
    && (!('archiveDigest' in value) || value.archiveDigest === undefined || typeof value.archiveDigest === 'string')
    && (!('parent' in value) || value.parent === undefined || typeof value.parent === 'string')
}

function isDelta(value: unknown): value is FilesystemDelta {
  if (typeof value !== 'object' || value === null) {
    return false
  }

  return 'added' in value && isStringArray(value.added)
    && 'modified' in value && isStringArray(value.modified)
    && 'removed' in value && isStringArray(value.removed)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}
