import {Buffer} from 'node:buffer'
import {createHash} from 'node:crypto'
import {lstat, readFile, readdir, readlink} from 'node:fs/promises'
import {join} from 'node:path'
import ignore from 'ignore'
import {InputNotFoundError} from '../errors.js'
import type {Fingerprint, InputSet} from '../types.js'
import {hashFile} from './filesystem.js'
import {compareCodeUnits, pathsOverlap, patternBase} from './paths.js'
import {isMissingFileError} from './system.js'

const FORMAT_TAG = 'strata-fingerprint-v1'

export const DEFAULT_IGNORES = [
  '.git',
  'node_modules',
  '__pycache__',
  '.DS_Store',
  '*.pyc',
  '.env',
  '.strata'
]

export const IGNORE_FILE = '.strataignore'

/** A context file as it enters a digest. */
export type HashedFile = {
  path: string;
  size: number;
  sha256: string;
}

/** Everything a step's fingerprint is derived from. */
export type FingerprintParts = {
  predecessor: Fingerprint;
  command?: string;
  env?: Readonly<Record<string, string>>;
  files: HashedFile[];
}

export type ResolveOptions = {
  /** Step id, reported in InputNotFound errors. */
  stepId: string;
  /** Image paths written by steps planned earlier; inputs overlapping them are satisfied. */
  produced?: readonly string[];
}

export type FingerprintOptions = ResolveOptions & {
  command?: string;
  env?: Readonly<Record<string, string>>;
}

/**
 * Combine a predecessor digest, a command and a list of hashed files into
 * one fingerprint. Files are sorted by path before hashing, so callers may
 * pass them in any order.
 */
export function computeFingerprint(parts: FingerprintParts): Fingerprint {
  const hash = createHash('sha256')
  hash.update(`${FORMAT_TAG}\0`)
  hash.update(`predecessor\0${parts.predecessor}\0`)
  hash.update(`command\0${parts.command ?? ''}\0`)

  const env = Object.entries(parts.env ?? {}).sort(([a], [b]) => compareCodeUnits(a, b))
  for (const [key, value] of env) {
    hash.update(`env\0${key}=${value}\0`)
  }

  const files = [...parts.files].sort((a, b) => compareCodeUnits(a.path, b.path))
  for (const file of files) {
    hash.update(`file\0${file.path}\0${file.size}\0${file.sha256}\0`)
  }

  return hash.digest('hex')
}

/** Digest the first step of a plan chains on. */
export function baseDigest(base?: string): Fingerprint {
  return createHash('sha256').update(`${FORMAT_TAG}\0base\0${base ?? ''}`).digest('hex')
}

/**
 * Build the filter deciding which context paths never take part in inputs:
 * the default ignores plus the patterns of `.strataignore`.
 */
export async function buildIgnoreFilter(contextRoot: string): Promise<(path: string) => boolean> {
  const ig = ignore().add(DEFAULT_IGNORES)

  try {
    const ignoreFile = await readFile(join(contextRoot, IGNORE_FILE), 'utf8')
    ig.add(ignoreFile)
  } catch (error: unknown) {
    if (!isMissingFileError(error)) {
      throw error
    }
  }

  return (path: string) => {
    if (path === '') {
      return false
    }

    // Test both variants to handle directory-only patterns (e.g. "dist/")
    return ig.ignores(path) || ig.ignores(path + '/')
  }
}

/**
 * Computes stable content fingerprints for step input sets.
 *
 * The build context is enumerated once when the engine is opened; file
 * contents are hashed lazily and memoized, so fingerprinting several steps
 * reads every file at most once. Paths enter the digest relative to the
 * context root and in code-unit order; mtimes and absolute paths never do.
 */
export class FingerprintEngine {
  static async open(contextRoot: string): Promise<FingerprintEngine> {
    const shouldIgnore = await buildIgnoreFilter(contextRoot)
    const files = await walkContext(contextRoot, '', shouldIgnore)
    files.sort(compareCodeUnits)
    return new FingerprintEngine(contextRoot, files)
  }

  private readonly hashes = new Map<string, Promise<HashedFile>>()

  private constructor(
    readonly contextRoot: string,
    private readonly files: string[]
  ) {}

  /** All files of the build context that inputs may match, sorted. */
  contextFiles(): readonly string[] {
    return this.files
  }

  /**
   * Resolve an input set to the sorted, de-duplicated list of context files
   * it matches.
   * @throws InputNotFoundError when a required pattern matches nothing and no earlier step produces it
   */
  resolve(inputSet: InputSet, options: ResolveOptions): string[] {
    if (inputSet.length === 0) {
      return []
    }

    const rules = inputSet.map(input => {
      const negated = input.pattern.startsWith('!')
      const body = negated ? input.pattern.slice(1) : input.pattern
      return {input, negated, matcher: ignore({ignorecase: false}).add(body)}
    })

    // The last rule matching a file decides, so `!pattern` re-excludes
    // files an earlier pattern selected, even inside a selected directory.
    const matched = this.files.filter(file => {
      let included = false
      for (const rule of rules) {
        if (rule.matcher.ignores(file)) {
          included = !rule.negated
        }
      }

      return included
    })

    for (const {input, negated, matcher} of rules) {
      if (input.optional || negated) {
        continue
      }

      if (this.files.some(file => matcher.ignores(file))) {
        continue
      }

      const base = patternBase(input.pattern)
      if (options.produced?.some(output => pathsOverlap(output, base))) {
        continue
      }

      throw new InputNotFoundError(options.stepId, input.pattern)
    }

    return matched
  }

  /** Fingerprint of an input set chained on the predecessor digest. */
  async fingerprint(inputSet: InputSet, predecessorDigest: Fingerprint, options: FingerprintOptions): Promise<Fingerprint> {
    const paths = this.resolve(inputSet, options)
    const files = await Promise.all(paths.map(async path => this.hashFile(path)))
    return computeFingerprint({
      predecessor: predecessorDigest,
      command: options.command,
      env: options.env,
      files
    })
  }

  async hashFile(path: string): Promise<HashedFile> {
    let pending = this.hashes.get(path)
    if (!pending) {
      pending = hashContextFile(this.contextRoot, path)
      this.hashes.set(path, pending)
    }

    return pending
  }
}

async function hashContextFile(contextRoot: string, path: string): Promise<HashedFile> {
  const absolute = join(contextRoot, path)
  const stats = await lstat(absolute)
  if (stats.isSymbolicLink()) {
    const target = await readlink(absolute)
    const sha256 = createHash('sha256').update(`symlink\0${target}`).digest('hex')
    return {path, size: Buffer.byteLength(target), sha256}
  }

  return {path, size: stats.size, sha256: await hashFile(absolute)}
}

async function walkContext(root: string, relative: string, shouldIgnore: (path: string) => boolean): Promise<string[]> {
  const entries = await readdir(join(root, relative), {withFileTypes: true})
  const files: string[] = []

  for (const entry of entries) {
    const path = relative ? `${relative}/${entry.name}` : entry.name
    if (entry.isDirectory()) {
      if (!shouldIgnore(path)) {
        files.push(...await walkContext(root, path, shouldIgnore))
      }
    } else if ((entry.isFile() || entry.isSymbolicLink()) && !shouldIgnore(path)) {
      files.push(path)
    }
  }

  return files
}
