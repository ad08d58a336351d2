import {createHash} from 'node:crypto'
import {createReadStream} from 'node:fs'
import {copyFile, lstat, mkdir, readdir, readlink, rm, symlink} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import * as tar from 'tar'
import type {FilesystemDelta} from '../types.js'
import {compareCodeUnits} from './paths.js'

export type SnapshotEntry = {
  kind: 'file' | 'dir' | 'symlink';
  mode: number;
  size: number;
  /** Content hash for files, link target for symlinks, empty for directories. */
  digest: string;
}

/** Image-relative path → entry, for every path under a root. */
export type Snapshot = Map<string, SnapshotEntry>

/**
 * Record the state of every file, directory and symlink under `root`.
 * Two snapshots of the same root are compared with `diffSnapshots`.
 */
export async function snapshot(root: string): Promise<Snapshot> {
  const result: Snapshot = new Map()
  await walk(root, '', result)
  return result
}

async function walk(root: string, relative: string, into: Snapshot): Promise<void> {
  const entries = await readdir(join(root, relative), {withFileTypes: true})
  for (const entry of entries) {
    const path = relative ? `${relative}/${entry.name}` : entry.name
    const absolute = join(root, path)
    const stats = await lstat(absolute)
    const mode = stats.mode & 0o7777

    if (stats.isSymbolicLink()) {
      into.set(path, {kind: 'symlink', mode: 0, size: 0, digest: await readlink(absolute)})
    } else if (stats.isDirectory()) {
      into.set(path, {kind: 'dir', mode, size: 0, digest: ''})
      await walk(root, path, into)
    } else if (stats.isFile()) {
      into.set(path, {kind: 'file', mode, size: stats.size, digest: await hashFile(absolute)})
    }
  }
}

export async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256')
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk)
  }

  return hash.digest('hex')
}

/**
 * Paths added, changed or removed between two snapshots, each list sorted.
 * A path whose kind changed (a directory replaced by a file, for instance)
 * is reported as removed and added again.
 */
export function diffSnapshots(before: Snapshot, after: Snapshot): FilesystemDelta {
  const delta: FilesystemDelta = {added: [], modified: [], removed: []}

  for (const [path, entry] of after) {
    const previous = before.get(path)
    if (!previous) {
      delta.added.push(path)
    } else if (previous.kind !== entry.kind) {
      delta.removed.push(path)
      delta.added.push(path)
    } else if (previous.mode !== entry.mode || previous.digest !== entry.digest) {
      delta.modified.push(path)
    }
  }

  for (const path of before.keys()) {
    if (!after.has(path)) {
      delta.removed.push(path)
    }
  }

  delta.added.sort(compareCodeUnits)
  delta.modified.sort(compareCodeUnits)
  delta.removed.sort(compareCodeUnits)
  return delta
}

/** True when the delta changes nothing. */
export function isEmptyDelta(delta: FilesystemDelta): boolean {
  return delta.added.length === 0 && delta.modified.length === 0 && delta.removed.length === 0
}

/**
 * Write the added and modified entries of `delta` from `root` into a gzipped
 * tar archive. Headers are portable and carry no mtime, so identical deltas
 * produce identical archives.
 * @returns false when the delta has nothing to archive (no file is written)
 */
export async function packDelta(root: string, delta: FilesystemDelta, archivePath: string): Promise<boolean> {
  const entries = [...delta.added, ...delta.modified].sort(compareCodeUnits)
  if (entries.length === 0) {
    return false
  }

  await tar.create(
    {
      file: archivePath,
      cwd: root,
      gzip: true,
      portable: true,
      noMtime: true,
      noDirRecurse: true
    },
    entries
  )
  return true
}

/**
 * Replay a stored layer on top of `root`: delete the paths the layer
 * removed, then extract its archive. Removal comes first so a path that
 * changed kind is recreated from the archive.
 */
export async function applyDelta(root: string, delta: FilesystemDelta, archivePath?: string): Promise<void> {
  for (const path of [...delta.removed].reverse()) {
    await rm(join(root, path), {recursive: true, force: true})
  }

  if (archivePath) {
    await tar.extract({file: archivePath, cwd: root})
  }
}

/**
 * Copy context files into the image root under the same relative paths,
 * the way a build recipe copies its declared inputs before running a step.
 */
export async function copyInputs(contextRoot: string, files: readonly string[], root: string): Promise<void> {
  for (const file of files) {
    const source = join(contextRoot, file)
    const target = join(root, file)
    await mkdir(dirname(target), {recursive: true})

    const stats = await lstat(source)
    if (stats.isSymbolicLink()) {
      await rm(target, {force: true})
      await symlink(await readlink(source), target)
    } else {
      await copyFile(source, target)
    }
  }
}
