import type {Dirent} from 'node:fs'
import {readdir, stat} from 'node:fs/promises'
import {join} from 'node:path'
import {isMissingFileError} from '../engine/system.js'

const sizeUnits: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
  TB: 1024 * 1024 * 1024 * 1024
}

/** Total size of the regular files under `dirPath`; 0 when it does not exist. */
export async function dirSize(dirPath: string): Promise<number> {
  let entries: Dirent[]
  try {
    entries = await readdir(dirPath, {withFileTypes: true})
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return 0
    }

    throw error
  }

  let total = 0
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name)
    if (entry.isDirectory()) {
      total += await dirSize(fullPath)
    } else if (entry.isFile()) {
      const s = await stat(fullPath)
      total += s.size
    }
  }

  return total
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  }

  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

/**
 * Parses `512MB`, `1.5 GB`, `2048` (bytes) and the like. Units are binary
 * and case-insensitive.
 * @returns Byte count, or undefined when the text is not a size
 */
export function parseSize(text: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)\s*([kmgt]?b)?$/i.exec(text.trim())
  if (!match) {
    return undefined
  }

  const [, amount, unit = 'B'] = match
  const multiplier = sizeUnits[unit.toUpperCase()]
  return multiplier === undefined ? undefined : Math.floor(Number(amount) * multiplier)
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}
