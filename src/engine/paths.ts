import {posix} from 'node:path'
import {ValidationError} from '../errors.js'

const globChars = /[*?[\]]/

/**
 * Normalize an image- or context-relative path to posix form without a
 * leading `./` or trailing slash. Rejects absolute paths and `..` segments.
 */
export function normalizeRelativePath(path: string, context: string): string {
  if (path.startsWith('/')) {
    throw new ValidationError(`Invalid ${context}: '${path}' must be a relative path`)
  }

  if (path.split('/').includes('..')) {
    throw new ValidationError(`Invalid ${context}: '${path}' must not contain '..'`)
  }

  const normalized = posix.normalize(path).replace(/\/+$/, '')
  return normalized === '.' ? '' : normalized
}

/**
 * Literal directory or file prefix of a gitignore-style pattern, up to the
 * first segment containing a glob character. `''` means "could be anywhere".
 */
export function patternBase(pattern: string): string {
  const trimmed = pattern.replace(/^!/, '').replace(/^\//, '').replace(/\/+$/, '')
  const base: string[] = []
  for (const segment of trimmed.split('/')) {
    if (globChars.test(segment)) {
      break
    }

    base.push(segment)
  }

  return base.join('/')
}

/** True when one path equals or contains the other, segment-wise. */
export function pathsOverlap(a: string, b: string): boolean {
  if (a === '' || b === '' || a === b) {
    return true
  }

  return a.startsWith(b + '/') || b.startsWith(a + '/')
}

/** Code-unit ordering, independent of locale. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1
  }

  return a > b ? 1 : 0
}
