import process from 'node:process'

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/** True for a rename onto a directory that already exists with content. */
export function isAlreadyExistsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOTEMPTY' || error.code === 'EEXIST')
}

/** Whether a process with this pid is still running (signal 0 probe). */
export function isProcessAlive(pid: number): boolean {
  if (pid === process.pid) {
    return true
  }

  try {
    process.kill(pid, 0)
    return true
  } catch (error: unknown) {
    return error instanceof Error && 'code' in error && error.code === 'EPERM'
  }
}
