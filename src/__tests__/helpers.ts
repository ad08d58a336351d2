import {mkdir, mkdtemp, readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import {CommandRunner, type OnLogLine, type RunCommandRequest, type RunCommandResult} from '../engine/command-runner.js'
import type {BuildEvent, Reporter} from '../core/reporter.js'
import {BuildCancelledError} from '../errors.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'strata-test-'))
}

/** Writes `files` (relative path to content) under `root`. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path)
    await mkdir(dirname(target), {recursive: true})
    await writeFile(target, content)
  }
}

export async function readText(path: string): Promise<string> {
  return readFile(path, 'utf8')
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]} {
  const events: BuildEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/**
 * What a fake command does: edits the image root and returns an exit code
 * (0 when nothing is returned).
 */
export type FakeCommand = (cwd: string, log: OnLogLine) => Promise<number | void>

/**
 * In-process command runner. Commands are looked up by their exact text;
 * an unknown command exits 127.
 */
export class FakeCommandRunner extends CommandRunner {
  readonly runs: RunCommandRequest[] = []
  checks = 0

  constructor(private readonly commands: Record<string, FakeCommand>) {
    super()
  }

  get runCount(): number {
    return this.runs.length
  }

  get commandsRun(): string[] {
    return this.runs.map(request => request.command)
  }

  async check(): Promise<void> {
    this.checks++
  }

  async run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult> {
    this.runs.push(request)
    const startedAt = new Date()
    if (request.signal?.aborted) {
      throw new BuildCancelledError(request.stepId, {cause: request.signal.reason})
    }

    const command = this.commands[request.command]
    if (!command) {
      onLogLine({stream: 'stderr', line: `sh: ${request.command}: not found`})
      return {exitCode: 127, stdout: '', stderr: `sh: ${request.command}: not found\n`, startedAt, finishedAt: new Date()}
    }

    const stderr: string[] = []
    const stdout: string[] = []
    const exitCode = await command(request.cwd, log => {
      (log.stream === 'stdout' ? stdout : stderr).push(`${log.line}\n`)
      onLogLine(log)
    })

    return {
      exitCode: typeof exitCode === 'number' ? exitCode : 0,
      stdout: stdout.join(''),
      stderr: stderr.join(''),
      startedAt,
      finishedAt: new Date()
    }
  }
}

/** Clock returning increasing timestamps, one second apart. */
export function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let tick = 0
  return () => new Date(start + (tick++ * 1000))
}
