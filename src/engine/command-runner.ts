import process from 'node:process'
import {Buffer} from 'node:buffer'
import {execa} from 'execa'
import {BuildCancelledError, BuildError} from '../errors.js'

/**
 * Log line from command execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during command execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Request to execute one step's command.
 */
export type RunCommandRequest = {
  /** Step being executed (used in errors) */
  stepId: string;
  /** Shell command line */
  command: string;
  /** Working directory: the image root accumulated so far */
  cwd: string;
  /** Step environment, on top of PATH and HOME */
  env?: Readonly<Record<string, string>>;
  /** Aborting kills the command */
  signal?: AbortSignal;
}

/**
 * Result of a command execution.
 */
export type RunCommandResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Captured stdout, tail-truncated to the runner's output limit */
  stdout: string;
  /** Captured stderr, tail-truncated to the runner's output limit */
  stderr: string;
  startedAt: Date;
  finishedAt: Date;
}

/**
 * Abstract interface for running step commands.
 *
 * Implementations:
 * - `ShellCommandRunner`: runs the command through `sh -c` on the host
 * - Tests use an in-process fake that edits the image root directly
 *
 * A runner treats the command as opaque: it reports the exit status and
 * output and never interprets them. Aborting the request's signal must
 * interrupt the command and reject with `BuildCancelledError`.
 */
export abstract class CommandRunner {
  /**
   * Verifies that the runner is available.
   * @throws If the shell cannot be started
   */
  abstract check(): Promise<void>

  abstract run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult>
}

/**
 * Keeps the last `maxBytes` bytes of a stream of lines.
 */
export class OutputTail {
  private readonly lines: string[] = []
  private bytes = 0

  constructor(private readonly maxBytes: number) {}

  push(line: string): void {
    this.lines.push(line)
    this.bytes += Buffer.byteLength(line) + 1
    while (this.bytes > this.maxBytes && this.lines.length > 0) {
      const dropped = this.lines.shift() ?? ''
      this.bytes -= Buffer.byteLength(dropped) + 1
    }
  }

  toString(): string {
    return this.lines.join('\n')
  }
}

/**
 * Build a minimal environment for step commands.
 * Only PATH and HOME are inherited so host secrets never reach a layer;
 * the step's declared environment is added on top.
 */
function commandEnv(stepEnv?: Readonly<Record<string, string>>): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME')) {
      env[key] = value
    }
  }

  return {...env, ...stepEnv}
}

export type ShellCommandRunnerOptions = {
  /** Shell executable (default: sh). */
  shell?: string;
  /** Bytes of stdout and stderr kept for error reports (default: 1 MB). */
  maxOutputBytes?: number;
}

export class ShellCommandRunner extends CommandRunner {
  private readonly shell: string
  private readonly maxOutputBytes: number

  constructor(options?: ShellCommandRunnerOptions) {
    super()
    this.shell = options?.shell ?? 'sh'
    this.maxOutputBytes = options?.maxOutputBytes ?? 1_000_000
  }

  async check(): Promise<void> {
    try {
      await execa(this.shell, ['-c', 'exit 0'], {env: commandEnv(), extendEnv: false})
    } catch (error) {
      throw new BuildError('SHELL_NOT_AVAILABLE', `Shell "${this.shell}" cannot be started`, {cause: error})
    }
  }

  async run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult> {
    if (request.signal?.aborted) {
      throw new BuildCancelledError(request.stepId)
    }

    const startedAt = new Date()
    const stdout = new OutputTail(this.maxOutputBytes)
    const stderr = new OutputTail(this.maxOutputBytes)

    const proc = execa(this.shell, ['-c', request.command], {
      cwd: request.cwd,
      env: commandEnv(request.env),
      extendEnv: false,
      stdin: 'ignore',
      reject: false,
      cancelSignal: request.signal
    })

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        stdout.push(String(line))
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        stderr.push(String(line))
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()

    const streams = await Promise.allSettled([stdoutDone, stderrDone])
    const result = await proc

    if (result.isCanceled || request.signal?.aborted) {
      throw new BuildCancelledError(request.stepId, {cause: request.signal?.reason})
    }

    if (result.exitCode === undefined) {
      throw new BuildError('COMMAND_START_FAILED', `Step ${request.stepId}: command could not be started`, {cause: result})
    }

    // A failing command ends its output iterables with an error; only a
    // successful one must have streamed cleanly.
    const broken = streams.find((s): s is PromiseRejectedResult => s.status === 'rejected')
    if (broken && result.exitCode === 0) {
      throw new BuildError('OUTPUT_STREAM_FAILED', `Step ${request.stepId}: reading command output failed`, {cause: broken.reason})
    }

    return {
      exitCode: result.exitCode,
      stdout: stdout.toString(),
      stderr: stderr.toString(),
      startedAt,
      finishedAt: new Date()
    }
  }
}
