import pino, {type DestinationStream, type Level, type LevelWithSilent, type Logger} from 'pino'
import type {Step} from '../types.js'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  id: string;
  displayName: string;
}

export function stepRef(step: Step): StepRef {
  return {id: step.id, displayName: step.name ?? step.id}
}

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. BUILD_START - The plan is about to be executed
 * 2. For each planned step:
 *    a. STEP_CACHE_HIT - The layer is replayed from the cache
 *       OR STEP_CACHE_MISS - The command must run
 *       (preceded by STEP_CACHE_CORRUPTED when a stored entry failed verification)
 *    b. STEP_STARTING - The command starts (misses only)
 *    c. STEP_LOG - Command output line
 *    d. STEP_APPLIED - The layer is part of the image
 *       OR STEP_FAILED - The command failed or was cancelled (build stops)
 *       OR STEP_WOULD_RUN - The command would run (dry-run mode)
 * 3. BUILD_FINISHED - The image was committed
 *    OR BUILD_FAILED - No image was produced
 * 4. STATS_NOT_SAVED - The build history could not be persisted; the
 *    build's own outcome stands
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  manifestName: string;
  buildId: string;
  steps: StepRef[];
  dryRun?: boolean;
}

export type StepCacheHitEvent = {
  event: 'STEP_CACHE_HIT';
  manifestName: string;
  step: StepRef;
  fingerprint: string;
}

export type StepCacheMissEvent = {
  event: 'STEP_CACHE_MISS';
  manifestName: string;
  step: StepRef;
  fingerprint: string;
}

export type StepCacheCorruptedEvent = {
  event: 'STEP_CACHE_CORRUPTED';
  manifestName: string;
  step: StepRef;
  fingerprint: string;
  reason: string;
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  manifestName: string;
  step: StepRef;
}

export type StepLogEvent = {
  event: 'STEP_LOG';
  manifestName: string;
  step: StepRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type StepAppliedEvent = {
  event: 'STEP_APPLIED';
  manifestName: string;
  step: StepRef;
  fingerprint: string;
  cached: boolean;
  durationMs?: number;
  layerSize?: number;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  manifestName: string;
  step: StepRef;
  exitCode?: number;
  message: string;
}

export type StepWouldRunEvent = {
  event: 'STEP_WOULD_RUN';
  manifestName: string;
  step: StepRef;
  fingerprint: string;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  manifestName: string;
  buildId: string;
  imageId?: string;
  commandsRun: number;
  cachedSteps: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  manifestName: string;
  buildId: string;
  stepId?: string;
  message: string;
}

export type StatsNotSavedEvent = {
  event: 'STATS_NOT_SAVED';
  manifestName: string;
  message: string;
}

export type BuildEvent =
  | BuildStartEvent
  | StepCacheHitEvent
  | StepCacheMissEvent
  | StepCacheCorruptedEvent
  | StepStartingEvent
  | StepLogEvent
  | StepAppliedEvent
  | StepFailedEvent
  | StepWouldRunEvent
  | BuildFinishedEvent
  | BuildFailedEvent
  | StatsNotSavedEvent

/**
 * Interface for reporting build events.
 */
export type Reporter = {
  emit(event: BuildEvent): void;
}

function levelOf(event: BuildEvent): Level {
  switch (event.event) {
    case 'STEP_LOG': {
      return 'debug'
    }

    case 'STEP_CACHE_CORRUPTED':
    case 'STATS_NOT_SAVED': {
      return 'warn'
    }

    case 'STEP_FAILED':
    case 'BUILD_FAILED': {
      return 'error'
    }

    default: {
      return 'info'
    }
  }
}

export type ConsoleReporterOptions = {
  level?: LevelWithSilent;
  /** Where JSON lines are written (default: stdout). */
  destination?: DestinationStream;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation. Command output is
 * logged at debug level.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(options?: ConsoleReporterOptions) {
    const pinoOptions = {level: options?.level ?? 'info'}
    this.logger = options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions)
  }

  get level(): string {
    return this.logger.level
  }

  emit(event: BuildEvent): void {
    this.logger[levelOf(event)](event)
  }
}
