export class StrataError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'StrataError'
  }
}

// -- Manifest errors ---------------------------------------------------------

export class ManifestError extends StrataError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ManifestError'
  }
}

export class ValidationError extends ManifestError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class CycleDetectedError extends ManifestError {
  constructor(readonly cycle: string[], options?: {cause?: unknown}) {
    super('CYCLE_DETECTED', `Build steps form a dependency cycle: ${cycle.join(' -> ')}`, options)
    this.name = 'CycleDetectedError'
  }
}

export class StepNotFoundError extends ManifestError {
  constructor(stepId: string, referencedStep: string, options?: {cause?: unknown}) {
    super('STEP_NOT_FOUND', `Step ${stepId}: declared dependency '${referencedStep}' is not a step of this manifest`, options)
    this.name = 'StepNotFoundError'
  }
}

// -- Input errors ------------------------------------------------------------

export class InputError extends StrataError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'InputError'
  }
}

export class InputNotFoundError extends InputError {
  constructor(
    readonly stepId: string,
    readonly pattern: string,
    options?: {cause?: unknown}
  ) {
    super('INPUT_NOT_FOUND', `Step ${stepId}: input pattern '${pattern}' matched no files in the build context`, options)
    this.name = 'InputNotFoundError'
  }
}

// -- Build errors ------------------------------------------------------------

export class BuildError extends StrataError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildError'
  }
}

export class CommandFailedError extends BuildError {
  constructor(
    readonly stepId: string,
    readonly command: string,
    readonly exitCode: number,
    readonly stdout: string,
    readonly stderr: string,
    options?: {cause?: unknown}
  ) {
    super('COMMAND_FAILED', `Step ${stepId} failed with exit code ${exitCode}`, options)
    this.name = 'CommandFailedError'
  }
}

export class BuildCancelledError extends BuildError {
  constructor(readonly stepId?: string, options?: {cause?: unknown}) {
    super('BUILD_CANCELLED', stepId ? `Build cancelled while running step ${stepId}` : 'Build cancelled', options)
    this.name = 'BuildCancelledError'
  }
}

export class IllegalTransitionError extends BuildError {
  constructor(stepId: string, from: string, to: string, options?: {cause?: unknown}) {
    super('ILLEGAL_TRANSITION', `Step ${stepId}: cannot move from ${from} to ${to}`, options)
    this.name = 'IllegalTransitionError'
  }
}

// -- Cache errors ------------------------------------------------------------

export class CacheError extends StrataError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CacheError'
  }
}

export class CacheCorruptionError extends CacheError {
  constructor(readonly key: string, reason: string, options?: {cause?: unknown}) {
    super('CACHE_CORRUPTION', `Cache entry ${key} failed verification: ${reason}`, options)
    this.name = 'CacheCorruptionError'
  }
}

// -- Workspace errors --------------------------------------------------------

export class WorkspaceError extends StrataError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'WorkspaceError'
  }
}

export class StagingError extends WorkspaceError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

export class ImageNotFoundError extends WorkspaceError {
  constructor(imageId: string, options?: {cause?: unknown}) {
    super('IMAGE_NOT_FOUND', `Image not found: ${imageId}`, options)
    this.name = 'ImageNotFoundError'
  }
}

// -- Config errors -----------------------------------------------------------

export class ConfigError extends StrataError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigError'
  }
}
