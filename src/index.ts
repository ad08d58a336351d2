/**
 * Layered build planner: orders build steps, derives a content-addressed
 * key for each one and replays stored filesystem layers for the steps whose
 * inputs did not change.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {Builder, MemoryFrequencyStore} from 'strata'
 *
 * const builder = new Builder({
 *   overrides: {workdir: '/tmp/strata', maxCacheSize: 512 * 1024 * 1024},
 *   stats: new MemoryFrequencyStore()
 * })
 *
 * const {image, commandsRun} = await builder.build('./services/worker')
 * console.log(image?.id, commandsRun)
 * ```
 */

// Engine layer: fingerprints, layers, cache and workspace primitives
export {
  BuildWorkspace,
  LayerCache,
  FingerprintEngine,
  computeFingerprint,
  baseDigest,
  CommandRunner,
  ShellCommandRunner,
  KeyLock,
  snapshot,
  diffSnapshots,
  packDelta,
  applyDelta,
  type CachedLayer,
  type CacheEntryMeta,
  type LookupResult,
  type NewLayer,
  type LogLine,
  type OnLogLine,
  type RunCommandRequest,
  type RunCommandResult
} from './engine/index.js'

// Core layer: manifest, graph, planning and execution
export {
  Builder,
  Executor,
  LayerPlanner,
  StepStateMachine,
  FileFrequencyStore,
  MemoryFrequencyStore,
  ManifestLoader,
  ConsoleReporter,
  buildGraph,
  topologicalOrder,
  dependenciesOf,
  dependentsOf,
  loadConfig,
  resolveSettings,
  formatSize,
  formatDuration,
  parseSize,
  type BuilderOptions,
  type BuildOptions,
  type BuildResult,
  type PlanPreview,
  type FrequencyStore,
  type StepStats,
  type StepGraph,
  type DependsOn,
  type StepState,
  type Reporter,
  type BuildEvent,
  type StepRef,
  type Settings,
  type StrataConfig
} from './core/index.js'

export type {
  Fingerprint,
  InputPattern,
  InputSet,
  FilesystemDelta,
  Step,
  BuildManifest,
  PlannedStep,
  BuildPlan,
  Image,
  ImageLayer,
  ManifestDefinition,
  StepDefinition,
  InputDefinition
} from './types.js'

export {
  StrataError,
  ManifestError,
  ValidationError,
  CycleDetectedError,
  StepNotFoundError,
  InputError,
  InputNotFoundError,
  BuildError,
  CommandFailedError,
  BuildCancelledError,
  IllegalTransitionError,
  CacheError,
  CacheCorruptionError,
  WorkspaceError,
  StagingError,
  ImageNotFoundError,
  ConfigError
} from './errors.js'
