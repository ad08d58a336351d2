export {Builder} from './builder.js'
export type {BuilderOptions, BuildOptions, BuildResult, PlanPreview} from './builder.js'
export {Executor, imageId} from './executor.js'
export type {ExecutorOptions, ExecuteOptions} from './executor.js'
export {StepStateMachine, isTerminal} from './step-state.js'
export type {StepState} from './step-state.js'
export {LayerPlanner, DEFAULT_REORDER_THRESHOLD} from './planner.js'
export type {LayerPlannerOptions} from './planner.js'
export {FileFrequencyStore, MemoryFrequencyStore, updateMissRate, PRIOR_MISS_RATE, DEFAULT_ALPHA} from './stats.js'
export type {FrequencyStore, StepStats} from './stats.js'
export {ManifestLoader, resolveManifestFile, parseManifestFile, slugify, MANIFEST_FILENAMES} from './manifest-loader.js'
export {buildGraph, topologicalOrder, linearize, dependenciesOf, dependentsOf} from './dag.js'
export type {StepGraph, DependsOn, DependencyReason} from './dag.js'
export {ConsoleReporter, stepRef} from './reporter.js'
export type {
  Reporter,
  ConsoleReporterOptions,
  StepRef,
  BuildEvent,
  BuildStartEvent,
  StepCacheHitEvent,
  StepCacheMissEvent,
  StepCacheCorruptedEvent,
  StepStartingEvent,
  StepLogEvent,
  StepAppliedEvent,
  StepFailedEvent,
  StepWouldRunEvent,
  BuildFinishedEvent,
  BuildFailedEvent,
  StatsNotSavedEvent
} from './reporter.js'
export {loadConfig, parseConfig, resolveSettings, CONFIG_FILENAME, DEFAULT_WORKDIR, LOG_LEVELS} from './config.js'
export type {Settings, StrataConfig, LogLevel} from './config.js'
export {dirSize, formatSize, formatDuration, parseSize} from './utils.js'
