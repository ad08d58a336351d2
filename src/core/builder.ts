import process from 'node:process'
import {resolve} from 'node:path'
import {ShellCommandRunner, type CommandRunner} from '../engine/command-runner.js'
import {FingerprintEngine} from '../engine/fingerprint.js'
import {LayerCache, type CachedLayer} from '../engine/layer-cache.js'
import {BuildWorkspace} from '../engine/workspace.js'
import type {BuildManifest, BuildPlan, Image, ImageLayer, PlannedStep} from '../types.js'
import {resolveSettings, type Settings, type StrataConfig} from './config.js'
import {buildGraph, type StepGraph} from './dag.js'
import {Executor} from './executor.js'
import {ManifestLoader, resolveManifestFile} from './manifest-loader.js'
import {LayerPlanner} from './planner.js'
import {ConsoleReporter, stepRef, type Reporter} from './reporter.js'
import {FileFrequencyStore, type FrequencyStore} from './stats.js'

export type BuilderOptions = {
  runner?: CommandRunner;
  reporter?: Reporter;
  /** Settings read from `.strata.yml`; the `STRATA_*` environment overrides them. */
  config?: StrataConfig;
  /** Settings overriding every other source (command-line flags). */
  overrides?: StrataConfig;
  /** Environment the `STRATA_*` variables are read from (default: process.env). */
  env?: Record<string, string | undefined>;
  /** Statistics store; defaults to `stats.json` in the cache directory. */
  stats?: FrequencyStore;
  /** Clock for cache recency and image timestamps. */
  now?: () => Date;
  /** Directory relative settings are resolved against (default: process.cwd()). */
  cwd?: string;
}

export type BuildOptions = {
  /** Build context directory, replacing the manifest's own. */
  context?: string;
  signal?: AbortSignal;
  /** Plan and report what would run without executing anything. */
  dryRun?: boolean;
}

/** A planned step with the cache state it would meet. */
export type PlanPreview = {
  manifest: BuildManifest;
  graph: StepGraph;
  plan: BuildPlan;
  steps: Array<{planned: PlannedStep; cached: boolean}>;
}

export type BuildResult = {
  plan: BuildPlan;
  /** Undefined for a dry run. */
  image?: Image;
  commandsRun: number;
}

/**
 * Programmatic entry point: manifest in, image out.
 *
 * A build loads the manifest, builds the step graph (cycles and unknown
 * references fail before anything is written), plans it against the
 * statistics of earlier builds, executes the plan and records the miss
 * rates of the steps it reached, whether the build succeeded or not. The
 * shell is only checked once a step actually has to run.
 *
 * @example
 * ```typescript
 * const builder = new Builder({overrides: {workdir: '/tmp/strata'}})
 * const {image} = await builder.build('./services/worker')
 * console.log(image?.rootfs)
 * ```
 */
export class Builder {
  readonly loader = new ManifestLoader()
  readonly settings: Settings
  private readonly runner: CommandRunner
  readonly reporter: Reporter
  private readonly stats: FrequencyStore
  private readonly now?: () => Date
  private readonly cwd: string

  constructor(options: BuilderOptions = {}) {
    const cwd = options.cwd ?? process.cwd()
    const settings = resolveSettings(options.config ?? {}, options.env ?? process.env, options.overrides)
    this.settings = {...settings, workdir: resolve(cwd, settings.workdir), cacheDir: resolve(cwd, settings.cacheDir)}
    this.runner = options.runner ?? new ShellCommandRunner({shell: this.settings.shell, maxOutputBytes: this.settings.maxOutputBytes})
    this.reporter = options.reporter ?? new ConsoleReporter({level: this.settings.logLevel})
    this.stats = options.stats ?? new FileFrequencyStore(this.settings.cacheDir)
    this.now = options.now
    this.cwd = cwd
  }

  /**
   * Plans a build without executing it.
   * @param manifestPath - Manifest file, or a directory containing one
   */
  async plan(manifestPath?: string, options?: Pick<BuildOptions, 'context'>): Promise<PlanPreview> {
    const manifest = await this.loadManifest(manifestPath, options?.context)
    const graph = buildGraph(manifest.steps)
    const engine = await FingerprintEngine.open(manifest.contextRoot)

    await this.stats.load()
    const plan = await this.planner().plan(manifest, graph, engine)

    const cache = await this.openCache()
    const steps: PlanPreview['steps'] = []
    for (const planned of plan.steps) {
      steps.push({planned, cached: await cache.has(planned.fingerprint)})
    }

    return {manifest, graph, plan, steps}
  }

  /**
   * Builds the image of a manifest.
   * @throws ManifestError, InputError before any step runs
   * @throws BuildError when a step fails or the build is cancelled
   */
  async build(manifestPath?: string, options?: BuildOptions): Promise<BuildResult> {
    if (options?.dryRun) {
      return this.dryRun(manifestPath, options)
    }

    const manifest = await this.loadManifest(manifestPath, options?.context)
    const graph = buildGraph(manifest.steps)
    const engine = await FingerprintEngine.open(manifest.contextRoot)

    await this.stats.load()
    const planner = this.planner()
    const plan = await planner.plan(manifest, graph, engine)

    const cache = await this.openCache()
    const workspace = await this.openWorkspace()

    const executor = new Executor({cache, workspace, runner: this.runner, reporter: this.reporter, now: this.now})
    const layers: ImageLayer[] = []
    try {
      const image = await executor.execute(plan, {
        signal: options?.signal,
        onLayer(layer) {
          layers.push(layer)
        }
      })
      return {plan, image, commandsRun: layers.filter(layer => !layer.cached).length}
    } finally {
      await this.recordHistory(planner, plan, layers)
    }
  }

  async listImages(): Promise<Image[]> {
    const workspace = await this.openWorkspace()
    return workspace.listImages()
  }

  async removeImage(imageId: string): Promise<void> {
    const workspace = await this.openWorkspace()
    await workspace.removeImage(imageId)
  }

  async listLayers(): Promise<CachedLayer[]> {
    const cache = await this.openCache()
    return cache.list()
  }

  /**
   * Evicts least recently used layers down to `maxSize` (default: the
   * configured bound).
   * @returns Keys of the evicted layers
   */
  async pruneCache(maxSize?: number): Promise<string[]> {
    const limit = maxSize ?? this.settings.maxCacheSize
    if (limit === undefined) {
      return []
    }

    const cache = await this.openCache()
    return cache.prune(limit)
  }

  /** Removes every layer and the build history. */
  async resetCache(): Promise<void> {
    const cache = await this.openCache()
    await cache.reset()
    await this.stats.clear()
  }

  private async dryRun(manifestPath: string | undefined, options: BuildOptions): Promise<BuildResult> {
    const {plan, steps} = await this.plan(manifestPath, options)
    this.reporter.emit({
      event: 'BUILD_START',
      manifestName: plan.manifestName,
      buildId: 'dry-run',
      steps: plan.steps.map(planned => stepRef(planned.step)),
      dryRun: true
    })

    for (const {planned, cached} of steps) {
      this.reporter.emit({
        event: cached ? 'STEP_CACHE_HIT' : 'STEP_WOULD_RUN',
        manifestName: plan.manifestName,
        step: stepRef(planned.step),
        fingerprint: planned.fingerprint
      })
    }

    const cachedSteps = steps.filter(step => step.cached).length
    this.reporter.emit({
      event: 'BUILD_FINISHED',
      manifestName: plan.manifestName,
      buildId: 'dry-run',
      commandsRun: 0,
      cachedSteps
    })
    return {plan, commandsRun: 0}
  }

  /** Records the reached steps; a failure to persist never changes the build's outcome. */
  private async recordHistory(planner: LayerPlanner, plan: BuildPlan, layers: readonly ImageLayer[]): Promise<void> {
    try {
      await planner.record(plan, layers)
    } catch (error: unknown) {
      this.reporter.emit({
        event: 'STATS_NOT_SAVED',
        manifestName: plan.manifestName,
        message: error instanceof Error ? error.message : String(error)
      })
    }
  }

  private async loadManifest(manifestPath: string | undefined, context: string | undefined): Promise<BuildManifest> {
    const file = await resolveManifestFile(resolve(this.cwd, manifestPath ?? '.'))
    const manifest = await this.loader.load(file)
    return context ? {...manifest, contextRoot: resolve(this.cwd, context)} : manifest
  }

  private planner(): LayerPlanner {
    return new LayerPlanner({
      store: this.stats,
      alpha: this.settings.missRateAlpha,
      reorderThreshold: this.settings.reorderThreshold
    })
  }

  private async openCache(): Promise<LayerCache> {
    return LayerCache.open(this.settings.cacheDir, {maxSize: this.settings.maxCacheSize, now: this.now})
  }

  private async openWorkspace(): Promise<BuildWorkspace> {
    const workspace = await BuildWorkspace.create(this.settings.workdir)
    await workspace.cleanupStaging()
    return workspace
  }
}
