import {baseDigest, type FingerprintEngine} from '../engine/fingerprint.js'
import type {BuildManifest, BuildPlan, ImageLayer, PlannedStep, Step} from '../types.js'
import {linearize, type StepGraph} from './dag.js'
import {DEFAULT_ALPHA, PRIOR_MISS_RATE, updateMissRate, type FrequencyStore, type StepStats} from './stats.js'

export const DEFAULT_REORDER_THRESHOLD = 0.05

export type LayerPlannerOptions = {
  store: FrequencyStore;
  /** Smoothing factor of miss rates (default 0.3). */
  alpha?: number;
  /** Rate difference under which declaration order is kept (default 0.05). */
  reorderThreshold?: number;
}

/**
 * Orders the steps of a build and assigns their fingerprints.
 *
 * ## Ordering
 *
 * The plan is one linearization of the step graph. At each position the
 * ready steps (all dependencies placed) are compared by historical miss
 * rate: the lowest rate `m` is found and, among ready steps whose rate is
 * at most `m + reorderThreshold`, the earliest declared one is placed.
 * Steps without history count as the prior rate. The graph's edges are
 * never crossed, so a stable step is only moved ahead of steps it does not
 * depend on.
 *
 * ## Fingerprints
 *
 * Fingerprints are chained along the plan: the first step chains on the
 * digest of the manifest's base, every other step on the fingerprint of
 * the step placed before it. A change to any step therefore invalidates
 * every step after it.
 */
export class LayerPlanner {
  private readonly store: FrequencyStore
  private readonly alpha: number
  private readonly reorderThreshold: number

  constructor(options: LayerPlannerOptions) {
    this.store = options.store
    this.alpha = options.alpha ?? DEFAULT_ALPHA
    this.reorderThreshold = options.reorderThreshold ?? DEFAULT_REORDER_THRESHOLD
  }

  /** Statistics key of a step; manifests sharing a cache keep separate histories. */
  static statsKey(manifestName: string, stepId: string): string {
    return `${manifestName}:${stepId}`
  }

  /** Miss rate the planner uses for a step. */
  missRate(manifestName: string, stepId: string): number {
    return this.store.get(LayerPlanner.statsKey(manifestName, stepId))?.missRate ?? PRIOR_MISS_RATE
  }

  /** Execution order of the manifest's steps. */
  order(manifest: BuildManifest, graph: StepGraph): Step[] {
    return linearize(graph, ready => {
      const rates = ready.map(step => this.missRate(manifest.name, step.id))
      const lowest = Math.min(...rates)
      const index = rates.findIndex(rate => rate <= lowest + this.reorderThreshold + 1e-9)
      return ready[index]
    })
  }

  /**
   * Produces the plan of one build.
   * @throws InputNotFoundError when a required input matches nothing
   */
  async plan(manifest: BuildManifest, graph: StepGraph, engine: FingerprintEngine): Promise<BuildPlan> {
    const base = baseDigest(manifest.base)
    const steps: PlannedStep[] = []
    const produced: string[] = []
    let predecessor = base

    for (const [position, step] of this.order(manifest, graph).entries()) {
      const options = {stepId: step.id, produced, command: step.command, env: step.env}
      const inputFiles = engine.resolve(step.inputs, options)
      const fingerprint = await engine.fingerprint(step.inputs, predecessor, options)
      const inputDigest = await engine.fingerprint(step.inputs, '', options)

      steps.push({
        step,
        position,
        fingerprint,
        predecessor,
        inputDigest,
        inputFiles,
        missRate: this.store.get(LayerPlanner.statsKey(manifest.name, step.id))?.missRate
      })

      produced.push(...step.outputs ?? [])
      predecessor = fingerprint
    }

    return {
      manifestName: manifest.name,
      contextRoot: manifest.contextRoot,
      baseDigest: base,
      steps
    }
  }

  /**
   * Updates miss rates with the layers a build applied, then persists them.
   * Steps the build never reached keep their history.
   *
   * A step counts as missed when its own input digest differs from the one
   * recorded by its previous build. Chained fingerprints are not compared:
   * a stable step planned after a volatile one would miss on every build
   * and never move ahead of it.
   */
  async record(plan: BuildPlan, layers: readonly ImageLayer[]): Promise<void> {
    const digests = new Map(plan.steps.map(planned => [planned.step.id, planned.inputDigest]))
    const updates = new Map<string, StepStats>()

    for (const layer of layers) {
      const key = LayerPlanner.statsKey(plan.manifestName, layer.stepId)
      const previous = this.store.get(key)
      const inputDigest = digests.get(layer.stepId)
      const changed = inputDigest === undefined ? !layer.cached : previous?.inputDigest !== inputDigest
      updates.set(key, {
        missRate: updateMissRate(previous?.missRate, changed, this.alpha),
        builds: (previous?.builds ?? 0) + 1,
        ...(inputDigest === undefined ? {} : {inputDigest})
      })
    }

    await this.store.update(updates)
  }
}
