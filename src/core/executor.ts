import {createHash} from 'node:crypto'
import {BuildCancelledError, BuildError, CommandFailedError, StrataError} from '../errors.js'
import type {CommandRunner, RunCommandResult} from '../engine/command-runner.js'
import {applyDelta, copyInputs, diffSnapshots, snapshot} from '../engine/filesystem.js'
import type {LayerCache} from '../engine/layer-cache.js'
import type {BuildWorkspace} from '../engine/workspace.js'
import type {BuildPlan, Fingerprint, Image, ImageLayer, PlannedStep} from '../types.js'
import {stepRef, type Reporter} from './reporter.js'
import {StepStateMachine} from './step-state.js'

export type ExecutorOptions = {
  cache: LayerCache;
  workspace: BuildWorkspace;
  runner: CommandRunner;
  reporter: Reporter;
  /** Clock for image timestamps and step durations. */
  now?: () => Date;
}

export type ExecuteOptions = {
  /** Aborting stops the build: the running command is killed and no image is committed. */
  signal?: AbortSignal;
  /** Called each time a step reaches `applied`. */
  onLayer?: (layer: ImageLayer) => void;
}

/** Identifier of the image made of these layers, in order. */
export function imageId(layers: readonly ImageLayer[]): string {
  const hash = createHash('sha256')
  for (const layer of layers) {
    hash.update(`${layer.fingerprint}\n`)
  }

  return hash.digest('hex')
}

/**
 * Walks a build plan in order and produces an image.
 *
 * The image root lives in the workspace staging area while the build runs.
 * For every planned step:
 * - **hit**: the layer's removed paths are deleted from the root and its
 *   archive extracted
 * - **miss**: the step's input files are copied into the root, the command
 *   runs with the root as working directory, and the difference between the
 *   root before the copy and after the command is stored as the step's
 *   layer, on top of the previous step's layer
 *
 * Every layer used by the build is retained in the cache until the build
 * ends. A failure or cancellation discards the root: a build yields a full
 * image or none, while layers stored before the failure stay in the cache.
 */
export class Executor {
  private readonly now: () => Date
  private runnerReady?: Promise<void>

  constructor(private readonly options: ExecutorOptions) {
    this.now = options.now ?? (() => new Date())
  }

  /**
   * @throws CommandFailedError when a command exits non-zero
   * @throws BuildCancelledError when the signal is aborted
   */
  async execute(plan: BuildPlan, options?: ExecuteOptions): Promise<Image> {
    const {workspace, cache, reporter} = this.options
    const signal = options?.signal
    const buildId = workspace.generateBuildId()
    const machine = new StepStateMachine(plan.steps.map(planned => planned.step.id))
    const releases: Array<() => void> = []
    const layers: ImageLayer[] = []
    let commandsRun = 0
    let current: PlannedStep | undefined

    reporter.emit({
      event: 'BUILD_START',
      manifestName: plan.manifestName,
      buildId,
      steps: plan.steps.map(planned => stepRef(planned.step))
    })

    try {
      const rootfs = await workspace.prepareBuild(buildId)
      let parent: Fingerprint | undefined

      for (const planned of plan.steps) {
        current = planned
        if (signal?.aborted) {
          throw new BuildCancelledError(planned.step.id, {cause: signal.reason})
        }

        const ref = stepRef(planned.step)
        const lookup = await cache.lookup(planned.fingerprint)
        if (lookup.status === 'corrupt') {
          reporter.emit({
            event: 'STEP_CACHE_CORRUPTED',
            manifestName: plan.manifestName,
            step: ref,
            fingerprint: planned.fingerprint,
            reason: lookup.error.message
          })
        }

        if (lookup.status === 'hit') {
          machine.transition(planned.step.id, 'cache-hit')
          releases.push(cache.retain(planned.fingerprint))
          reporter.emit({event: 'STEP_CACHE_HIT', manifestName: plan.manifestName, step: ref, fingerprint: planned.fingerprint})

          await applyDelta(rootfs, lookup.layer.delta, lookup.layer.archivePath)
          machine.transition(planned.step.id, 'applied')
          reporter.emit({
            event: 'STEP_APPLIED',
            manifestName: plan.manifestName,
            step: ref,
            fingerprint: planned.fingerprint,
            cached: true,
            layerSize: lookup.layer.size
          })
        } else {
          machine.transition(planned.step.id, 'cache-miss')
          reporter.emit({event: 'STEP_CACHE_MISS', manifestName: plan.manifestName, step: ref, fingerprint: planned.fingerprint})

          await this.runStep(plan, planned, {rootfs, parent, machine, signal})
          releases.push(cache.retain(planned.fingerprint))
          commandsRun++
        }

        const layer: ImageLayer = {stepId: planned.step.id, fingerprint: planned.fingerprint, cached: lookup.status === 'hit'}
        layers.push(layer)
        options?.onLayer?.(layer)
        parent = planned.fingerprint
      }

      current = undefined
      const image = await workspace.commitImage(buildId, {
        id: imageId(layers),
        manifestName: plan.manifestName,
        createdAt: this.now().toISOString(),
        layers
      })

      reporter.emit({
        event: 'BUILD_FINISHED',
        manifestName: plan.manifestName,
        buildId,
        imageId: image.id,
        commandsRun,
        cachedSteps: layers.length - commandsRun
      })
      return image
    } catch (error: unknown) {
      await workspace.discardBuild(buildId)
      reporter.emit({
        event: 'BUILD_FAILED',
        manifestName: plan.manifestName,
        buildId,
        stepId: current?.step.id,
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    } finally {
      for (const release of releases) {
        release()
      }
    }
  }

  private async runStep(
    plan: BuildPlan,
    planned: PlannedStep,
    {rootfs, parent, machine, signal}: {rootfs: string; parent?: Fingerprint; machine: StepStateMachine; signal?: AbortSignal}
  ): Promise<void> {
    const {cache, runner, reporter} = this.options
    const {step} = planned
    const ref = stepRef(step)

    const before = await snapshot(rootfs)
    await copyInputs(plan.contextRoot, planned.inputFiles, rootfs)

    machine.transition(step.id, 'running')
    reporter.emit({event: 'STEP_STARTING', manifestName: plan.manifestName, step: ref})

    const fail = (message: string, exitCode?: number) => {
      machine.transition(step.id, 'failed')
      reporter.emit({event: 'STEP_FAILED', manifestName: plan.manifestName, step: ref, exitCode, message})
    }

    const startedAt = this.now()
    let result: RunCommandResult
    try {
      await this.ensureRunner()
      result = await runner.run(
        {stepId: step.id, command: step.command, cwd: rootfs, env: step.env, signal},
        ({stream, line}) => {
          reporter.emit({event: 'STEP_LOG', manifestName: plan.manifestName, step: ref, stream, line})
        }
      )
    } catch (error: unknown) {
      fail(error instanceof Error ? error.message : String(error))
      throw error instanceof StrataError ? error : new BuildError('COMMAND_ERROR', `Step ${step.id}: command could not be run`, {cause: error})
    }

    const {exitCode, stdout, stderr} = result
    if (exitCode !== 0) {
      const error = new CommandFailedError(step.id, step.command, exitCode, stdout, stderr)
      fail(error.message, exitCode)
      throw error
    }

    if (signal?.aborted) {
      const error = new BuildCancelledError(step.id, {cause: signal.reason})
      fail(error.message)
      throw error
    }

    const delta = diffSnapshots(before, await snapshot(rootfs))
    const layer = await cache.put(planned.fingerprint, {stepId: step.id, delta, sourceRoot: rootfs, parent})

    machine.transition(step.id, 'applied')
    reporter.emit({
      event: 'STEP_APPLIED',
      manifestName: plan.manifestName,
      step: ref,
      fingerprint: planned.fingerprint,
      cached: false,
      durationMs: this.now().getTime() - startedAt.getTime(),
      layerSize: layer.size
    })
  }

  /** Checks the runner once, on the first step that has to run a command. */
  private async ensureRunner(): Promise<void> {
    if (!this.runnerReady) {
      this.runnerReady = this.options.runner.check()
    }

    await this.runnerReady
  }
}
