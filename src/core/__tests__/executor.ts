import {createHash} from 'node:crypto'
import {access, copyFile, mkdir, readFile, readdir, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {FingerprintEngine} from '../../engine/fingerprint.js'
import {LayerCache} from '../../engine/layer-cache.js'
import {BuildWorkspace} from '../../engine/workspace.js'
import {BuildCancelledError, CommandFailedError} from '../../errors.js'
import type {BuildPlan, ManifestDefinition} from '../../types.js'
import {buildGraph} from '../dag.js'
import {Executor, imageId} from '../executor.js'
import {ManifestLoader} from '../manifest-loader.js'
import {LayerPlanner} from '../planner.js'
import {MemoryFrequencyStore} from '../stats.js'
import {FakeCommandRunner, createTmpDir, recordingReporter, steppingClock, writeTree, type FakeCommand} from '../../__tests__/helpers.js'

const installDeps: FakeCommand = async (cwd, log) => {
  await mkdir(join(cwd, '.venv/lib'), {recursive: true})
  await copyFile(join(cwd, 'requirements.txt'), join(cwd, '.venv/lib/packages.txt'))
  log({stream: 'stdout', line: 'Installed 1 package'})
}

const copySource: FakeCommand = async cwd => {
  await mkdir(join(cwd, 'app'), {recursive: true})
  await copyFile(join(cwd, 'src/main.py'), join(cwd, 'app/main.py'))
}

const workerSteps: ManifestDefinition['steps'] = [
  {id: 'install-deps', inputs: ['requirements.txt'], outputs: ['.venv'], run: 'uv pip install -r requirements.txt'},
  {id: 'copy-source', inputs: ['src/'], outputs: ['app'], run: 'cp -r src app'}
]

async function setup(commands: Record<string, FakeCommand>, steps = workerSteps) {
  const root = await createTmpDir()
  const context = join(root, 'context')
  await writeTree(context, {'requirements.txt': 'flask==3.0.0\n', 'src/main.py': 'print("hi")\n'})

  const manifest = new ManifestLoader().fromDefinition({name: 'worker', steps}, context)
  const planner = new LayerPlanner({store: new MemoryFrequencyStore()})
  const plan = async (): Promise<BuildPlan> =>
    planner.plan(manifest, buildGraph(manifest.steps), await FingerprintEngine.open(context))

  const cache = await LayerCache.open(join(root, 'cache'), {now: steppingClock()})
  const workspace = await BuildWorkspace.create(join(root, 'work'))
  const runner = new FakeCommandRunner(commands)
  const {reporter, events} = recordingReporter()
  const executor = (): Executor => new Executor({cache, workspace, runner, reporter, now: steppingClock()})

  return {root, plan, cache, workspace, runner, events, executor}
}

const workerCommands = {
  'uv pip install -r requirements.txt': installDeps,
  'cp -r src app': copySource
}

// -- imageId ------------------------------------------------------------------

test('imageId hashes the layer fingerprints in order', t => {
  const a = {stepId: 'a', fingerprint: 'a'.repeat(64), cached: false}
  const b = {stepId: 'b', fingerprint: 'b'.repeat(64), cached: true}
  const expected = createHash('sha256').update(`${'a'.repeat(64)}\n${'b'.repeat(64)}\n`).digest('hex')
  t.is(imageId([a, b]), expected)
  t.not(imageId([b, a]), expected)
})

// -- cold and warm builds -----------------------------------------------------

test('a cold build runs every command and commits the image', async t => {
  const {plan, runner, events, executor} = await setup(workerCommands)
  const buildPlan = await plan()
  const image = await executor().execute(buildPlan)

  t.deepEqual(runner.commandsRun, ['uv pip install -r requirements.txt', 'cp -r src app'])
  t.deepEqual(events.map(event => event.event), [
    'BUILD_START',
    'STEP_CACHE_MISS',
    'STEP_STARTING',
    'STEP_LOG',
    'STEP_APPLIED',
    'STEP_CACHE_MISS',
    'STEP_STARTING',
    'STEP_APPLIED',
    'BUILD_FINISHED'
  ])

  t.deepEqual(image.layers, [
    {stepId: 'install-deps', fingerprint: buildPlan.steps[0].fingerprint, cached: false},
    {stepId: 'copy-source', fingerprint: buildPlan.steps[1].fingerprint, cached: false}
  ])
  t.is(image.id, imageId(image.layers))
  t.is(image.manifestName, 'worker')
  t.is(image.createdAt, '2024-01-01T00:00:04.000Z')
  t.is(await readFile(join(image.rootfs, 'app/main.py'), 'utf8'), 'print("hi")\n')
  t.is(await readFile(join(image.rootfs, '.venv/lib/packages.txt'), 'utf8'), 'flask==3.0.0\n')
  t.is(await readFile(join(image.rootfs, 'requirements.txt'), 'utf8'), 'flask==3.0.0\n')
})

test('applied misses report their duration and the finished build its counts', async t => {
  const {plan, events, executor} = await setup(workerCommands)
  const image = await executor().execute(await plan())

  const applied = events.filter(event => event.event === 'STEP_APPLIED')
  t.deepEqual(applied.map(event => event.event === 'STEP_APPLIED' && event.durationMs), [1000, 1000])

  const finished = events.at(-1)
  t.deepEqual(finished?.event === 'BUILD_FINISHED' && {...finished, buildId: ''}, {
    event: 'BUILD_FINISHED',
    manifestName: 'worker',
    buildId: '',
    imageId: image.id,
    commandsRun: 2,
    cachedSteps: 0
  })
})

test('a warm build replays every layer without running commands', async t => {
  const {plan, runner, events, executor} = await setup(workerCommands)
  const first = await executor().execute(await plan())
  events.length = 0

  const second = await executor().execute(await plan())
  t.is(runner.runCount, 2)
  t.is(second.id, first.id)
  t.deepEqual(second.layers.map(layer => layer.cached), [true, true])
  t.deepEqual(events.map(event => event.event), [
    'BUILD_START',
    'STEP_CACHE_HIT',
    'STEP_APPLIED',
    'STEP_CACHE_HIT',
    'STEP_APPLIED',
    'BUILD_FINISHED'
  ])
  t.is(await readFile(join(second.rootfs, 'app/main.py'), 'utf8'), 'print("hi")\n')
  t.is(await readFile(join(second.rootfs, '.venv/lib/packages.txt'), 'utf8'), 'flask==3.0.0\n')
})

test('stored layers hold the step delta', async t => {
  const {plan, cache, executor} = await setup(workerCommands)
  const buildPlan = await plan()
  await executor().execute(buildPlan)

  const install = await cache.get(buildPlan.steps[0].fingerprint)
  t.deepEqual(install?.delta, {
    added: ['.venv', '.venv/lib', '.venv/lib/packages.txt', 'requirements.txt'],
    modified: [],
    removed: []
  })
  t.is(install?.parent, undefined)

  const copy = await cache.get(buildPlan.steps[1].fingerprint)
  t.deepEqual(copy?.delta.added, ['app', 'app/main.py', 'src', 'src/main.py'])
  t.is(copy?.parent, buildPlan.steps[0].fingerprint)
})

test('a replayed layer removes the paths its step deleted', async t => {
  const {plan, executor} = await setup({
    'uv pip install -r requirements.txt': async (cwd, log) => {
      await installDeps(cwd, log)
      await writeFile(join(cwd, '.venv/build.log'), 'scratch')
    },
    'rm .venv/build.log': async cwd => {
      await rm(join(cwd, '.venv/build.log'))
    }
  }, [
    workerSteps[0],
    {id: 'clean', outputs: ['.venv'], run: 'rm .venv/build.log'}
  ])

  await executor().execute(await plan())
  const image = await executor().execute(await plan())

  t.deepEqual(image.layers.map(layer => layer.cached), [true, true])
  t.deepEqual(await readdir(join(image.rootfs, '.venv')), ['lib'])
})

// -- failures -----------------------------------------------------------------

test('a failing command discards the build and keeps earlier layers', async t => {
  const {root, plan, cache, workspace, events, executor} = await setup({
    'uv pip install -r requirements.txt': installDeps,
    'cp -r src app': async (_cwd, log) => {
      log({stream: 'stderr', line: 'cp: src: permission denied'})
      return 2
    }
  })
  const buildPlan = await plan()

  const error = await t.throwsAsync(executor().execute(buildPlan), {instanceOf: CommandFailedError})
  t.is(error?.exitCode, 2)
  t.is(error?.stderr, 'cp: src: permission denied\n')

  t.deepEqual(await workspace.listImages(), [])
  t.deepEqual(await readdir(join(root, 'work', 'staging')), [])
  t.true(await cache.has(buildPlan.steps[0].fingerprint))
  t.false(await cache.has(buildPlan.steps[1].fingerprint))

  const [failed, buildFailed] = events.slice(-2)
  t.deepEqual(failed, {
    event: 'STEP_FAILED',
    manifestName: 'worker',
    step: {id: 'copy-source', displayName: 'copy-source'},
    exitCode: 2,
    message: 'Step copy-source failed with exit code 2'
  })
  t.is(buildFailed.event, 'BUILD_FAILED')
  t.is(buildFailed.event === 'BUILD_FAILED' && buildFailed.stepId, 'copy-source')
})

test('an aborted signal stops the build before the next step', async t => {
  const {plan, workspace, runner, events, executor} = await setup(workerCommands)
  const controller = new AbortController()
  controller.abort()

  const error = await t.throwsAsync(executor().execute(await plan(), {signal: controller.signal}), {instanceOf: BuildCancelledError})
  t.is(error?.stepId, 'install-deps')
  t.is(runner.runCount, 0)
  t.deepEqual(await workspace.listImages(), [])
  t.is(events.at(-1)?.event, 'BUILD_FAILED')
})

test('cancelling while a command runs discards its layer', async t => {
  const controller = new AbortController()
  const {root, plan, cache, workspace, events, executor} = await setup({
    ...workerCommands,
    async 'uv pip install -r requirements.txt'(cwd, log) {
      await installDeps(cwd, log)
      controller.abort(new Error('Interrupted'))
    }
  })
  const buildPlan = await plan()

  const error = await t.throwsAsync(executor().execute(buildPlan, {signal: controller.signal}), {instanceOf: BuildCancelledError})
  t.is(error?.stepId, 'install-deps')
  t.false(await cache.has(buildPlan.steps[0].fingerprint))
  t.deepEqual(await readdir(join(root, 'work', 'staging')), [])
  t.deepEqual(await workspace.listImages(), [])

  const [failed, buildFailed] = events.slice(-2)
  t.deepEqual(failed, {
    event: 'STEP_FAILED',
    manifestName: 'worker',
    step: {id: 'install-deps', displayName: 'install-deps'},
    exitCode: undefined,
    message: 'Build cancelled while running step install-deps'
  })
  t.is(buildFailed.event, 'BUILD_FAILED')
})

test('a corrupt layer is reported and rebuilt', async t => {
  const {plan, cache, runner, events, executor} = await setup(workerCommands)
  const buildPlan = await plan()
  await executor().execute(buildPlan)
  await writeFile(join(cache.entryPath(buildPlan.steps[0].fingerprint), 'layer.tgz'), 'garbage')
  events.length = 0

  const image = await executor().execute(await plan())
  t.deepEqual(runner.commandsRun, [
    'uv pip install -r requirements.txt',
    'cp -r src app',
    'uv pip install -r requirements.txt'
  ])
  t.deepEqual(image.layers.map(layer => layer.cached), [false, true])

  const corrupted = events.find(event => event.event === 'STEP_CACHE_CORRUPTED')
  t.is(corrupted?.event === 'STEP_CACHE_CORRUPTED' && corrupted.reason,
    `Cache entry ${buildPlan.steps[0].fingerprint} failed verification: layer archive digest mismatch`)
  await t.notThrowsAsync(access(join(image.rootfs, '.venv/lib/packages.txt')))
})
