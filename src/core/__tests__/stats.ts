import {readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {FileFrequencyStore, MemoryFrequencyStore, PRIOR_MISS_RATE, updateMissRate} from '../stats.js'
import {createTmpDir} from '../../__tests__/helpers.js'

function near(actual: number, expected: number): boolean {
  return Math.abs(actual - expected) < 1e-9
}

// -- updateMissRate -----------------------------------------------------------

test('updateMissRate starts from the prior', t => {
  t.is(PRIOR_MISS_RATE, 0.5)
  t.true(near(updateMissRate(undefined, true, 0.3), 0.65))
  t.true(near(updateMissRate(undefined, false, 0.3), 0.35))
})

test('updateMissRate moves towards 0 on hits and 1 on misses', t => {
  t.is(updateMissRate(0.5, false, 0.5), 0.25)
  t.is(updateMissRate(0.5, true, 0.5), 0.75)
  t.is(updateMissRate(0.2, true, 1), 1)
})

// -- MemoryFrequencyStore -----------------------------------------------------

test('MemoryFrequencyStore keeps initial entries and clears', async t => {
  const store = new MemoryFrequencyStore({'app:deps': {missRate: 0.1, builds: 4}})
  await store.load()
  t.deepEqual(store.get('app:deps'), {missRate: 0.1, builds: 4})

  await store.update(new Map([['app:copy', {missRate: 0.9, builds: 1}]]))
  t.is(store.get('app:copy')?.missRate, 0.9)
  t.is(store.get('app:deps')?.missRate, 0.1)

  await store.clear()
  t.is(store.get('app:deps'), undefined)
})

// -- FileFrequencyStore -------------------------------------------------------

test('FileFrequencyStore starts empty when stats.json is missing', async t => {
  const store = new FileFrequencyStore(await createTmpDir())
  await store.load()
  t.is(store.get('app:deps'), undefined)
})

test('FileFrequencyStore saves and reloads statistics', async t => {
  const root = await createTmpDir()
  const store = new FileFrequencyStore(root)
  await store.update(new Map([['app:deps', {missRate: 0.35, builds: 2, inputDigest: 'abc'}]]))
  t.is(store.get('app:deps')?.builds, 2)

  const reloaded = new FileFrequencyStore(root)
  await reloaded.load()
  t.deepEqual(reloaded.get('app:deps'), {missRate: 0.35, builds: 2, inputDigest: 'abc'})

  const document: unknown = JSON.parse(await readFile(join(root, 'stats.json'), 'utf8'))
  t.deepEqual(document, {steps: {'app:deps': {missRate: 0.35, builds: 2, inputDigest: 'abc'}}})
})

test('FileFrequencyStore keeps entries another store saved meanwhile', async t => {
  const root = await createTmpDir()
  const first = new FileFrequencyStore(root)
  const second = new FileFrequencyStore(root)
  await first.load()
  await second.load()

  await first.update(new Map([['api:deps', {missRate: 0.65, builds: 1}]]))
  await second.update(new Map([['worker:deps', {missRate: 0.35, builds: 1}]]))

  const reloaded = new FileFrequencyStore(root)
  await reloaded.load()
  t.deepEqual(reloaded.get('api:deps'), {missRate: 0.65, builds: 1})
  t.deepEqual(reloaded.get('worker:deps'), {missRate: 0.35, builds: 1})
})

test('FileFrequencyStore survives concurrent updates of one file', async t => {
  const root = await createTmpDir()
  const services = ['api', 'worker', 'billing', 'mailer', 'search', 'reports']
  await Promise.all(services.map(async service => {
    const store = new FileFrequencyStore(root)
    await store.load()
    await store.update(new Map([[`${service}:deps`, {missRate: 0.65, builds: 1}]]))
  }))

  const reloaded = new FileFrequencyStore(root)
  await reloaded.load()
  t.deepEqual(services.map(service => reloaded.get(`${service}:deps`)?.builds), [1, 1, 1, 1, 1, 1])
})

test('FileFrequencyStore ignores an unreadable document', async t => {
  const root = await createTmpDir()
  await writeFile(join(root, 'stats.json'), 'not json')
  const store = new FileFrequencyStore(root)
  await store.load()
  t.is(store.get('app:deps'), undefined)
})

test('FileFrequencyStore drops malformed entries', async t => {
  const root = await createTmpDir()
  await writeFile(join(root, 'stats.json'), JSON.stringify({
    steps: {
      'app:ok': {missRate: 0.2, builds: 1},
      'app:out-of-range': {missRate: 3, builds: 1},
      'app:no-builds': {missRate: 0.2}
    }
  }))
  const store = new FileFrequencyStore(root)
  await store.load()
  t.deepEqual(store.get('app:ok'), {missRate: 0.2, builds: 1})
  t.is(store.get('app:out-of-range'), undefined)
  t.is(store.get('app:no-builds'), undefined)
})

test('FileFrequencyStore clear removes the file', async t => {
  const root = await createTmpDir()
  const store = new FileFrequencyStore(root)
  await store.update(new Map([['app:deps', {missRate: 0.5, builds: 1}]]))
  await store.clear()

  const reloaded = new FileFrequencyStore(root)
  await reloaded.load()
  t.is(reloaded.get('app:deps'), undefined)
})
