import test from 'ava'
import {buildGraph, dependenciesOf, dependentsOf, linearize, topologicalOrder} from '../dag.js'
import {CycleDetectedError, StepNotFoundError} from '../../errors.js'
import type {Step} from '../../types.js'

let declared = 0

function step(id: string, options: {inputs?: string[]; outputs?: string[]; after?: string[]} = {}): Step {
  return {
    id,
    command: `build ${id}`,
    env: {},
    inputs: (options.inputs ?? []).map(pattern => ({pattern, optional: false})),
    outputs: options.outputs,
    after: options.after ?? [],
    orderHint: declared++
  }
}

function ids(steps: Step[]): string[] {
  return steps.map(s => s.id)
}

// -- edges --------------------------------------------------------------------

test('independent steps with declared outputs have no edges', t => {
  const graph = buildGraph([
    step('deps', {inputs: ['requirements.txt'], outputs: ['.venv']}),
    step('copy', {inputs: ['src/'], outputs: ['app']})
  ])
  t.deepEqual(graph.edges, [])
})

test('an opaque step is a barrier to the steps around it', t => {
  const graph = buildGraph([
    step('deps', {outputs: ['.venv']}),
    step('setup'),
    step('copy', {outputs: ['app']})
  ])
  t.deepEqual(graph.edges, [
    {producer: 'deps', consumer: 'setup', via: '*', reason: 'barrier'},
    {producer: 'setup', consumer: 'copy', via: '*', reason: 'barrier'}
  ])
  t.deepEqual(ids(topologicalOrder(graph)), ['deps', 'setup', 'copy'])
})

test('an output read by a later step links producer to consumer', t => {
  const graph = buildGraph([
    step('deps', {inputs: ['requirements.txt'], outputs: ['.venv']}),
    step('test', {inputs: ['.venv/'], outputs: ['reports']})
  ])
  t.deepEqual(graph.edges, [{producer: 'deps', consumer: 'test', via: '.venv', reason: 'output-input'}])
})

test('an output read by an earlier declared step puts the writer first', t => {
  const graph = buildGraph([
    step('package', {inputs: ['app/**/*.py'], outputs: ['dist']}),
    step('copy', {inputs: ['src/'], outputs: ['app']})
  ])
  t.deepEqual(graph.edges, [{producer: 'copy', consumer: 'package', via: 'app', reason: 'output-input'}])
  t.deepEqual(ids(topologicalOrder(graph)), ['copy', 'package'])
})

test('overlapping outputs keep declaration order', t => {
  const graph = buildGraph([
    step('build', {outputs: ['dist']}),
    step('extras', {outputs: ['dist/extras']})
  ])
  t.deepEqual(graph.edges, [{producer: 'build', consumer: 'extras', via: 'dist', reason: 'output-output'}])
})

test('negated inputs do not create edges', t => {
  const graph = buildGraph([
    step('gen', {outputs: ['src/tests']}),
    step('copy', {inputs: ['!src/tests/'], outputs: ['app']})
  ])
  t.deepEqual(graph.edges, [])
})

test('after references become edges', t => {
  const graph = buildGraph([
    step('migrate', {outputs: ['db'], after: ['deps']}),
    step('deps', {outputs: ['.venv']})
  ])
  t.deepEqual(graph.edges, [{producer: 'deps', consumer: 'migrate', via: '*', reason: 'after'}])
  t.deepEqual(ids(topologicalOrder(graph)), ['deps', 'migrate'])
})

test('a pair is linked once even when several rules apply', t => {
  const graph = buildGraph([
    step('deps', {outputs: ['.venv']}),
    step('test', {inputs: ['.venv/'], outputs: ['.venv/reports'], after: ['deps']})
  ])
  t.is(graph.edges.length, 1)
  t.deepEqual([...graph.dependencies.get('test') ?? []], ['deps'])
})

test('dependenciesOf and dependentsOf select edges by side', t => {
  const graph = buildGraph([
    step('deps', {outputs: ['.venv']}),
    step('test', {inputs: ['.venv/'], outputs: ['reports']}),
    step('lint', {inputs: ['.venv/'], outputs: ['lint']})
  ])
  t.deepEqual(dependenciesOf(graph, 'test').map(edge => edge.producer), ['deps'])
  t.deepEqual(dependentsOf(graph, 'deps').map(edge => edge.consumer), ['test', 'lint'])
})

// -- validation ---------------------------------------------------------------

test('after naming an unknown step throws StepNotFoundError', t => {
  const error = t.throws(() => buildGraph([step('a', {outputs: ['x'], after: ['ghost']})]), {instanceOf: StepNotFoundError})
  t.is(error?.message, 'Step a: declared dependency \'ghost\' is not a step of this manifest')
})

test('mutual after references throw CycleDetectedError', t => {
  const error = t.throws(() => buildGraph([
    step('a', {after: ['b']}),
    step('b', {after: ['a']})
  ]), {instanceOf: CycleDetectedError})
  t.deepEqual(error?.cycle, ['b', 'a', 'b'])
  t.is(error?.message, 'Build steps form a dependency cycle: b -> a -> b')
  t.is(error?.code, 'CYCLE_DETECTED')
})

test('outputs feeding each other form a cycle', t => {
  t.throws(() => buildGraph([
    step('a', {inputs: ['y/'], outputs: ['x']}),
    step('b', {inputs: ['x/'], outputs: ['y']})
  ]), {instanceOf: CycleDetectedError})
})

// -- linearize ----------------------------------------------------------------

test('topologicalOrder keeps declaration order when nothing constrains it', t => {
  const graph = buildGraph([
    step('a', {outputs: ['a']}),
    step('b', {outputs: ['b']}),
    step('c', {outputs: ['c']})
  ])
  t.deepEqual(ids(topologicalOrder(graph)), ['a', 'b', 'c'])
})

test('linearize lets the picker choose among ready steps', t => {
  const graph = buildGraph([
    step('a', {outputs: ['a']}),
    step('b', {inputs: ['a/'], outputs: ['b']}),
    step('c', {outputs: ['c']})
  ])
  const order = linearize(graph, ready => ready.at(-1) ?? ready[0])
  t.deepEqual(ids(order), ['c', 'a', 'b'])
})
