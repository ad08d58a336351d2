import test from 'ava'
import {StepStateMachine, isTerminal} from '../step-state.js'
import {IllegalTransitionError} from '../../errors.js'

test('steps start pending', t => {
  const machine = new StepStateMachine(['deps', 'copy'])
  t.deepEqual(machine.snapshot(), {deps: 'pending', copy: 'pending'})
})

test('a cache hit goes straight to applied', t => {
  const machine = new StepStateMachine(['deps'])
  machine.transition('deps', 'cache-hit')
  machine.transition('deps', 'applied')
  t.is(machine.get('deps'), 'applied')
})

test('a cache miss runs then applies or fails', t => {
  const machine = new StepStateMachine(['deps', 'copy'])
  machine.transition('deps', 'cache-miss')
  machine.transition('deps', 'running')
  machine.transition('deps', 'applied')
  machine.transition('copy', 'cache-miss')
  machine.transition('copy', 'running')
  machine.transition('copy', 'failed')
  t.deepEqual(machine.snapshot(), {deps: 'applied', copy: 'failed'})
})

test('illegal transitions throw', t => {
  const machine = new StepStateMachine(['deps'])
  const error = t.throws(() => {
    machine.transition('deps', 'running')
  }, {instanceOf: IllegalTransitionError})
  t.is(error?.message, 'Step deps: cannot move from pending to running')

  machine.transition('deps', 'cache-hit')
  t.throws(() => {
    machine.transition('deps', 'failed')
  }, {instanceOf: IllegalTransitionError})
})

test('terminal states accept no transition', t => {
  const machine = new StepStateMachine(['deps'])
  machine.transition('deps', 'cache-hit')
  machine.transition('deps', 'applied')
  t.throws(() => {
    machine.transition('deps', 'cache-miss')
  }, {instanceOf: IllegalTransitionError})
})

test('unknown steps throw', t => {
  const machine = new StepStateMachine(['deps'])
  t.throws(() => machine.get('ghost'), {instanceOf: IllegalTransitionError})
})

test('isTerminal', t => {
  t.true(isTerminal('applied'))
  t.true(isTerminal('failed'))
  t.false(isTerminal('running'))
  t.false(isTerminal('pending'))
})
