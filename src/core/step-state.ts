import {IllegalTransitionError} from '../errors.js'

/**
 * Execution state of one planned step.
 *
 * ```
 * pending ─┬─> cache-hit ──────────────> applied
 *          └─> cache-miss ─> running ─┬─> applied
 *                                     └─> failed
 * ```
 */
export type StepState = 'pending' | 'cache-hit' | 'cache-miss' | 'running' | 'applied' | 'failed'

const transitions: Record<StepState, readonly StepState[]> = {
  pending: ['cache-hit', 'cache-miss'],
  'cache-hit': ['applied'],
  'cache-miss': ['running'],
  running: ['applied', 'failed'],
  applied: [],
  failed: []
}

export function isTerminal(state: StepState): boolean {
  return transitions[state].length === 0
}

/**
 * Tracks the states of every step of a build and rejects illegal moves.
 */
export class StepStateMachine {
  private readonly states = new Map<string, StepState>()

  constructor(stepIds: readonly string[]) {
    for (const id of stepIds) {
      this.states.set(id, 'pending')
    }
  }

  get(stepId: string): StepState {
    const state = this.states.get(stepId)
    if (!state) {
      throw new IllegalTransitionError(stepId, 'unknown', 'any')
    }

    return state
  }

  /**
   * @throws IllegalTransitionError when `to` is not reachable from the current state
   */
  transition(stepId: string, to: StepState): void {
    const from = this.get(stepId)
    if (!transitions[from].includes(to)) {
      throw new IllegalTransitionError(stepId, from, to)
    }

    this.states.set(stepId, to)
  }

  /** Current states, in the order the steps were given. */
  snapshot(): Record<string, StepState> {
    return Object.fromEntries(this.states)
  }
}
