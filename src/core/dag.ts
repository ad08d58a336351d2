import {CycleDetectedError, StepNotFoundError} from '../errors.js'
import {pathsOverlap, patternBase} from '../engine/paths.js'
import type {Step} from '../types.js'

/** Why a step must come after another. */
export type DependencyReason = 'barrier' | 'output-input' | 'output-output' | 'after'

/**
 * One edge of the step graph: `consumer` must run after `producer`.
 * `via` is the image path that links them, or `*` when the whole image does.
 */
export type DependsOn = {
  producer: string;
  consumer: string;
  via: string;
  reason: DependencyReason;
}

export type StepGraph = {
  /** Steps by id, in declaration order. */
  steps: Map<string, Step>;
  edges: DependsOn[];
  /** Maps each step id to the ids it depends on. */
  dependencies: Map<string, Set<string>>;
}

/**
 * Build the dependency graph of a manifest's steps and check it is acyclic.
 *
 * For every pair of steps, earlier one first:
 * - an opaque step (no declared outputs) is a barrier to every other step
 * - a declared output overlapping the other step's input links them, the
 *   writer first, even when the writer was declared later
 * - overlapping outputs keep their declaration order
 * - `after` references are taken as written
 *
 * @throws StepNotFoundError when `after` names an unknown step
 * @throws CycleDetectedError when the edges form a cycle
 */
export function buildGraph(steps: readonly Step[]): StepGraph {
  const ordered = [...steps].sort((a, b) => a.orderHint - b.orderHint)
  const graph: StepGraph = {
    steps: new Map(ordered.map(step => [step.id, step])),
    edges: [],
    dependencies: new Map(ordered.map(step => [step.id, new Set<string>()]))
  }

  for (const step of ordered) {
    for (const ref of step.after) {
      if (!graph.steps.has(ref)) {
        throw new StepNotFoundError(step.id, ref)
      }

      addEdge(graph, {producer: ref, consumer: step.id, via: '*', reason: 'after'})
    }
  }

  for (const [i, earlier] of ordered.entries()) {
    for (const later of ordered.slice(i + 1)) {
      for (const edge of pairEdges(earlier, later)) {
        addEdge(graph, edge)
      }
    }
  }

  topologicalOrder(graph)
  return graph
}

function pairEdges(earlier: Step, later: Step): DependsOn[] {
  if (!earlier.outputs || !later.outputs) {
    return [{producer: earlier.id, consumer: later.id, via: '*', reason: 'barrier'}]
  }

  const edges: DependsOn[] = []
  const forward = overlappingOutput(earlier.outputs, later)
  if (forward !== undefined) {
    edges.push({producer: earlier.id, consumer: later.id, via: forward, reason: 'output-input'})
  }

  const backward = overlappingOutput(later.outputs, earlier)
  if (backward !== undefined) {
    edges.push({producer: later.id, consumer: earlier.id, via: backward, reason: 'output-input'})
  }

  const shared = earlier.outputs.find(output => later.outputs?.some(other => pathsOverlap(output, other)))
  if (shared !== undefined) {
    edges.push({producer: earlier.id, consumer: later.id, via: shared, reason: 'output-output'})
  }

  return edges
}

/** First output path overlapping the literal base of one of the consumer's inputs. */
function overlappingOutput(outputs: readonly string[], consumer: Step): string | undefined {
  const bases = consumer.inputs
    .filter(input => !input.pattern.startsWith('!'))
    .map(input => patternBase(input.pattern))

  return outputs.find(output => bases.some(base => pathsOverlap(output, base)))
}

/** Adds an edge unless the pair is already linked in that direction. */
function addEdge(graph: StepGraph, edge: DependsOn): void {
  const deps = graph.dependencies.get(edge.consumer)
  if (!deps || deps.has(edge.producer)) {
    return
  }

  deps.add(edge.producer)
  graph.edges.push(edge)
}

/**
 * Kahn's algorithm where `pick` chooses the next step among those whose
 * dependencies are all placed. `ready` is passed in declaration order.
 * @throws CycleDetectedError when no step is ready before all are placed
 */
export function linearize(graph: StepGraph, pick: (ready: Step[]) => Step): Step[] {
  const placed = new Set<string>()
  const order: Step[] = []

  while (order.length < graph.steps.size) {
    const ready = [...graph.steps.values()].filter(step =>
      !placed.has(step.id) && [...graph.dependencies.get(step.id) ?? []].every(dep => placed.has(dep)))

    if (ready.length === 0) {
      throw new CycleDetectedError(findCycle(graph, placed))
    }

    const next = pick(ready)
    placed.add(next.id)
    order.push(next)
  }

  return order
}

/** Deterministic linearization: the earliest declared ready step goes first. */
export function topologicalOrder(graph: StepGraph): Step[] {
  return linearize(graph, ready => ready[0])
}

/** Edges whose consumer is `stepId`. */
export function dependenciesOf(graph: StepGraph, stepId: string): DependsOn[] {
  return graph.edges.filter(edge => edge.consumer === stepId)
}

/** Edges whose producer is `stepId`. */
export function dependentsOf(graph: StepGraph, stepId: string): DependsOn[] {
  return graph.edges.filter(edge => edge.producer === stepId)
}

/**
 * Walks dependencies among unplaced steps until one repeats.
 * The result lists the cycle producer first and ends on its first step.
 */
function findCycle(graph: StepGraph, placed: Set<string>): string[] {
  const remaining = [...graph.steps.keys()].filter(id => !placed.has(id))
  const path: string[] = []
  let current: string | undefined = remaining[0]

  while (current !== undefined && !path.includes(current)) {
    path.push(current)
    const deps: Set<string> = graph.dependencies.get(current) ?? new Set<string>()
    current = remaining.find(id => deps.has(id))
  }

  if (current === undefined) {
    return remaining
  }

  const cycle = path.slice(path.indexOf(current)).reverse()
  return [...cycle, cycle[0]]
}
