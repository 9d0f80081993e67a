/**
 * Change consolidation
 *
 * Folds the changes of a follow-up patch into the open change record of the
 * same editing session. Changes are grouped per key (field name, plus the
 * element identity for collection elements) and each key's path is reduced
 * to its first and last state:
 *
 * - ADDED then DELETED cancels out
 * - UPDATED a->b then UPDATED b->c becomes UPDATED a->c (or nothing when c = a)
 * - ADDED v then UPDATED v->w becomes ADDED w
 * - UPDATED a->b then DELETED b becomes DELETED a
 * - DELETED a then ADDED a cancels out
 * - DELETED a then ADDED b stays a DELETED a + ADDED b pair
 *
 * Keys keep the order of their first appearance.
 *
 * @module changes/consolidate
 */

import type { FieldChange } from '../types/changes'
import type { EntityTypeDescriptor } from '../types/schema'
import type { FieldValue } from '../types/snapshot'
import { getField } from '../types/schema'
import { deepEqual } from '../utils/comparison'
import { valuesEqual } from './diff'

/**
 * First and last state of one key across a sequence of changes
 */
interface Transition {
  readonly name: string
  readonly elementKey: string | undefined
  readonly before: FieldValue | undefined
  readonly after: FieldValue | undefined
  /** Some intermediate state was absent */
  readonly passedThroughAbsent: boolean
}

function changeKey(change: FieldChange): string {
  return change.elementKey === undefined ? change.name : `${change.name}\u0000${change.elementKey}`
}

function transitionOf(change: FieldChange): Transition {
  switch (change.kind) {
    case 'ADDED':
      return { name: change.name, elementKey: change.elementKey, before: undefined, after: change.newValue, passedThroughAbsent: false }
    case 'DELETED':
      return { name: change.name, elementKey: change.elementKey, before: change.oldValue, after: undefined, passedThroughAbsent: false }
    case 'UPDATED':
      return { name: change.name, elementKey: change.elementKey, before: change.oldValue, after: change.newValue, passedThroughAbsent: false }
  }
}

function compose(first: Transition, second: Transition): Transition {
  return {
    name: first.name,
    elementKey: first.elementKey,
    before: first.before,
    after: second.after,
    passedThroughAbsent: first.passedThroughAbsent || second.passedThroughAbsent || first.after === undefined,
  }
}

function emit(t: Transition, equals: (a: FieldValue, b: FieldValue) => boolean): FieldChange[] {
  const base = t.elementKey === undefined ? { name: t.name } : { name: t.name, elementKey: t.elementKey }

  if (t.before === undefined && t.after === undefined) return []
  if (t.before === undefined) return [{ ...base, kind: 'ADDED', newValue: t.after }]
  if (t.after === undefined) return [{ ...base, kind: 'DELETED', oldValue: t.before }]
  if (equals(t.before, t.after)) return []
  if (t.passedThroughAbsent) {
    return [
      { ...base, kind: 'DELETED', oldValue: t.before },
      { ...base, kind: 'ADDED', newValue: t.after },
    ]
  }
  return [{ ...base, kind: 'UPDATED', oldValue: t.before, newValue: t.after }]
}

/**
 * Reduce a change sequence to at most one transition per key
 */
function fold(changes: readonly FieldChange[]): Map<string, Transition> {
  const transitions = new Map<string, Transition>()
  for (const change of changes) {
    const key = changeKey(change)
    const next = transitionOf(change)
    const existing = transitions.get(key)
    transitions.set(key, existing ? compose(existing, next) : next)
  }
  return transitions
}

/**
 * Consolidate `later` into `earlier`
 *
 * @returns the changes taking the entity from the state before `earlier`
 * to the state after `later`
 */
export function consolidateChanges(
  descriptor: EntityTypeDescriptor,
  earlier: readonly FieldChange[],
  later: readonly FieldChange[]
): FieldChange[] {
  const transitions = fold([...earlier, ...later])
  const result: FieldChange[] = []
  for (const t of transitions.values()) {
    const field = getField(descriptor, t.name)
    const equals = field
      ? (a: FieldValue, b: FieldValue) => valuesEqual(field, a, b)
      : deepEqual
    result.push(...emit(t, equals))
  }
  return result
}
