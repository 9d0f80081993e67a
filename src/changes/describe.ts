/**
 * Change descriptions and record replay
 */

import type { ChangeDescription, ChangeRecord, FieldChange, FieldChangeSummary } from '../types/changes'
import type { EntityTypeDescriptor } from '../types/schema'
import {
  explicit,
  isEntityReference,
  UNSET,
  valueOf,
  type EntityReference,
  type FieldState,
  type FieldStates,
} from '../types/snapshot'
import { getField } from '../types/schema'
import { keyedElements } from './diff'

/**
 * Group a record's changes by kind and field. Element changes of one
 * collection field become a single entry holding every element, so two
 * consolidated role additions read as `roles: ADDED [R1, R2]`.
 */
export function describeChanges(record: ChangeRecord): ChangeDescription {
  return {
    previousVersion: record.previousVersion,
    fieldsAdded: group(record.changes.filter(c => c.kind === 'ADDED')),
    fieldsUpdated: group(record.changes.filter(c => c.kind === 'UPDATED')),
    fieldsDeleted: group(record.changes.filter(c => c.kind === 'DELETED')),
  }
}

function group(changes: readonly FieldChange[]): FieldChangeSummary[] {
  const summaries: FieldChangeSummary[] = []
  const collections = new Map<string, { oldValue: EntityReference[]; newValue: EntityReference[] }>()

  for (const change of changes) {
    if (change.elementKey === undefined) {
      summaries.push({ name: change.name, oldValue: change.oldValue, newValue: change.newValue })
      continue
    }
    let entry = collections.get(change.name)
    if (!entry) {
      entry = { oldValue: [], newValue: [] }
      collections.set(change.name, entry)
      summaries.push({ name: change.name })
    }
    if (isEntityReference(change.oldValue)) entry.oldValue.push(change.oldValue)
    if (isEntityReference(change.newValue)) entry.newValue.push(change.newValue)
  }

  return summaries.map(summary => {
    const entry = collections.get(summary.name)
    if (!entry || summary.oldValue !== undefined || summary.newValue !== undefined) return summary
    return {
      name: summary.name,
      oldValue: entry.oldValue.length > 0 ? entry.oldValue : undefined,
      newValue: entry.newValue.length > 0 ? entry.newValue : undefined,
    }
  })
}

/**
 * Apply a change record to the field states it was computed from.
 * Reproduces the next snapshot's values (collections up to element order)
 * but not their state tags: records carry no tag, so every value written
 * comes back Explicit, even a change back to a declared default.
 */
export function replay(
  descriptor: EntityTypeDescriptor,
  fields: FieldStates,
  record: ChangeRecord
): Record<string, FieldState> {
  const result: Record<string, FieldState> = { ...fields }

  for (const change of record.changes) {
    const field = getField(descriptor, change.name)
    if (!field) continue

    if (field.kind === 'references') {
      const elements = keyedElements(field, valueOf(result[field.name]))
      if (change.elementKey !== undefined) {
        if (change.kind === 'DELETED') elements.delete(change.elementKey)
        if (change.kind === 'ADDED' && isEntityReference(change.newValue)) {
          elements.set(change.elementKey, change.newValue)
        }
      }
      result[field.name] = elements.size > 0 ? explicit([...elements.values()]) : UNSET
      continue
    }

    if (change.kind === 'DELETED') {
      result[field.name] = UNSET
    } else if (change.newValue !== undefined) {
      result[field.name] = explicit(change.newValue)
    }
  }
  return result
}
