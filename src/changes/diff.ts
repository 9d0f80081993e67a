/**
 * Change Recorder
 *
 * Computes the field-level diff between two snapshots of one entity by
 * walking the entity type's descriptor table:
 * - absent -> present: ADDED
 * - present -> absent: DELETED
 * - present -> different value: UPDATED
 * - reference collections: one ADDED/DELETED per element, by element identity
 * - system-managed fields are skipped
 *
 * A single-valued field moving from a system default to a caller-chosen
 * value is recorded as DELETED(default) + ADDED(value), the same shape a
 * collection field produces when its default element is replaced.
 *
 * @module changes/diff
 */

import type { ChangeRecord, FieldChange } from '../types/changes'
import type { EntityTypeDescriptor, FieldDescriptor, ReferenceListFieldDescriptor } from '../types/schema'
import {
  isEntityReference,
  isReferenceList,
  valueOf,
  type EntityReference,
  type FieldState,
  type FieldStates,
  type FieldValue,
  type Snapshot,
} from '../types/snapshot'
import { ValidationError, ErrorCode } from '../errors'
import { deepEqual } from '../utils/comparison'
import { classifyChanges, nextVersion } from './version'

// =============================================================================
// Field Diff
// =============================================================================

/**
 * Diff one field
 */
export function diffField(
  field: FieldDescriptor,
  oldState: FieldState | undefined,
  newState: FieldState | undefined
): FieldChange[] {
  if (field.kind === 'references') {
    return diffCollection(field, valueOf(oldState), valueOf(newState))
  }

  const oldValue = valueOf(oldState)
  const newValue = valueOf(newState)

  if (oldValue === undefined && newValue === undefined) return []
  if (oldValue === undefined) return [{ name: field.name, kind: 'ADDED', newValue }]
  if (newValue === undefined) return [{ name: field.name, kind: 'DELETED', oldValue }]
  if (valuesEqual(field, oldValue, newValue)) return []

  if (oldState?.kind === 'default' && newState?.kind === 'explicit') {
    return [
      { name: field.name, kind: 'DELETED', oldValue },
      { name: field.name, kind: 'ADDED', newValue },
    ]
  }
  return [{ name: field.name, kind: 'UPDATED', oldValue, newValue }]
}

function diffCollection(
  field: ReferenceListFieldDescriptor,
  oldValue: FieldValue | undefined,
  newValue: FieldValue | undefined
): FieldChange[] {
  const before = keyedElements(field, oldValue)
  const after = keyedElements(field, newValue)
  const changes: FieldChange[] = []

  for (const [elementKey, ref] of before) {
    if (!after.has(elementKey)) {
      changes.push({ name: field.name, kind: 'DELETED', oldValue: ref, elementKey })
    }
  }
  for (const [elementKey, ref] of after) {
    if (!before.has(elementKey)) {
      changes.push({ name: field.name, kind: 'ADDED', newValue: ref, elementKey })
    }
  }
  return changes
}

/**
 * Elements of a reference collection keyed by identity, in list order.
 * Duplicate identities collapse onto the first occurrence.
 */
export function keyedElements(
  field: ReferenceListFieldDescriptor,
  value: FieldValue | undefined
): Map<string, EntityReference> {
  const elements = new Map<string, EntityReference>()
  if (value === undefined) return elements
  if (!isReferenceList(value)) {
    throw new ValidationError(
      `Field ${field.name} must hold a list of references`,
      { field: field.name, value },
      ErrorCode.INVALID_FIELD
    )
  }
  for (const ref of value) {
    const key = field.identity(ref)
    if (!elements.has(key)) elements.set(key, ref)
  }
  return elements
}

/**
 * Equality under the field's own rules: references by identity, scalars by
 * the declared comparator
 */
export function valuesEqual(field: FieldDescriptor, a: FieldValue, b: FieldValue): boolean {
  switch (field.kind) {
    case 'scalar':
      return field.comparator(a, b)
    case 'reference':
      return isEntityReference(a) && isEntityReference(b)
        ? field.identity(a) === field.identity(b)
        : deepEqual(a, b)
    case 'references': {
      const left = keyedElements(field, a)
      const right = keyedElements(field, b)
      return left.size === right.size && [...left.keys()].every(k => right.has(k))
    }
  }
}

// =============================================================================
// Snapshot Diff
// =============================================================================

/**
 * Diff every declared, non-excluded field in declaration order
 */
export function diffFields(
  descriptor: EntityTypeDescriptor,
  oldFields: FieldStates,
  newFields: FieldStates
): FieldChange[] {
  const changes: FieldChange[] = []
  for (const field of descriptor.fields) {
    if (field.excluded) continue
    changes.push(...diffField(field, oldFields[field.name], newFields[field.name]))
  }
  return changes
}

/**
 * Build the change record between two snapshots of the same entity.
 * The record's new version is derived from the old snapshot's version and
 * the update classification; NO_CHANGE keeps the version.
 */
export function diff(
  descriptor: EntityTypeDescriptor,
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot
): ChangeRecord {
  const changes = diffFields(descriptor, oldSnapshot.fields, newSnapshot.fields)
  const updateType = classifyChanges(descriptor, changes)
  return {
    entityType: descriptor.entityType,
    key: newSnapshot.key,
    previousVersion: oldSnapshot.version,
    newVersion: nextVersion(oldSnapshot.version, updateType),
    updateType,
    changes,
    updatedBy: newSnapshot.updatedBy,
    updatedAt: newSnapshot.updatedAt,
    sessionStartedAt: newSnapshot.updatedAt,
  }
}
