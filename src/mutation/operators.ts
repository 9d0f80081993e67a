/**
 * Patch Operators
 *
 * Turns a caller's patch into the requested field states of an entity.
 * A patch is either an operator document or a plain partial snapshot:
 *
 * - `$set`      set field values (`null` unsets)
 * - `$unset`    remove field values
 * - `$addToSet` add references to a collection (`{ $each: [...] }` for several)
 * - `$pull`     remove references from a collection (`{ $in: [...] }` for several)
 *
 * A plain partial snapshot `{ displayName: 'Alice', teams: [...] }` behaves
 * like `$set`. Operators are pure and return new state objects.
 */

import type { EntityTypeDescriptor, FieldDescriptor, ReferenceListFieldDescriptor } from '../types/schema'
import {
  explicit,
  isEntityReference,
  isFieldValue,
  isReferenceList,
  UNSET,
  valueOf,
  type EntityReference,
  type FieldState,
  type FieldStates,
  type FieldValue,
} from '../types/snapshot'
import { getField } from '../types/schema'
import { assertFieldValue } from '../schema/validator'
import { keyedElements } from '../changes/diff'
import { ValidationError, ErrorCode } from '../errors'
import { isPlainRecord } from '../utils/comparison'

// =============================================================================
// Types
// =============================================================================

export type AddToSetValue = EntityReference | { $each: EntityReference[] }

export type PullValue = EntityReference | { $in: EntityReference[] }

export type PatchDocument = {
  $set?: Record<string, FieldValue | null> | undefined
  $unset?: Record<string, true | 1 | ''> | undefined
  $addToSet?: Record<string, AddToSetValue> | undefined
  $pull?: Record<string, PullValue> | undefined
}

/** Partial snapshot: field name to new value, `null` unsets */
export type PartialSnapshot = Readonly<Record<string, FieldValue | null>>

export type Patch = PatchDocument | PartialSnapshot

export interface ApplyPatchResult {
  /** Requested field states (the current states with the patch applied) */
  fields: Record<string, FieldState>
  /** Fields named by the patch, in the order they were touched */
  modifiedFields: string[]
}

const PATCH_OPERATORS = new Set(['$set', '$unset', '$addToSet', '$pull'])

// =============================================================================
// Validation
// =============================================================================

/**
 * Whether the patch is an operator document. Mixing operators and plain
 * field names is rejected.
 */
export function isPatchDocument(patch: Patch): patch is PatchDocument {
  const keys = Object.keys(patch)
  const operators = keys.filter(k => k.startsWith('$'))
  if (operators.length > 0 && operators.length !== keys.length) {
    throw new ValidationError(
      'Patch mixes update operators with plain field values',
      { value: keys },
      ErrorCode.INVALID_OPERATOR
    )
  }
  return operators.length > 0
}

/**
 * Validate operator names, target fields and conflicting operators
 *
 * @throws ValidationError on an unknown operator, an unknown field, a
 * collection operator on a single-valued field, or a field named by two
 * operators
 */
export function validatePatch(descriptor: EntityTypeDescriptor, patch: Patch): void {
  if (!isPatchDocument(patch)) {
    for (const name of Object.keys(patch)) {
      requireField(descriptor, name)
    }
    return
  }

  const modifiedFields = new Set<string>()
  for (const [operator, spec] of Object.entries(patch)) {
    if (!PATCH_OPERATORS.has(operator)) {
      throw new ValidationError(`Invalid update operator: ${operator}`, { value: operator }, ErrorCode.INVALID_OPERATOR)
    }
    if (spec === undefined) continue
    if (!isPlainRecord(spec)) {
      throw new ValidationError(`Operator ${operator} expects an object of fields`, { value: spec }, ErrorCode.INVALID_OPERATOR)
    }
    for (const name of Object.keys(spec)) {
      const field = requireField(descriptor, name)
      if ((operator === '$addToSet' || operator === '$pull') && field.kind !== 'references') {
        throw new ValidationError(
          `Operator ${operator} requires a collection field, ${descriptor.entityType}.${name} is single-valued`,
          { field: name, entityType: descriptor.entityType },
          ErrorCode.INVALID_OPERATOR
        )
      }
      if (modifiedFields.has(name)) {
        throw new ValidationError(
          `Conflicting operators: field '${name}' modified by multiple operators`,
          { field: name, entityType: descriptor.entityType },
          ErrorCode.INVALID_OPERATOR
        )
      }
      modifiedFields.add(name)
    }
  }
}

function requireField(descriptor: EntityTypeDescriptor, name: string): FieldDescriptor {
  const field = getField(descriptor, name)
  if (!field) {
    throw new ValidationError(
      `Unknown field ${descriptor.entityType}.${name}`,
      { field: name, entityType: descriptor.entityType },
      ErrorCode.UNKNOWN_FIELD
    )
  }
  return field
}

// =============================================================================
// Application
// =============================================================================

/**
 * Apply a patch to the current field states
 *
 * @example
 * ```typescript
 * applyPatch(userType, current.fields, {
 *   $addToSet: { roles: { $each: [dataSteward, dataConsumer] } },
 *   $set: { displayName: 'Alice' },
 * })
 * ```
 */
export function applyPatch(
  descriptor: EntityTypeDescriptor,
  fields: FieldStates,
  patch: Patch
): ApplyPatchResult {
  validatePatch(descriptor, patch)
  const document = toPatchDocument(patch)

  const result: Record<string, FieldState> = { ...fields }
  const modifiedFields: string[] = []

  if (document.$set) {
    for (const [name, value] of Object.entries(document.$set)) {
      result[name] = toState(descriptor, requireField(descriptor, name), value)
      modifiedFields.push(name)
    }
  }

  if (document.$unset) {
    for (const name of Object.keys(document.$unset)) {
      result[name] = UNSET
      modifiedFields.push(name)
    }
  }

  if (document.$addToSet) {
    for (const [name, value] of Object.entries(document.$addToSet)) {
      const field = requireCollection(descriptor, name)
      const items = isEachModifier(value) ? value.$each : [value]
      assertFieldValue(descriptor.entityType, field, items)
      const elements = keyedElements(field, valueOf(result[name]))
      for (const ref of items) {
        const key = field.identity(ref)
        if (!elements.has(key)) elements.set(key, ref)
      }
      result[name] = collectionState([...elements.values()])
      modifiedFields.push(name)
    }
  }

  if (document.$pull) {
    for (const [name, value] of Object.entries(document.$pull)) {
      const field = requireCollection(descriptor, name)
      const items = isInCondition(value) ? value.$in : [value]
      assertFieldValue(descriptor.entityType, field, items)
      const elements = keyedElements(field, valueOf(result[name]))
      for (const ref of items) {
        elements.delete(field.identity(ref))
      }
      result[name] = collectionState([...elements.values()])
      modifiedFields.push(name)
    }
  }

  return { fields: result, modifiedFields }
}

/**
 * A plain partial snapshot is a `$set` of every named field
 */
function toPatchDocument(patch: Patch): PatchDocument {
  if (isPatchDocument(patch)) return patch
  const $set: Record<string, FieldValue | null> = {}
  for (const [name, value] of Object.entries<unknown>(patch)) {
    if (value !== null && !isFieldValue(value)) {
      throw new ValidationError(`Invalid value for field ${name}`, { field: name, value }, ErrorCode.INVALID_FIELD)
    }
    $set[name] = value
  }
  return { $set }
}

function toState(descriptor: EntityTypeDescriptor, field: FieldDescriptor, value: FieldValue | null): FieldState {
  if (value === null) return UNSET
  assertFieldValue(descriptor.entityType, field, value)
  if (field.kind === 'references' && isReferenceList(value)) {
    return collectionState(value)
  }
  return explicit(value)
}

/** An emptied collection is unset */
function collectionState(refs: EntityReference[]): FieldState {
  return refs.length > 0 ? explicit(refs) : UNSET
}

function requireCollection(descriptor: EntityTypeDescriptor, name: string): ReferenceListFieldDescriptor {
  const field = requireField(descriptor, name)
  if (field.kind !== 'references') {
    throw new ValidationError(
      `${descriptor.entityType}.${name} is not a collection field`,
      { field: name, entityType: descriptor.entityType },
      ErrorCode.INVALID_OPERATOR
    )
  }
  return field
}

function isEachModifier(value: AddToSetValue): value is { $each: EntityReference[] } {
  return !isEntityReference(value) && '$each' in value && Array.isArray(value.$each)
}

function isInCondition(value: PullValue): value is { $in: EntityReference[] } {
  return !isEntityReference(value) && '$in' in value && Array.isArray(value.$in)
}
