/**
 * Field Value Validation
 *
 * Checks that values handed to the engine match the kind their field
 * descriptor declares, and builds the initial field states of new entities.
 */

import type { EntityTypeDescriptor, FieldDescriptor } from '../types/schema'
import {
  defaulted,
  isEntityReference,
  isReferenceList,
  UNSET,
  type FieldState,
  type FieldStates,
  type FieldValue,
} from '../types/snapshot'
import { ValidationError, ErrorCode } from '../errors'

/**
 * Ensure `value` fits `field`
 *
 * @throws ValidationError when the value has the wrong shape
 */
export function assertFieldValue(entityType: string, field: FieldDescriptor, value: FieldValue): void {
  switch (field.kind) {
    case 'scalar':
      if (isEntityReference(value) || (isReferenceList(value) && value.length > 0)) {
        throw invalid(entityType, field, 'expected a scalar value', value)
      }
      return
    case 'reference':
      if (!isEntityReference(value)) {
        throw invalid(entityType, field, 'expected an entity reference', value)
      }
      if (value.type !== field.referenceType) {
        throw invalid(entityType, field, `expected a reference to ${field.referenceType}`, value)
      }
      return
    case 'references':
      if (!isReferenceList(value)) {
        throw invalid(entityType, field, 'expected a list of entity references', value)
      }
      for (const ref of value) {
        if (ref.type !== field.referenceType) {
          throw invalid(entityType, field, `expected references to ${field.referenceType}`, value)
        }
      }
      return
  }
}

function invalid(entityType: string, field: FieldDescriptor, reason: string, value: FieldValue): ValidationError {
  return new ValidationError(
    `Invalid value for ${entityType}.${field.name}: ${reason}`,
    { field: field.name, entityType, value },
    ErrorCode.INVALID_FIELD
  )
}

/**
 * Check every present state against the descriptor table. Unknown field
 * names are rejected.
 */
export function validateFieldStates(descriptor: EntityTypeDescriptor, states: FieldStates): void {
  const known = new Map(descriptor.fields.map(f => [f.name, f]))
  for (const [name, state] of Object.entries(states)) {
    const field = known.get(name)
    if (!field) {
      throw new ValidationError(
        `Unknown field ${descriptor.entityType}.${name}`,
        { field: name, entityType: descriptor.entityType },
        ErrorCode.UNKNOWN_FIELD
      )
    }
    if (state.kind !== 'unset') {
      assertFieldValue(descriptor.entityType, field, state.value)
    }
  }
}

/**
 * State a field takes when nobody chose a value for it
 */
export function initialState(field: FieldDescriptor): FieldState {
  if (field.default === undefined) {
    return UNSET
  }
  return defaulted(field.kind === 'references' ? [...field.default] : field.default)
}

/**
 * Initial field states of a new entity: declared defaults, tagged as such
 */
export function defaultStates(descriptor: EntityTypeDescriptor): Record<string, FieldState> {
  const states: Record<string, FieldState> = {}
  for (const field of descriptor.fields) {
    const state = initialState(field)
    if (state.kind !== 'unset') {
      states[field.name] = state
    }
  }
  return states
}
