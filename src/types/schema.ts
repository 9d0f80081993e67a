/**
 * Entity type descriptors
 *
 * Every entity type declares an explicit table of field descriptors. The
 * change recorder walks this table instead of reflecting over values.
 */

import type { EntityReference, FieldValue, JsonValue } from './snapshot'

// =============================================================================
// Field Descriptors
// =============================================================================

export type FieldKind = 'scalar' | 'reference' | 'references'

interface BaseFieldDescriptor {
  readonly name: string
  /** System-managed (recomputed, never diffed nor patched) */
  readonly excluded: boolean
  /** A change to this field is a MAJOR update */
  readonly identityDefining: boolean
  /** Only callers with elevated rights may change this field */
  readonly protected: boolean
}

export interface ScalarFieldDescriptor extends BaseFieldDescriptor {
  readonly kind: 'scalar'
  readonly comparator: (a: FieldValue, b: FieldValue) => boolean
  readonly default?: JsonValue | undefined
}

export interface ReferenceFieldDescriptor extends BaseFieldDescriptor {
  readonly kind: 'reference'
  readonly referenceType: string
  readonly identity: (ref: EntityReference) => string
  readonly default?: EntityReference | undefined
}

export interface ReferenceListFieldDescriptor extends BaseFieldDescriptor {
  readonly kind: 'references'
  readonly referenceType: string
  /** Stable element key used for set difference */
  readonly identity: (ref: EntityReference) => string
  readonly default?: readonly EntityReference[] | undefined
}

export type FieldDescriptor =
  | ScalarFieldDescriptor
  | ReferenceFieldDescriptor
  | ReferenceListFieldDescriptor

/**
 * Declared shape of one entity type
 */
export interface EntityTypeDescriptor {
  readonly entityType: string
  /** Fields in declaration order */
  readonly fields: readonly FieldDescriptor[]
}

/**
 * Look up a field descriptor by name
 */
export function getField(descriptor: EntityTypeDescriptor, name: string): FieldDescriptor | undefined {
  return descriptor.fields.find(f => f.name === name)
}

/**
 * Names of fields callers may patch (everything except system-managed fields)
 */
export function patchableFields(descriptor: EntityTypeDescriptor): string[] {
  return descriptor.fields.filter(f => !f.excluded).map(f => f.name)
}
