/**
 * Entity Type Builder
 *
 * Fluent construction of field-descriptor tables.
 *
 * @example
 * ```typescript
 * const user = defineEntityType('user')
 *   .scalar('displayName')
 *   .scalar('email', { identityDefining: true })
 *   .references('teams', 'team', { default: [ORGANIZATION] })
 *   .references('inheritedRoles', 'role', { excluded: true })
 *   .build()
 * ```
 */

import type {
  EntityTypeDescriptor,
  FieldDescriptor,
  ReferenceFieldDescriptor,
  ReferenceListFieldDescriptor,
  ScalarFieldDescriptor,
} from '../types/schema'
import type { EntityReference, FieldValue, JsonValue } from '../types/snapshot'
import { deepEqual } from '../utils/comparison'
import { ConfigurationError } from '../errors'

// =============================================================================
// Options
// =============================================================================

interface CommonFieldOptions {
  excluded?: boolean | undefined
  identityDefining?: boolean | undefined
  protected?: boolean | undefined
}

export interface ScalarFieldOptions extends CommonFieldOptions {
  comparator?: ((a: FieldValue, b: FieldValue) => boolean) | undefined
  default?: JsonValue | undefined
}

export interface ReferenceFieldOptions extends CommonFieldOptions {
  identity?: ((ref: EntityReference) => string) | undefined
  default?: EntityReference | undefined
}

export interface ReferenceListFieldOptions extends CommonFieldOptions {
  identity?: ((ref: EntityReference) => string) | undefined
  default?: readonly EntityReference[] | undefined
}

/** Default element identity: the referenced entity's id */
export const referenceId = (ref: EntityReference): string => ref.id

/** Field names reserved by the snapshot envelope */
const RESERVED_FIELD_NAMES = new Set(['name', 'id', 'version', 'revision', 'updatedAt', 'updatedBy'])

// =============================================================================
// Builder
// =============================================================================

export class EntityTypeBuilder {
  private readonly fields: FieldDescriptor[] = []

  constructor(private readonly entityType: string) {}

  scalar(name: string, options: ScalarFieldOptions = {}): this {
    const field: ScalarFieldDescriptor = {
      kind: 'scalar',
      name,
      ...flags(options),
      comparator: options.comparator ?? deepEqual,
      default: options.default,
    }
    return this.add(field)
  }

  reference(name: string, referenceType: string, options: ReferenceFieldOptions = {}): this {
    const field: ReferenceFieldDescriptor = {
      kind: 'reference',
      name,
      referenceType,
      ...flags(options),
      identity: options.identity ?? referenceId,
      default: options.default,
    }
    return this.add(field)
  }

  references(name: string, referenceType: string, options: ReferenceListFieldOptions = {}): this {
    const field: ReferenceListFieldDescriptor = {
      kind: 'references',
      name,
      referenceType,
      ...flags(options),
      identity: options.identity ?? referenceId,
      default: options.default,
    }
    return this.add(field)
  }

  build(): EntityTypeDescriptor {
    return Object.freeze({
      entityType: this.entityType,
      fields: Object.freeze([...this.fields]),
    })
  }

  private add(field: FieldDescriptor): this {
    if (RESERVED_FIELD_NAMES.has(field.name)) {
      throw new ConfigurationError(`Field name "${field.name}" is reserved`, `${this.entityType}.${field.name}`)
    }
    if (this.fields.some(f => f.name === field.name)) {
      throw new ConfigurationError(`Field "${field.name}" declared twice on ${this.entityType}`, `${this.entityType}.${field.name}`)
    }
    this.fields.push(Object.freeze(field))
    return this
  }
}

function flags(options: CommonFieldOptions): { excluded: boolean; identityDefining: boolean; protected: boolean } {
  return {
    excluded: options.excluded ?? false,
    identityDefining: options.identityDefining ?? false,
    protected: options.protected ?? false,
  }
}

/**
 * Start declaring an entity type
 */
export function defineEntityType(entityType: string): EntityTypeBuilder {
  return new EntityTypeBuilder(entityType)
}
