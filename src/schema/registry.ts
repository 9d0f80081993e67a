/**
 * Entity Type Registry
 *
 * Holds the descriptor table and, optionally, the CSV header contract of
 * every entity type the engine manages.
 */

import type { CsvContract } from '../types/csv'
import type { EntityTypeDescriptor } from '../types/schema'
import { ConfigurationError, EntityTypeNotFoundError, ValidationError, ErrorCode } from '../errors'
import { getField } from '../types/schema'

interface RegisteredType {
  readonly descriptor: EntityTypeDescriptor
  readonly contract: CsvContract | undefined
}

export class EntityTypeRegistry {
  private readonly types = new Map<string, RegisteredType>()

  /**
   * Register an entity type. A contract must name only declared fields.
   *
   * @throws ConfigurationError on a duplicate type or a contract column
   * mapped to an unknown field
   */
  register(descriptor: EntityTypeDescriptor, contract?: CsvContract): this {
    if (this.types.has(descriptor.entityType)) {
      throw new ConfigurationError(`Entity type already registered: ${descriptor.entityType}`, 'entityType', descriptor.entityType)
    }
    if (contract) {
      checkContract(descriptor, contract)
    }
    this.types.set(descriptor.entityType, { descriptor, contract })
    return this
  }

  has(entityType: string): boolean {
    return this.types.has(entityType)
  }

  /**
   * @throws EntityTypeNotFoundError
   */
  descriptor(entityType: string): EntityTypeDescriptor {
    return this.lookup(entityType).descriptor
  }

  /**
   * @throws EntityTypeNotFoundError, or ValidationError when the type has no CSV contract
   */
  contract(entityType: string): CsvContract {
    const { contract } = this.lookup(entityType)
    if (!contract) {
      throw new ValidationError(
        `Entity type ${entityType} does not support CSV import/export`,
        { entityType },
        ErrorCode.VALIDATION_FAILED
      )
    }
    return contract
  }

  entityTypes(): string[] {
    return [...this.types.keys()]
  }

  private lookup(entityType: string): RegisteredType {
    const registered = this.types.get(entityType)
    if (!registered) {
      throw new EntityTypeNotFoundError(entityType)
    }
    return registered
  }
}

function checkContract(descriptor: EntityTypeDescriptor, contract: CsvContract): void {
  const fail = (message: string): never => {
    throw new ConfigurationError(message, `${descriptor.entityType}.csv`)
  }

  if (contract.entityType !== descriptor.entityType) {
    fail(`Contract for ${contract.entityType} registered under ${descriptor.entityType}`)
  }
  const names = new Set<string>()
  for (const column of contract.columns) {
    if (names.has(column.name)) fail(`Duplicate CSV column ${column.name}`)
    names.add(column.name)
    if (column.name === contract.keyColumn) continue
    const field = getField(descriptor, column.field ?? column.name)
    if (!field) fail(`CSV column ${column.name} maps to unknown field ${column.field ?? column.name}`)
    if ((column.type === 'reference' || column.type === 'references') && !column.referenceType) {
      fail(`CSV column ${column.name} needs a referenceType`)
    }
  }
  if (!names.has(contract.keyColumn)) {
    fail(`Key column ${contract.keyColumn} missing from contract`)
  }
  if (contract.scopeField !== undefined && !getField(descriptor, contract.scopeField)) {
    fail(`Scope field ${contract.scopeField} is not declared`)
  }
}
