/**
 * CSV header contracts
 *
 * Converts between CSV cells and field values under a declared contract:
 * per-cell validation (required, pattern, enum, boolean, number, reference
 * existence and scope), requested field states for the apply phase, export
 * rendering and column documentation.
 *
 * @module csv/contract
 */

import type { CsvColumn, CsvColumnDocumentation, CsvContract } from '../types/csv'
import type { ReferenceResolver, ScopeResolver } from '../types/collaborators'
import type { EntityTypeDescriptor } from '../types/schema'
import {
  explicit,
  isEntityReference,
  isReferenceList,
  valueOf,
  type EntityReference,
  type FieldState,
  type FieldStates,
  type FieldValue,
  type Snapshot,
} from '../types/snapshot'
import { getField } from '../types/schema'
import { initialState } from '../schema/validator'
import { joinValues, splitValues } from './format'

// =============================================================================
// Error Cells
// =============================================================================

export function invalidField(index: number, message: string): string {
  return `#INVALID_FIELD: Field ${index} error - ${message}`
}

export function entityNotFound(index: number, entityType: string, name: string): string {
  return `#ENTITY_NOT_FOUND: Field ${index} error - Entity ${entityType} ${name} not found`
}

export function scopeViolation(index: number, message: string): string {
  return `#SCOPE_VIOLATION: Field ${index} error - ${message}`
}

export function invalidFieldCount(expected: number, actual: number): string {
  return `#INVALID_FIELD_COUNT: Expected ${expected} fields, found ${actual}`
}

export function applyFailed(message: string): string {
  return `#APPLY_FAILED: ${message}`
}

// =============================================================================
// Headers
// =============================================================================

export function contractHeaders(contract: CsvContract): string[] {
  return contract.columns.map(c => c.name)
}

/**
 * Field a column maps to (the key column maps to none)
 */
export function columnField(contract: CsvContract, column: CsvColumn): string | undefined {
  return column.name === contract.keyColumn ? undefined : column.field ?? column.name
}

// =============================================================================
// Validation
// =============================================================================

export interface CellValidationContext {
  readonly resolver: ReferenceResolver
  readonly scopeResolver?: ScopeResolver | undefined
  /** Entity the caller's import is scoped to, e.g. a team name */
  readonly scopeHint?: string | undefined
  readonly valueSeparator: string
}

/**
 * Typed content of a valid row. `null` marks an empty cell.
 */
export interface ValidatedRow {
  readonly key: string
  readonly values: ReadonlyMap<string, FieldValue | null>
}

export type RowValidation =
  | { readonly ok: true; readonly row: ValidatedRow }
  | { readonly ok: false; readonly errors: string[] }

/**
 * Validate one record against the contract. The record must already have
 * the contract's field count. Every failing cell contributes an error.
 */
export async function validateRecord(
  contract: CsvContract,
  record: readonly string[],
  context: CellValidationContext
): Promise<RowValidation> {
  const errors: string[] = []
  const values = new Map<string, FieldValue | null>()
  const keyIndex = contract.columns.findIndex(c => c.name === contract.keyColumn)
  const key = (record[keyIndex] ?? '').trim()

  for (const [index, column] of contract.columns.entries()) {
    const cell = cellText(contract, column, record[index] ?? '')
    const result = await validateCell(contract, column, index, cell, key, context)
    if ('errors' in result) {
      errors.push(...result.errors)
      continue
    }
    const field = columnField(contract, column)
    if (field !== undefined) values.set(field, result.value)
  }

  if (errors.length > 0) return { ok: false, errors }
  return { ok: true, row: { key, values } }
}

/**
 * Free-text cells are taken as written so exported values import back
 * unchanged; keys and typed cells are trimmed
 */
function cellText(contract: CsvContract, column: CsvColumn, raw: string): string {
  if (column.type === 'string' && column.name !== contract.keyColumn && raw.trim() !== '') {
    return raw
  }
  return raw.trim()
}

type CellResult = { readonly value: FieldValue | null } | { readonly errors: string[] }

async function validateCell(
  contract: CsvContract,
  column: CsvColumn,
  index: number,
  cell: string,
  key: string,
  context: CellValidationContext
): Promise<CellResult> {
  const required = column.required === true || column.name === contract.keyColumn
  if (cell === '') {
    return required ? { errors: [invalidField(index, `${column.name} is required`)] } : { value: null }
  }

  switch (column.type) {
    case 'string':
      if (column.pattern && !column.pattern.test(cell)) {
        return { errors: [invalidField(index, `${column.name} must match "${column.pattern.source}"`)] }
      }
      return { value: cell }

    case 'boolean': {
      const lower = cell.toLowerCase()
      if (lower !== 'true' && lower !== 'false') {
        return { errors: [invalidField(index, `${column.name} must be true or false, found ${cell}`)] }
      }
      return { value: lower === 'true' }
    }

    case 'number': {
      const value = Number(cell)
      if (!Number.isFinite(value)) {
        return { errors: [invalidField(index, `${column.name} must be a number, found ${cell}`)] }
      }
      return { value }
    }

    case 'enum':
      if (!column.values?.includes(cell)) {
        return { errors: [invalidField(index, `${column.name} must be one of ${(column.values ?? []).join(', ')}, found ${cell}`)] }
      }
      return { value: cell }

    case 'reference': {
      const resolved = await resolveReference(contract, column, index, cell, key, context)
      return 'error' in resolved ? { errors: [resolved.error] } : { value: resolved.ref }
    }

    case 'references': {
      const refs: EntityReference[] = []
      const errors: string[] = []
      for (const name of splitValues(cell, context.valueSeparator)) {
        const resolved = await resolveReference(contract, column, index, name, key, context)
        if ('error' in resolved) {
          errors.push(resolved.error)
        } else {
          refs.push(resolved.ref)
        }
      }
      if (errors.length > 0) return { errors }
      return { value: refs.length > 0 ? refs : null }
    }
  }
}

async function resolveReference(
  contract: CsvContract,
  column: CsvColumn,
  index: number,
  name: string,
  key: string,
  context: CellValidationContext
): Promise<{ ref: EntityReference } | { error: string }> {
  const referenceType = column.referenceType ?? column.name
  const ref = await context.resolver.resolve(referenceType, name)
  if (!ref) {
    return { error: entityNotFound(index, referenceType, name) }
  }

  const { scopeResolver, scopeHint } = context
  if (column.scoped && scopeResolver && scopeHint !== undefined) {
    const inScope = await scopeResolver.contains(scopeHint, referenceType, name)
    if (!inScope) {
      return {
        error: scopeViolation(
          index,
          `${capitalize(referenceType)} ${name} of ${contract.entityType} ${key} is not under ${scopeHint} hierarchy`
        ),
      }
    }
  }
  return { ref }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

// =============================================================================
// Requested States
// =============================================================================

/**
 * Field states requested by a validated row on top of `base` (the current
 * states of an existing entity, or the initial states of a new one).
 * An empty cell resets its field to the declared default; a field that is
 * already unset stays unset.
 */
export function requestedStates(
  descriptor: EntityTypeDescriptor,
  base: FieldStates,
  row: ValidatedRow
): Record<string, FieldState> {
  const states: Record<string, FieldState> = { ...base }
  for (const [name, value] of row.values) {
    const field = getField(descriptor, name)
    if (!field) continue
    if (value !== null) {
      states[name] = explicit(value)
    } else if (base[name] !== undefined && base[name]?.kind !== 'unset') {
      states[name] = initialState(field)
    }
  }
  return states
}

// =============================================================================
// Export
// =============================================================================

/**
 * Render a snapshot as a record of the contract's columns
 */
export function toRecord(contract: CsvContract, snapshot: Snapshot, valueSeparator: string): string[] {
  return contract.columns.map(column => {
    const field = columnField(contract, column)
    if (field === undefined) return snapshot.key
    return renderValue(valueOf(snapshot.fields[field]), valueSeparator)
  })
}

function renderValue(value: FieldValue | undefined, valueSeparator: string): string {
  if (value === undefined || value === null) return ''
  if (isEntityReference(value)) return value.name
  if (isReferenceList(value)) return joinValues(value.map(ref => ref.name), valueSeparator)
  switch (typeof value) {
    case 'string':
      return value
    case 'number':
    case 'boolean':
      return String(value)
    default:
      return JSON.stringify(value)
  }
}

// =============================================================================
// Documentation
// =============================================================================

/**
 * Column documentation of a contract, in header order
 */
export function describeContract(contract: CsvContract): CsvColumnDocumentation[] {
  return contract.columns.map(column => ({
    name: column.name,
    required: column.required === true || column.name === contract.keyColumn,
    description: column.description ?? '',
    examples: column.examples ?? [],
  }))
}
