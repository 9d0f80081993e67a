/**
 * Change record types
 */

import type { FieldValue } from './snapshot'

export type ChangeKind = 'ADDED' | 'UPDATED' | 'DELETED'

export type UpdateType = 'NO_CHANGE' | 'MINOR' | 'MAJOR'

/**
 * One field-level change. Collection fields produce one change per added or
 * removed element, identified by `elementKey`.
 */
export interface FieldChange {
  readonly name: string
  readonly kind: ChangeKind
  readonly oldValue?: FieldValue | undefined
  readonly newValue?: FieldValue | undefined
  readonly elementKey?: string | undefined
}

/**
 * Ordered field-level diff between two versions of one entity
 */
export interface ChangeRecord {
  readonly entityType: string
  readonly key: string
  readonly previousVersion: number
  readonly newVersion: number
  readonly updateType: UpdateType
  readonly changes: readonly FieldChange[]
  readonly updatedBy: string
  /** Time of the latest patch folded into this record */
  readonly updatedAt: number
  /** Time of the first patch of the editing session */
  readonly sessionStartedAt: number
}

/**
 * One grouped entry of a change description
 */
export interface FieldChangeSummary {
  readonly name: string
  readonly oldValue?: FieldValue | undefined
  readonly newValue?: FieldValue | undefined
}

/**
 * Grouped read model of a change record: element changes of one collection
 * field are collected into a single array value.
 */
export interface ChangeDescription {
  readonly previousVersion: number
  readonly fieldsAdded: readonly FieldChangeSummary[]
  readonly fieldsUpdated: readonly FieldChangeSummary[]
  readonly fieldsDeleted: readonly FieldChangeSummary[]
}
