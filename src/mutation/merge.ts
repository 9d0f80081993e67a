/**
 * Patch Merge Engine
 *
 * Given the last persisted snapshot of an entity, the field states a caller
 * asked for and the open change record, produces the next snapshot and the
 * change record to store. Pure: no collaborator is called from here.
 *
 * Rules:
 * - system-managed fields keep their current state
 * - changed fields the caller may not modify are reverted to their current state
 * - a caller allowed to modify nothing is Forbidden
 * - follow-up MINOR patches of the same caller within the session window
 *   are folded into the open record instead of bumping the version again
 * - a patch that changes nothing yields NO_CHANGE and the current snapshot
 *
 * @module mutation/merge
 */

import type { ChangeRecord, FieldChange } from '../types/changes'
import type { Caller } from '../types/collaborators'
import type { EntityTypeDescriptor } from '../types/schema'
import type { FieldState, FieldStates, Snapshot } from '../types/snapshot'
import { diffField, diffFields } from '../changes/diff'
import { consolidateChanges } from '../changes/consolidate'
import { classifyChanges, nextVersion } from '../changes/version'
import { PermissionDeniedError } from '../errors'

// =============================================================================
// Types
// =============================================================================

export interface MergeInput {
  readonly descriptor: EntityTypeDescriptor
  readonly current: Snapshot
  /** Field states the caller asked for; a missing field is unset */
  readonly requested: FieldStates
  /** Last stored change record of the entity */
  readonly lastRecord: ChangeRecord | null
  readonly caller: Caller
  /** Fields the caller may modify, as answered by the authorization collaborator */
  readonly allowedFields: readonly string[]
  readonly now: number
  readonly sessionTimeoutMs: number
}

export interface MergeResult {
  /** Snapshot to commit (the current snapshot when nothing changed) */
  readonly snapshot: Snapshot
  /** Record to store: fresh, consolidated, or NO_CHANGE */
  readonly record: ChangeRecord
  /** The record folds this patch into the open session record */
  readonly consolidated: boolean
  /** Changes computed for this patch alone */
  readonly patchChanges: readonly FieldChange[]
  /** Fields whose requested change was dropped for lack of permission */
  readonly revertedFields: readonly string[]
}

// =============================================================================
// Field Resolution
// =============================================================================

/**
 * Effective field states: requested states, except for system-managed
 * fields and fields the caller may not touch
 */
export function resolveFields(
  descriptor: EntityTypeDescriptor,
  current: FieldStates,
  requested: FieldStates,
  allowedFields: readonly string[]
): { fields: Record<string, FieldState>; revertedFields: string[] } {
  const allowed = new Set(allowedFields)
  const fields: Record<string, FieldState> = {}
  const revertedFields: string[] = []

  for (const field of descriptor.fields) {
    const before = current[field.name]
    let after = requested[field.name]

    if (field.excluded) {
      after = before
    } else if (!allowed.has(field.name) && diffField(field, before, after).length > 0) {
      after = before
      revertedFields.push(field.name)
    }

    if (after !== undefined && after.kind !== 'unset') {
      fields[field.name] = after
    }
  }
  return { fields, revertedFields }
}

// =============================================================================
// Session Consolidation
// =============================================================================

/**
 * Whether a patch continues the editing session of `lastRecord`: the version
 * has not moved since the record, the same caller wrote it, both updates are
 * MINOR and the session window is still open
 */
export function continuesSession(
  lastRecord: ChangeRecord | null,
  current: Snapshot,
  caller: Caller,
  updateType: ChangeRecord['updateType'],
  now: number,
  sessionTimeoutMs: number
): lastRecord is ChangeRecord {
  return (
    lastRecord !== null &&
    lastRecord.newVersion === current.version &&
    lastRecord.updatedBy === caller.name &&
    lastRecord.updateType === 'MINOR' &&
    updateType === 'MINOR' &&
    now - lastRecord.updatedAt <= sessionTimeoutMs
  )
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Merge a requested state into the current snapshot
 *
 * @throws PermissionDeniedError when the caller may modify no field at all
 */
export function mergePatch(input: MergeInput): MergeResult {
  const { descriptor, current, caller, now } = input

  if (input.allowedFields.length === 0) {
    throw new PermissionDeniedError(`${descriptor.entityType}/${current.key}`, caller.name)
  }

  const { fields, revertedFields } = resolveFields(descriptor, current.fields, input.requested, input.allowedFields)
  const patchChanges = diffFields(descriptor, current.fields, fields)
  const updateType = classifyChanges(descriptor, patchChanges)

  const base = {
    entityType: descriptor.entityType,
    key: current.key,
    updatedBy: caller.name,
    updatedAt: now,
  }

  if (updateType === 'NO_CHANGE') {
    return {
      snapshot: current,
      record: {
        ...base,
        previousVersion: current.version,
        newVersion: current.version,
        updateType,
        changes: [],
        sessionStartedAt: now,
      },
      consolidated: false,
      patchChanges,
      revertedFields,
    }
  }

  const next = (version: number): Snapshot => ({
    ...current,
    version,
    revision: current.revision + 1,
    updatedAt: now,
    updatedBy: caller.name,
    fields,
  })

  if (continuesSession(input.lastRecord, current, caller, updateType, now, input.sessionTimeoutMs)) {
    const session = input.lastRecord
    const changes = consolidateChanges(descriptor, session.changes, patchChanges)

    // The session's edits cancelled out: back to the version before it
    if (changes.length === 0) {
      return {
        snapshot: next(session.previousVersion),
        record: {
          ...base,
          previousVersion: session.previousVersion,
          newVersion: session.previousVersion,
          updateType: 'NO_CHANGE',
          changes,
          sessionStartedAt: session.sessionStartedAt,
        },
        consolidated: true,
        patchChanges,
        revertedFields,
      }
    }

    return {
      snapshot: next(session.newVersion),
      record: {
        ...base,
        previousVersion: session.previousVersion,
        newVersion: session.newVersion,
        updateType: classifyChanges(descriptor, changes),
        changes,
        sessionStartedAt: session.sessionStartedAt,
      },
      consolidated: true,
      patchChanges,
      revertedFields,
    }
  }

  const newVersion = nextVersion(current.version, updateType)
  return {
    snapshot: next(newVersion),
    record: {
      ...base,
      previousVersion: current.version,
      newVersion,
      updateType,
      changes: patchChanges,
      sessionStartedAt: now,
    },
    consolidated: false,
    patchChanges,
    revertedFields,
  }
}
