/**
 * Patch Merge Engine Tests
 */

import { describe, it, expect } from 'vitest'
import { continuesSession, mergePatch, resolveFields, type MergeInput } from '../../../src/mutation/merge'
import { patchableFields } from '../../../src/types/schema'
import { defaulted, explicit, UNSET, type FieldStates, type Snapshot } from '../../../src/types/snapshot'
import { PermissionDeniedError } from '../../../src/errors'
import { DEFAULT_SESSION_TIMEOUT_MS } from '../../../src/constants'
import { userType } from '../../../src/entities'
import { admin, editor, otherEditor, ROLES, TEAMS } from '../../fixtures'

const T0 = 1_000_000

const base: Snapshot = {
  entityType: 'user',
  key: 'alice',
  id: 'user-alice',
  version: 0.1,
  revision: 1,
  updatedAt: T0,
  updatedBy: 'admin',
  fields: {
    email: explicit('alice@example.com'),
    isAdmin: defaulted(false),
    isBot: defaulted(false),
    teams: defaulted([TEAMS.organization]),
  },
}

const everyField = patchableFields(userType)
const unprotectedFields = everyField.filter(f => !['isAdmin', 'isBot', 'roles'].includes(f))

function input(overrides: Partial<MergeInput> & { requested: FieldStates }): MergeInput {
  return {
    descriptor: userType,
    current: base,
    lastRecord: null,
    caller: editor,
    allowedFields: everyField,
    now: T0 + 1000,
    sessionTimeoutMs: DEFAULT_SESSION_TIMEOUT_MS,
    ...overrides,
  }
}

describe('mergePatch', () => {
  // ===========================================================================
  // Fresh records
  // ===========================================================================

  it('should produce the next snapshot and a fresh MINOR record', () => {
    const result = mergePatch(input({ requested: { ...base.fields, displayName: explicit('Alice') } }))

    expect(result.consolidated).toBe(false)
    expect(result.snapshot.version).toBe(0.2)
    expect(result.snapshot.revision).toBe(2)
    expect(result.snapshot.updatedBy).toBe('editor')
    expect(result.snapshot.updatedAt).toBe(T0 + 1000)
    expect(result.snapshot.fields['displayName']).toEqual(explicit('Alice'))
    expect(result.record).toMatchObject({
      previousVersion: 0.1,
      newVersion: 0.2,
      updateType: 'MINOR',
      updatedBy: 'editor',
      sessionStartedAt: T0 + 1000,
      changes: [{ name: 'displayName', kind: 'ADDED', newValue: 'Alice' }],
    })
  })

  it('should bump the major version on an identity-defining change', () => {
    const result = mergePatch(input({ requested: { ...base.fields, email: explicit('alice@example.org') } }))
    expect(result.record.updateType).toBe('MAJOR')
    expect(result.snapshot.version).toBe(1.1)
  })

  it('should return the current snapshot and NO_CHANGE for a no-op patch', () => {
    const result = mergePatch(input({ requested: base.fields }))

    expect(result.snapshot).toBe(base)
    expect(result.record.updateType).toBe('NO_CHANGE')
    expect(result.record.newVersion).toBe(0.1)
    expect(result.record.changes).toEqual([])
  })

  it('should treat choosing a default value explicitly as no change', () => {
    const result = mergePatch(input({ requested: { ...base.fields, isAdmin: explicit(false) } }))
    expect(result.record.updateType).toBe('NO_CHANGE')
  })

  // ===========================================================================
  // Permissions
  // ===========================================================================

  it('should be forbidden when the caller may modify no field', () => {
    expect(() => mergePatch(input({ requested: base.fields, allowedFields: [] }))).toThrow(PermissionDeniedError)
  })

  it('should revert fields the caller may not modify', () => {
    const result = mergePatch(
      input({
        requested: { ...base.fields, isAdmin: explicit(true), displayName: explicit('Alice') },
        allowedFields: unprotectedFields,
      })
    )

    expect(result.revertedFields).toEqual(['isAdmin'])
    expect(result.snapshot.fields['isAdmin']).toEqual(defaulted(false))
    expect(result.record.changes).toEqual([{ name: 'displayName', kind: 'ADDED', newValue: 'Alice' }])
  })

  it('should keep system-managed fields', () => {
    const result = mergePatch(input({ requested: { ...base.fields, inheritedRoles: explicit([ROLES.consumer]) } }))
    expect(result.record.updateType).toBe('NO_CHANGE')
    expect(result.revertedFields).toEqual([])
  })

  // ===========================================================================
  // Session consolidation
  // ===========================================================================

  describe('session consolidation', () => {
    const first = mergePatch(input({ requested: { ...base.fields, displayName: explicit('Alice') } }))
    const afterFirst = first.snapshot

    it('should fold a follow-up patch of the same caller into the open record', () => {
      const result = mergePatch(
        input({
          current: afterFirst,
          lastRecord: first.record,
          requested: { ...afterFirst.fields, timezone: explicit('UTC') },
          now: T0 + 2000,
        })
      )

      expect(result.consolidated).toBe(true)
      expect(result.snapshot.version).toBe(0.2)
      expect(result.snapshot.revision).toBe(3)
      expect(result.record).toMatchObject({
        previousVersion: 0.1,
        newVersion: 0.2,
        updateType: 'MINOR',
        updatedAt: T0 + 2000,
        sessionStartedAt: T0 + 1000,
      })
      expect(result.record.changes).toEqual([
        { name: 'displayName', kind: 'ADDED', newValue: 'Alice' },
        { name: 'timezone', kind: 'ADDED', newValue: 'UTC' },
      ])
      expect(result.patchChanges).toEqual([{ name: 'timezone', kind: 'ADDED', newValue: 'UTC' }])
    })

    it('should return to the previous version when the session cancels out', () => {
      const result = mergePatch(
        input({
          current: afterFirst,
          lastRecord: first.record,
          requested: base.fields,
          now: T0 + 2000,
        })
      )

      expect(result.consolidated).toBe(true)
      expect(result.record.updateType).toBe('NO_CHANGE')
      expect(result.record.changes).toEqual([])
      expect(result.snapshot.version).toBe(0.1)
      expect(result.snapshot.revision).toBe(3)
    })

    it('should start a new record for a different caller', () => {
      const result = mergePatch(
        input({
          current: afterFirst,
          lastRecord: first.record,
          caller: otherEditor,
          requested: { ...afterFirst.fields, timezone: explicit('UTC') },
          now: T0 + 2000,
        })
      )
      expect(result.consolidated).toBe(false)
      expect(result.snapshot.version).toBe(0.3)
      expect(result.record.previousVersion).toBe(0.2)
    })

    it('should start a new record once the session window has passed', () => {
      const result = mergePatch(
        input({
          current: afterFirst,
          lastRecord: first.record,
          requested: { ...afterFirst.fields, timezone: explicit('UTC') },
          now: T0 + 1000 + DEFAULT_SESSION_TIMEOUT_MS + 1,
        })
      )
      expect(result.consolidated).toBe(false)
      expect(result.snapshot.version).toBe(0.3)
    })

    it('should never fold a MAJOR update', () => {
      const result = mergePatch(
        input({
          current: afterFirst,
          lastRecord: first.record,
          requested: { ...afterFirst.fields, email: explicit('alice@example.org') },
          now: T0 + 2000,
        })
      )
      expect(result.consolidated).toBe(false)
      expect(result.snapshot.version).toBe(1.2)
    })
  })
})

describe('continuesSession', () => {
  it('should require the record to end at the current version', () => {
    const record = mergePatch(input({ requested: { ...base.fields, displayName: explicit('Alice') } })).record
    expect(continuesSession(record, { ...base, version: 0.2 }, editor, 'MINOR', T0 + 2000, 60_000)).toBe(true)
    expect(continuesSession(record, { ...base, version: 0.3 }, editor, 'MINOR', T0 + 2000, 60_000)).toBe(false)
    expect(continuesSession(record, { ...base, version: 0.2 }, admin, 'MINOR', T0 + 2000, 60_000)).toBe(false)
    expect(continuesSession(null, base, editor, 'MINOR', T0 + 2000, 60_000)).toBe(false)
  })
})

describe('resolveFields', () => {
  it('should drop unset states from the resolved fields', () => {
    const { fields } = resolveFields(userType, base.fields, { ...base.fields, timezone: UNSET }, everyField)
    expect(Object.keys(fields)).toEqual(['email', 'isAdmin', 'isBot', 'teams'])
  })
})
