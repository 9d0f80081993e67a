/**
 * Change Recorder Tests
 */

import { describe, it, expect } from 'vitest'
import { diff, diffField, diffFields, keyedElements, valuesEqual } from '../../../src/changes/diff'
import { classifyChanges, nextVersion } from '../../../src/changes/version'
import { getField, type FieldDescriptor } from '../../../src/types/schema'
import { defaulted, explicit, UNSET, type FieldStates, type Snapshot } from '../../../src/types/snapshot'
import { userType } from '../../../src/entities'
import { ROLES, TEAMS } from '../../fixtures'

function field(name: string): FieldDescriptor {
  const descriptor = getField(userType, name)
  if (!descriptor) throw new Error(`no field ${name}`)
  return descriptor
}

function snapshot(version: number, fields: FieldStates): Snapshot {
  return {
    entityType: 'user',
    key: 'alice',
    id: 'user-alice',
    version,
    revision: 1,
    updatedAt: 1000,
    updatedBy: 'admin',
    fields,
  }
}

// =============================================================================
// Field Diff
// =============================================================================

describe('diffField', () => {
  it('should record a value appearing as ADDED', () => {
    expect(diffField(field('displayName'), undefined, explicit('Alice'))).toEqual([
      { name: 'displayName', kind: 'ADDED', newValue: 'Alice' },
    ])
  })

  it('should record a value disappearing as DELETED', () => {
    expect(diffField(field('displayName'), explicit('Alice'), UNSET)).toEqual([
      { name: 'displayName', kind: 'DELETED', oldValue: 'Alice' },
    ])
  })

  it('should record a changed value as UPDATED', () => {
    expect(diffField(field('timezone'), explicit('UTC'), explicit('Europe/Paris'))).toEqual([
      { name: 'timezone', kind: 'UPDATED', oldValue: 'UTC', newValue: 'Europe/Paris' },
    ])
  })

  it('should record nothing for equal values', () => {
    expect(diffField(field('timezone'), explicit('UTC'), explicit('UTC'))).toEqual([])
    expect(diffField(field('timezone'), undefined, UNSET)).toEqual([])
  })

  it('should record nothing when a default value is chosen explicitly', () => {
    expect(diffField(field('isAdmin'), defaulted(false), explicit(false))).toEqual([])
  })

  it('should record a default replaced by a chosen value as DELETED plus ADDED', () => {
    expect(diffField(field('isAdmin'), defaulted(false), explicit(true))).toEqual([
      { name: 'isAdmin', kind: 'DELETED', oldValue: false },
      { name: 'isAdmin', kind: 'ADDED', newValue: true },
    ])
  })

  it('should diff collections element by element, deletions first', () => {
    const changes = diffField(
      field('teams'),
      defaulted([TEAMS.organization]),
      explicit([TEAMS.engineering, TEAMS.sales])
    )
    expect(changes).toEqual([
      { name: 'teams', kind: 'DELETED', oldValue: TEAMS.organization, elementKey: 'organization' },
      { name: 'teams', kind: 'ADDED', newValue: TEAMS.engineering, elementKey: 'team-engineering' },
      { name: 'teams', kind: 'ADDED', newValue: TEAMS.sales, elementKey: 'team-sales' },
    ])
  })

  it('should ignore element order and display names in collections', () => {
    const before = explicit([ROLES.steward, ROLES.consumer])
    const after = explicit([{ ...ROLES.consumer, displayName: 'Consumer' }, ROLES.steward])
    expect(diffField(field('roles'), before, after)).toEqual([])
  })
})

describe('keyedElements', () => {
  it('should key elements by identity and keep the first duplicate', () => {
    const elements = keyedElements(userTeams(), [TEAMS.sales, { ...TEAMS.sales, displayName: 'Dup' }, TEAMS.backend])
    expect([...elements.keys()]).toEqual(['team-sales', 'team-backend'])
    expect(elements.get('team-sales')).toEqual(TEAMS.sales)
  })

  it('should reject a value that is not a reference list', () => {
    expect(() => keyedElements(userTeams(), 'Engineering')).toThrow('Field teams must hold a list of references')
  })

  function userTeams() {
    const teams = field('teams')
    if (teams.kind !== 'references') throw new Error('teams is a collection')
    return teams
  }
})

describe('valuesEqual', () => {
  it('should compare scalars structurally', () => {
    expect(valuesEqual(field('profile'), { images: ['a'] }, { images: ['a'] })).toBe(true)
    expect(valuesEqual(field('profile'), { images: ['a'] }, { images: ['b'] })).toBe(false)
  })

  it('should compare collections as sets of identities', () => {
    expect(valuesEqual(field('roles'), [ROLES.steward], [ROLES.steward])).toBe(true)
    expect(valuesEqual(field('roles'), [ROLES.steward], [ROLES.consumer])).toBe(false)
  })
})

// =============================================================================
// Snapshot Diff
// =============================================================================

describe('diffFields', () => {
  it('should follow declaration order', () => {
    const changes = diffFields(
      userType,
      {},
      { timezone: explicit('UTC'), displayName: explicit('Alice') }
    )
    expect(changes.map(c => c.name)).toEqual(['displayName', 'timezone'])
  })

  it('should skip system-managed fields', () => {
    const changes = diffFields(userType, {}, { inheritedRoles: explicit([ROLES.consumer]) })
    expect(changes).toEqual([])
  })
})

describe('diff', () => {
  it('should classify ordinary changes as MINOR', () => {
    const record = diff(userType, snapshot(0.1, {}), snapshot(0.1, { displayName: explicit('Alice') }))
    expect(record.updateType).toBe('MINOR')
    expect(record.previousVersion).toBe(0.1)
    expect(record.newVersion).toBe(0.2)
    expect(record.entityType).toBe('user')
    expect(record.key).toBe('alice')
  })

  it('should classify an identity-defining change as MAJOR', () => {
    const record = diff(
      userType,
      snapshot(0.3, { email: explicit('alice@example.com') }),
      snapshot(0.3, { email: explicit('alice@example.org'), displayName: explicit('Alice') })
    )
    expect(record.updateType).toBe('MAJOR')
    expect(record.newVersion).toBe(1.3)
  })

  it('should keep the version when nothing changed', () => {
    const fields = { email: explicit('alice@example.com') }
    const record = diff(userType, snapshot(0.4, fields), snapshot(0.4, fields))
    expect(record.updateType).toBe('NO_CHANGE')
    expect(record.changes).toEqual([])
    expect(record.newVersion).toBe(0.4)
  })
})

describe('version arithmetic', () => {
  it('should step versions without floating point drift', () => {
    expect(nextVersion(0.1, 'MINOR')).toBe(0.2)
    expect(nextVersion(0.2, 'MINOR')).toBe(0.3)
    expect(nextVersion(0.9, 'MAJOR')).toBe(1.9)
    expect(nextVersion(1.9, 'NO_CHANGE')).toBe(1.9)
  })

  it('should classify by the fields that changed', () => {
    expect(classifyChanges(userType, [])).toBe('NO_CHANGE')
    expect(classifyChanges(userType, [{ name: 'timezone', kind: 'ADDED', newValue: 'UTC' }])).toBe('MINOR')
    expect(classifyChanges(userType, [{ name: 'email', kind: 'DELETED', oldValue: 'a@b.c' }])).toBe('MAJOR')
  })
})
