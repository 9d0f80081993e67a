/**
 * CSV Contract Validation Tests
 */

import { describe, it, expect } from 'vitest'
import {
  describeContract,
  requestedStates,
  toRecord,
  validateRecord,
  type CellValidationContext,
  type ValidatedRow,
} from '../../../src/csv/contract'
import type { ReferenceResolver, ScopeResolver } from '../../../src/types/collaborators'
import type { EntityReference, FieldValue, Snapshot } from '../../../src/types/snapshot'
import { defaulted, explicit, UNSET } from '../../../src/types/snapshot'
import { teamCsv, userCsv, userType } from '../../../src/entities'
import { ROLES, TEAMS } from '../../fixtures'

const known: EntityReference[] = [
  TEAMS.organization,
  TEAMS.engineering,
  TEAMS.backend,
  TEAMS.sales,
  ROLES.steward,
  ROLES.consumer,
]

const resolver: ReferenceResolver = {
  resolve: async (entityType, name) => known.find(r => r.type === entityType && r.name === name) ?? null,
}

const underEngineering = new Set(['Engineering', 'Backend'])
const scopeResolver: ScopeResolver = {
  contains: async (scope, _entityType, name) => scope !== 'Engineering' || underEngineering.has(name),
}

const context: CellValidationContext = { resolver, scopeResolver, valueSeparator: ';' }

const row = (cells: Partial<Record<'name' | 'displayName' | 'email' | 'isAdmin' | 'teams' | 'roles', string>>) => [
  cells.name ?? 'alice',
  cells.displayName ?? '',
  '',
  cells.email ?? 'alice@example.com',
  '',
  cells.isAdmin ?? '',
  cells.teams ?? 'Engineering',
  cells.roles ?? '',
]

describe('validateRecord', () => {
  it('should type every cell of a valid row', async () => {
    const result = await validateRecord(
      userCsv,
      ['alice', 'Alice', '', 'alice@example.com', 'UTC', 'TRUE', 'Engineering; Sales', 'DataSteward'],
      context
    )

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.row.key).toBe('alice')
    expect(Object.fromEntries(result.row.values)).toEqual({
      displayName: 'Alice',
      description: null,
      email: 'alice@example.com',
      timezone: 'UTC',
      isAdmin: true,
      teams: [TEAMS.engineering, TEAMS.sales],
      roles: [ROLES.steward],
    })
  })

  it('should report a missing required cell', async () => {
    const result = await validateRecord(userCsv, row({ email: ' ' }), context)
    expect(result).toEqual({ ok: false, errors: ['#INVALID_FIELD: Field 3 error - email is required'] })
  })

  it('should report a missing key', async () => {
    const result = await validateRecord(userCsv, row({ name: '' }), context)
    expect(result).toEqual({ ok: false, errors: ['#INVALID_FIELD: Field 0 error - name is required'] })
  })

  it('should report a value not matching the column pattern', async () => {
    const result = await validateRecord(userCsv, row({ name: 'a::b' }), context)
    expect(result).toEqual({ ok: false, errors: ['#INVALID_FIELD: Field 0 error - name must match "^((?!::).)*$"'] })
  })

  it('should report a malformed boolean', async () => {
    const result = await validateRecord(userCsv, row({ isAdmin: 'yes' }), context)
    expect(result).toEqual({
      ok: false,
      errors: ['#INVALID_FIELD: Field 5 error - isAdmin must be true or false, found yes'],
    })
  })

  it('should report an unknown enum value', async () => {
    const result = await validateRecord(teamCsv, ['Platform', '', '', 'Squad', '', '', ''], context)
    expect(result).toEqual({
      ok: false,
      errors: [
        '#INVALID_FIELD: Field 3 error - teamType must be one of Group, Department, Division, BusinessUnit, Organization, found Squad',
      ],
    })
  })

  it('should report every unknown reference', async () => {
    const result = await validateRecord(userCsv, row({ teams: 'teamA;Sales;teamB' }), context)
    expect(result).toEqual({
      ok: false,
      errors: [
        '#ENTITY_NOT_FOUND: Field 6 error - Entity team teamA not found',
        '#ENTITY_NOT_FOUND: Field 6 error - Entity team teamB not found',
      ],
    })
  })

  it('should collect errors of several cells in column order', async () => {
    const result = await validateRecord(userCsv, row({ isAdmin: 'maybe', roles: 'Owner', email: '' }), context)
    expect(result).toEqual({
      ok: false,
      errors: [
        '#INVALID_FIELD: Field 3 error - email is required',
        '#INVALID_FIELD: Field 5 error - isAdmin must be true or false, found maybe',
        '#ENTITY_NOT_FOUND: Field 7 error - Entity role Owner not found',
      ],
    })
  })

  it('should report references outside the scope hint', async () => {
    const scoped = { ...context, scopeHint: 'Engineering' }

    expect(await validateRecord(userCsv, row({ teams: 'Backend' }), scoped)).toMatchObject({ ok: true })
    expect(await validateRecord(userCsv, row({ teams: 'Backend;Sales' }), scoped)).toEqual({
      ok: false,
      errors: ['#SCOPE_VIOLATION: Field 6 error - Team Sales of user alice is not under Engineering hierarchy'],
    })
  })

  it('should not check scope on unscoped columns', async () => {
    const scoped = { ...context, scopeHint: 'Engineering' }
    expect(await validateRecord(userCsv, row({ teams: 'Backend', roles: 'DataConsumer' }), scoped)).toMatchObject({
      ok: true,
    })
  })
})

describe('requestedStates', () => {
  it('should set filled cells and reset emptied ones to their defaults', () => {
    const validated: ValidatedRow = {
      key: 'alice',
      values: new Map<string, FieldValue | null>([
        ['displayName', 'Alice'],
        ['timezone', null],
        ['isAdmin', null],
        ['roles', null],
        ['teams', [TEAMS.sales]],
      ]),
    }
    const base = {
      email: explicit('alice@example.com'),
      timezone: explicit('UTC'),
      isAdmin: explicit(true),
      teams: explicit([TEAMS.engineering]),
    }

    const states = requestedStates(userType, base, validated)

    expect(states).toEqual({
      email: explicit('alice@example.com'),
      displayName: explicit('Alice'),
      timezone: UNSET,
      isAdmin: defaulted(false),
      teams: explicit([TEAMS.sales]),
    })
  })
})

describe('toRecord', () => {
  it('should render every column of a snapshot', () => {
    const snapshot: Snapshot = {
      entityType: 'user',
      key: 'alice',
      id: 'user-alice',
      version: 0.2,
      revision: 2,
      updatedAt: 0,
      updatedBy: 'admin',
      fields: {
        displayName: explicit('Alice'),
        email: explicit('alice@example.com'),
        isAdmin: defaulted(false),
        teams: defaulted([TEAMS.organization]),
        roles: explicit([ROLES.steward, ROLES.consumer]),
      },
    }

    expect(toRecord(userCsv, snapshot, ';')).toEqual([
      'alice',
      'Alice',
      '',
      'alice@example.com',
      '',
      'false',
      'Organization',
      'DataSteward;DataConsumer',
    ])
  })
})

describe('describeContract', () => {
  it('should document columns in header order', () => {
    const docs = describeContract(userCsv)

    expect(docs.map(d => d.name)).toEqual([
      'name',
      'displayName',
      'description',
      'email',
      'timezone',
      'isAdmin',
      'teams',
      'roles',
    ])
    expect(docs[0]).toEqual({
      name: 'name',
      required: true,
      description: 'The name of the user being created.',
      examples: ['`bob`, `alice`'],
    })
    expect(docs.find(d => d.name === 'timezone')?.required).toBe(false)
  })
})
