/**
 * CSV Export Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { CatalogEngine } from '../../../src/engine'
import { TEAM, USER } from '../../../src/entities'
import { valueOf } from '../../../src/types/snapshot'
import { admin, createTestCatalog, ROLES, TEAMS, type TestCatalog } from '../../fixtures'

const USER_HEADER = 'name,displayName,description,email,timezone,isAdmin,teams,roles'

describe('CsvExporter', () => {
  let catalog: TestCatalog

  beforeEach(async () => {
    catalog = await createTestCatalog()
    const { engine } = catalog
    await engine.createEntity(USER, 'carol', { email: 'carol@example.com', teams: [TEAMS.backend] }, admin)
    await engine.createEntity(USER, 'bob', { email: 'bob@example.com', teams: [TEAMS.sales], timezone: 'UTC' }, admin)
    await engine.createEntity(
      USER,
      'alice',
      {
        email: 'alice@example.com',
        displayName: 'Alice',
        description: 'Owns the "orders" tables,\nand their lineage',
        teams: [TEAMS.engineering],
        roles: [ROLES.steward, ROLES.consumer],
        isAdmin: true,
      },
      admin
    )
  })

  it('should write the header and one record per entity sorted by key', async () => {
    const csv = await catalog.engine.exportCsv(USER)

    expect(csv.split('\n')).toEqual([
      USER_HEADER,
      'alice,Alice,"Owns the ""orders"" tables,',
      'and their lineage",alice@example.com,,true,Engineering,DataSteward;DataConsumer',
      'bob,,,bob@example.com,UTC,false,Sales,',
      'carol,,,carol@example.com,,false,Backend,',
      '',
    ])
  })

  it('should write only the header when no entity exists', async () => {
    const empty = await createTestCatalog()
    expect(await empty.engine.exportCsv(USER)).toBe(`${USER_HEADER}\n`)
  })

  it('should keep users whose teams lie within the scope', async () => {
    const csv = await catalog.engine.exportCsv(USER, 'Engineering')
    expect(csv.split('\n').map(line => line.split(',')[0])).toEqual([
      'name',
      'alice',
      'and their lineage"',
      'carol',
      '',
    ])
  })

  it('should keep teams within the scope hierarchy', async () => {
    const csv = await catalog.engine.exportCsv(TEAM, 'Engineering')
    expect(csv).toBe(
      'name,displayName,description,teamType,parents,isJoinable,defaultRoles\n' +
        'Backend,,,Group,Engineering,true,\n' +
        'Engineering,,,Department,Organization,true,\n'
    )
  })

  it('should export everything under the Organization', async () => {
    const all = await catalog.engine.exportCsv(USER)
    expect(await catalog.engine.exportCsv(USER, 'Organization')).toBe(all)
  })

  it('should import its own output back without changes', async () => {
    const before = await catalog.engine.getEntity(USER, 'alice')
    const csv = await catalog.engine.exportCsv(USER)

    const result = await catalog.engine.importCsv(USER, undefined, csv, false, admin)

    expect(result.status).toBe('SUCCESS')
    expect(result.rows.map(r => r.details)).toEqual(['Entity unchanged', 'Entity unchanged', 'Entity unchanged'])
    const after = await catalog.engine.getEntity(USER, 'alice')
    expect(after.version).toBe(before.version)
    expect(await catalog.engine.getHistory(USER, 'alice')).toEqual([])
  })

  it('should import an exported team hierarchy back without changes', async () => {
    const csv = await catalog.engine.exportCsv(TEAM)
    const result = await catalog.engine.importCsv(TEAM, undefined, csv, false, admin)
    expect(result.rows.map(r => r.details)).toEqual([
      'Entity unchanged',
      'Entity unchanged',
      'Entity unchanged',
      'Entity unchanged',
    ])
  })
  it('should keep free-text values with surrounding spaces through a round trip', async () => {
    await catalog.engine.applyPatch(USER, 'carol', { displayName: ' Carol ' }, admin)
    const csv = await catalog.engine.exportCsv(USER)

    const result = await catalog.engine.importCsv(USER, undefined, csv, false, admin)

    expect(result.rows.map(r => r.details)).toEqual(['Entity unchanged', 'Entity unchanged', 'Entity unchanged'])
    const carol = await catalog.engine.getEntity(USER, 'carol')
    expect(valueOf(carol.fields['displayName'])).toBe(' Carol ')
    expect(carol.version).toBe(0.2)
  })

  it('should round-trip a user holding the default team of a generated Organization', async () => {
    const engine = new CatalogEngine({ env: {}, config: { retryBaseDelayMs: 0 } })
    const organization = await engine.createEntity(TEAM, 'Organization', { teamType: 'Organization' }, admin)
    await engine.createEntity(USER, 'alice', { email: 'alice@example.com' }, admin)

    const alice = await engine.getEntity(USER, 'alice')
    expect(valueOf(alice.fields['teams'])).toEqual([{ id: organization.snapshot.id, type: TEAM, name: 'Organization' }])

    const csv = await engine.exportCsv(USER)
    expect(csv).toBe(`${USER_HEADER}\nalice,,,alice@example.com,,false,Organization,\n`)

    const result = await engine.importCsv(USER, undefined, csv, false, admin)

    expect(result.rows.map(r => r.details)).toEqual(['Entity unchanged'])
    expect(await engine.getHistory(USER, 'alice')).toEqual([])
  })
})
