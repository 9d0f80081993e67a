/**
 * Shared test fixtures
 *
 * A catalog seeded with a small team hierarchy and two roles:
 *
 *   Organization
 *   ├── Engineering
 *   │   └── Backend
 *   └── Sales
 */

import type { Caller, EntityReference } from '../src/types'
import { CatalogEngine, type CatalogEngineOptions } from '../src/engine'
import { MemoryChangeHistoryStore, MemoryPersistence } from '../src/backends/memory'
import { ORGANIZATION, ROLE, TEAM } from '../src/entities'

// =============================================================================
// Callers
// =============================================================================

export const admin: Caller = { name: 'admin', admin: true }

export const editor: Caller = { name: 'editor' }

export const otherEditor: Caller = { name: 'other-editor' }

export const viewer: Caller = { name: 'viewer', readOnly: true }

// =============================================================================
// References
// =============================================================================

export const TEAMS = {
  organization: ORGANIZATION,
  engineering: { id: 'team-engineering', type: TEAM, name: 'Engineering' },
  backend: { id: 'team-backend', type: TEAM, name: 'Backend' },
  sales: { id: 'team-sales', type: TEAM, name: 'Sales' },
} satisfies Record<string, EntityReference>

export const ROLES = {
  steward: { id: 'role-steward', type: ROLE, name: 'DataSteward' },
  consumer: { id: 'role-consumer', type: ROLE, name: 'DataConsumer' },
} satisfies Record<string, EntityReference>

// =============================================================================
// Clock
// =============================================================================

export interface TestClock {
  now: () => number
  advance(ms: number): void
}

export function createClock(start = 1_700_000_000_000): TestClock {
  let time = start
  return {
    now: () => time,
    advance(ms: number) {
      time += ms
    },
  }
}

// =============================================================================
// Catalog
// =============================================================================

export interface TestCatalog {
  engine: CatalogEngine
  persistence: MemoryPersistence
  history: MemoryChangeHistoryStore
  clock: TestClock
}

/**
 * Engine over fresh memory collaborators, seeded with the team hierarchy and
 * roles above. Commit retries do not wait.
 */
export async function createTestCatalog(options: CatalogEngineOptions = {}): Promise<TestCatalog> {
  const persistence = new MemoryPersistence()
  const history = new MemoryChangeHistoryStore()
  const clock = createClock()
  const engine = new CatalogEngine({
    persistence,
    history,
    now: clock.now,
    ...options,
    config: { retryBaseDelayMs: 0, ...options.config },
  })

  await engine.createEntity(TEAM, 'Organization', { teamType: 'Organization' }, admin, { id: TEAMS.organization.id })
  await engine.createEntity(TEAM, 'Engineering', { teamType: 'Department', parents: [TEAMS.organization] }, admin, {
    id: TEAMS.engineering.id,
  })
  await engine.createEntity(TEAM, 'Backend', { teamType: 'Group', parents: [TEAMS.engineering] }, admin, {
    id: TEAMS.backend.id,
  })
  await engine.createEntity(TEAM, 'Sales', { teamType: 'Department', parents: [TEAMS.organization] }, admin, {
    id: TEAMS.sales.id,
  })
  await engine.createEntity(ROLE, 'DataSteward', {}, admin, { id: ROLES.steward.id })
  await engine.createEntity(ROLE, 'DataConsumer', {}, admin, { id: ROLES.consumer.id })

  return { engine, persistence, history, clock }
}

/**
 * Promise resolved from outside, for holding a collaborator call open
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(r => {
    resolve = r
  })
  return { promise, resolve }
}
