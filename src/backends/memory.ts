/**
 * In-Memory Collaborators
 *
 * Process-local implementations of the collaborator interfaces, used by the
 * tests and for embedding the engine without a database.
 *
 * @module backends/memory
 */

import type { ChangeRecord } from '../types/changes'
import type {
  Authorization,
  Caller,
  ChangeHistoryStore,
  CommitResult,
  Persistence,
  ReferenceResolver,
} from '../types/collaborators'
import type { EntityReference, Snapshot } from '../types/snapshot'
import type { EntityTypeRegistry } from '../schema/registry'
import { valueOf } from '../types/snapshot'

function entityPath(entityType: string, key: string): string {
  return `${entityType}/${key}`
}

// =============================================================================
// Persistence
// =============================================================================

/**
 * Snapshot store with a revision check on every commit
 */
export class MemoryPersistence implements Persistence {
  readonly type = 'memory'

  private snapshots = new Map<string, Map<string, Snapshot>>()

  private table(entityType: string): Map<string, Snapshot> {
    let table = this.snapshots.get(entityType)
    if (!table) {
      table = new Map()
      this.snapshots.set(entityType, table)
    }
    return table
  }

  async load(entityType: string, key: string): Promise<Snapshot | null> {
    return this.table(entityType).get(key) ?? null
  }

  async commit(entityType: string, key: string, expectedRevision: number, snapshot: Snapshot): Promise<CommitResult> {
    const table = this.table(entityType)
    const stored = table.get(key)
    const actualRevision = stored?.revision ?? 0

    if (actualRevision !== expectedRevision) {
      return { ok: false, reason: 'version-conflict', actualRevision: stored?.revision }
    }

    // Snapshots are never mutated in place
    const committed: Snapshot = Object.freeze({
      ...snapshot,
      entityType,
      key,
      revision: expectedRevision + 1,
      fields: Object.freeze({ ...snapshot.fields }),
    })
    table.set(key, committed)
    return { ok: true, snapshot: committed }
  }

  async list(entityType: string): Promise<Snapshot[]> {
    return [...this.table(entityType).values()].sort((a, b) => compareKeys(a.key, b.key))
  }

  /**
   * Remove every stored snapshot
   */
  clear(): void {
    this.snapshots.clear()
  }
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// =============================================================================
// Change History
// =============================================================================

export class MemoryChangeHistoryStore implements ChangeHistoryStore {
  private records = new Map<string, ChangeRecord[]>()

  async getLastRecord(entityType: string, key: string): Promise<ChangeRecord | null> {
    const records = this.records.get(entityPath(entityType, key))
    return records?.[records.length - 1] ?? null
  }

  async append(entityType: string, key: string, record: ChangeRecord): Promise<void> {
    const path = entityPath(entityType, key)
    const records = this.records.get(path) ?? []
    records.push(record)
    this.records.set(path, records)
  }

  async replaceLast(entityType: string, key: string, record: ChangeRecord | null): Promise<void> {
    const records = this.records.get(entityPath(entityType, key))
    if (!records || records.length === 0) {
      if (record) await this.append(entityType, key, record)
      return
    }
    if (record) {
      records[records.length - 1] = record
    } else {
      records.pop()
    }
  }

  async list(entityType: string, key: string): Promise<ChangeRecord[]> {
    return [...(this.records.get(entityPath(entityType, key)) ?? [])]
  }
}

// =============================================================================
// Reference Resolution
// =============================================================================

/**
 * Resolves references by loading the named entity from persistence
 */
export class PersistenceReferenceResolver implements ReferenceResolver {
  constructor(private readonly persistence: Persistence) {}

  async resolve(entityType: string, name: string): Promise<EntityReference | null> {
    const snapshot = await this.persistence.load(entityType, name)
    if (!snapshot) return null
    return toReference(snapshot)
  }
}

/**
 * Reference pointing at a snapshot
 */
export function toReference(snapshot: Snapshot): EntityReference {
  const displayName = valueOf(snapshot.fields['displayName'])
  const ref: EntityReference = { id: snapshot.id, type: snapshot.entityType, name: snapshot.key }
  if (typeof displayName === 'string') {
    ref.displayName = displayName
  }
  return ref
}

// =============================================================================
// Authorization
// =============================================================================

/**
 * Field-level policy: read-only callers modify nothing, admins modify every
 * field, everyone else every field not marked protected
 */
export class FieldPolicyAuthorization implements Authorization {
  constructor(private readonly registry: EntityTypeRegistry) {}

  async canModifyFields(caller: Caller, entityType: string, fieldNames: readonly string[]): Promise<string[]> {
    if (caller.readOnly) return []
    if (caller.admin) return [...fieldNames]
    const descriptor = this.registry.descriptor(entityType)
    const protectedFields = new Set(descriptor.fields.filter(f => f.protected).map(f => f.name))
    return fieldNames.filter(name => !protectedFields.has(name))
  }
}
