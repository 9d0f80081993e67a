/**
 * Collaborator interfaces
 *
 * The engine reaches persistence, authorization, reference lookups and the
 * change history only through these interfaces. Every call may fail
 * independently; only a single-entity commit is atomic.
 */

import type { ChangeRecord } from './changes'
import type { EntityReference, FieldStates, Snapshot } from './snapshot'

/**
 * Identity of the party performing a mutation
 */
export interface Caller {
  readonly name: string
  /** Elevated rights: may change protected fields */
  readonly admin?: boolean | undefined
  /** May read but not modify any entity */
  readonly readOnly?: boolean | undefined
}

export type CommitResult =
  | { readonly ok: true; readonly snapshot: Snapshot }
  | { readonly ok: false; readonly reason: 'version-conflict'; readonly actualRevision: number | undefined }

export interface Persistence {
  /** Current snapshot, or null when the key does not exist */
  load(entityType: string, key: string): Promise<Snapshot | null>
  /**
   * Store `snapshot` if the stored revision still equals `expectedRevision`
   * (0 means "must not exist yet").
   */
  commit(entityType: string, key: string, expectedRevision: number, snapshot: Snapshot): Promise<CommitResult>
  /** All current snapshots of one entity type */
  list(entityType: string): Promise<Snapshot[]>
}

export interface Authorization {
  /** Subset of `fieldNames` the caller may modify */
  canModifyFields(caller: Caller, entityType: string, fieldNames: readonly string[]): Promise<string[]>
}

export interface ReferenceResolver {
  resolve(entityType: string, name: string): Promise<EntityReference | null>
}

export interface ScopeResolver {
  /** Whether entity `name` of `entityType` lies within the scope hint */
  contains(scope: string, entityType: string, name: string): Promise<boolean>
}

export interface ChangeHistoryStore {
  getLastRecord(entityType: string, key: string): Promise<ChangeRecord | null>
  append(entityType: string, key: string, record: ChangeRecord): Promise<void>
  /** Replace the open record after consolidation; null removes it */
  replaceLast(entityType: string, key: string, record: ChangeRecord | null): Promise<void>
  list(entityType: string, key: string): Promise<ChangeRecord[]>
}

/**
 * Mutation about to be committed, as seen by a {@link MutationGuard}
 */
export interface GuardedMutation {
  readonly entityType: string
  readonly key: string
  readonly caller: Caller
  /** Stored states, or null for a new entity */
  readonly current: FieldStates | null
  readonly next: FieldStates
}

/**
 * Entity rule checked before a create or update commits; throws to refuse it
 */
export interface MutationGuard {
  check(mutation: GuardedMutation): Promise<void>
}
