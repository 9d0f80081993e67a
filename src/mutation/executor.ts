/**
 * Mutation Executor
 *
 * Runs single-entity mutations against the collaborators:
 * - per-entity serialization inside the process
 * - load, merge and optimistic commit on the stored revision
 * - bounded retry of commit-time version conflicts
 * - change history append, or replacement of the open session record
 * - mutation guards checked before every commit
 *
 * Both single-entity patches and CSV rows go through this class.
 */

import type { ChangeRecord } from '../types/changes'
import type {
  Authorization,
  Caller,
  ChangeHistoryStore,
  GuardedMutation,
  MutationGuard,
  Persistence,
  ReferenceResolver,
} from '../types/collaborators'
import type { EntityTypeDescriptor } from '../types/schema'
import {
  defaulted,
  isEntityReference,
  isReferenceList,
  type EntityReference,
  type FieldState,
  type FieldStates,
  type Snapshot,
} from '../types/snapshot'
import type { EngineConfig } from '../config'
import type { EntityTypeRegistry } from '../schema/registry'
import { patchableFields } from '../types/schema'
import { defaultStates, validateFieldStates } from '../schema/validator'
import { mergePatch, resolveFields } from './merge'
import { INITIAL_VERSION } from '../constants'
import {
  AlreadyExistsError,
  EntityNotFoundError,
  ErrorCode,
  PermissionDeniedError,
  ValidationError,
  VersionConflictError,
  wrapError,
} from '../errors'
import { KeyedMutex } from '../utils/mutex'
import { withRetry } from '../utils/retry'
import { getUUID } from '../utils/random'
import { scopedLogger } from '../utils/logger'

const logger = scopedLogger('mutation')

// =============================================================================
// Types
// =============================================================================

export interface CreateResult {
  readonly outcome: 'created'
  readonly snapshot: Snapshot
  readonly revertedFields: readonly string[]
}

export interface UpdateResult {
  readonly outcome: 'updated' | 'unchanged'
  readonly snapshot: Snapshot
  /** Stored change record, or the NO_CHANGE record of a no-op patch */
  readonly record: ChangeRecord
  readonly consolidated: boolean
  readonly revertedFields: readonly string[]
}

export type MutationResult = CreateResult | UpdateResult

export type MutationOutcome = MutationResult['outcome']

/** Builds requested field states from the current snapshot */
export type UpdateBuilder = (current: Snapshot) => FieldStates

/** Builds requested field states from the initial (default) states */
export type CreateBuilder = (initial: FieldStates) => FieldStates

export interface MutationExecutorConfig {
  registry: EntityTypeRegistry
  persistence: Persistence
  authorization: Authorization
  history: ChangeHistoryStore
  config: EngineConfig
  /** Points declared default references at the stored entities they name */
  resolver?: ReferenceResolver | undefined
  /** Rules every create and update must pass before it commits */
  guards?: readonly MutationGuard[] | undefined
  /** Clock used for snapshot and record timestamps */
  now?: (() => number) | undefined
}

// =============================================================================
// Mutation Executor
// =============================================================================

export class MutationExecutor {
  private readonly registry: EntityTypeRegistry
  private readonly persistence: Persistence
  private readonly authorization: Authorization
  private readonly history: ChangeHistoryStore
  private readonly config: EngineConfig
  private readonly resolver: ReferenceResolver | undefined
  private readonly guards: readonly MutationGuard[]
  private readonly now: () => number
  private readonly mutex = new KeyedMutex()

  constructor(options: MutationExecutorConfig) {
    this.registry = options.registry
    this.persistence = options.persistence
    this.authorization = options.authorization
    this.history = options.history
    this.config = options.config
    this.resolver = options.resolver
    this.guards = options.guards ?? []
    this.now = options.now ?? Date.now
  }

  /**
   * Create an entity
   *
   * @throws AlreadyExistsError when the key is taken
   */
  async create(
    entityType: string,
    key: string,
    caller: Caller,
    build: CreateBuilder,
    id?: string
  ): Promise<CreateResult> {
    const descriptor = this.registry.descriptor(entityType)
    assertKey(entityType, key)

    return this.run(entityType, key, async () => {
      if (await this.persistence.load(entityType, key)) {
        throw new AlreadyExistsError(entityType, key)
      }
      const result = await this.createOnce(descriptor, key, caller, build, id)
      if (!result) {
        throw new AlreadyExistsError(entityType, key)
      }
      return result
    })
  }

  /**
   * Update an existing entity
   *
   * @throws EntityNotFoundError, PermissionDeniedError, ValidationError, or
   * VersionConflictError once retries are exhausted
   */
  async update(entityType: string, key: string, caller: Caller, build: UpdateBuilder): Promise<UpdateResult> {
    const descriptor = this.registry.descriptor(entityType)

    return this.run(entityType, key, async () => {
      const current = await this.persistence.load(entityType, key)
      if (!current) {
        throw new EntityNotFoundError(entityType, key)
      }
      return this.updateOnce(descriptor, current, caller, build)
    })
  }

  /**
   * Create the entity when the key is free, update it otherwise
   */
  async upsert(
    entityType: string,
    key: string,
    caller: Caller,
    build: { create: CreateBuilder; update: UpdateBuilder }
  ): Promise<MutationResult> {
    const descriptor = this.registry.descriptor(entityType)
    assertKey(entityType, key)

    return this.run<MutationResult>(entityType, key, async () => {
      const current = await this.persistence.load(entityType, key)
      if (current) {
        return this.updateOnce(descriptor, current, caller, build.update)
      }
      const created = await this.createOnce(descriptor, key, caller, build.create)
      if (!created) {
        // Created concurrently: retry as an update
        throw new VersionConflictError(0, undefined, { entityType, key })
      }
      return created
    })
  }

  // ===========================================================================
  // Attempts
  // ===========================================================================

  private async createOnce(
    descriptor: EntityTypeDescriptor,
    key: string,
    caller: Caller,
    build: CreateBuilder,
    id?: string
  ): Promise<CreateResult | null> {
    const { entityType } = descriptor
    const initial = await this.resolveDefaults(descriptor, defaultStates(descriptor))
    const requested = await this.resolveDefaults(descriptor, build(initial))
    validateFieldStates(descriptor, requested)

    const allowed = await this.allowedFields(descriptor, caller, key)
    const { fields, revertedFields } = resolveFields(descriptor, initial, requested, allowed)
    await this.checkGuards({ entityType, key, caller, current: null, next: fields })

    const now = this.now()
    const snapshot: Snapshot = {
      entityType,
      key,
      id: id ?? getUUID(),
      version: INITIAL_VERSION,
      revision: 1,
      updatedAt: now,
      updatedBy: caller.name,
      fields,
    }

    const committed = await this.persistence.commit(entityType, key, 0, snapshot)
    if (!committed.ok) {
      return null
    }
    logger.debug(`created ${entityType}/${key}`)
    return { outcome: 'created', snapshot: committed.snapshot, revertedFields }
  }

  private async updateOnce(
    descriptor: EntityTypeDescriptor,
    current: Snapshot,
    caller: Caller,
    build: UpdateBuilder
  ): Promise<UpdateResult> {
    const { entityType } = descriptor
    const { key } = current
    const requested = await this.resolveDefaults(descriptor, build(current))
    validateFieldStates(descriptor, requested)

    const allowedFields = await this.allowedFields(descriptor, caller, key)
    const lastRecord = await this.history.getLastRecord(entityType, key)

    const merged = mergePatch({
      descriptor,
      current,
      requested,
      lastRecord,
      caller,
      allowedFields,
      now: this.now(),
      sessionTimeoutMs: this.config.sessionTimeoutMs,
    })

    if (merged.revertedFields.length > 0) {
      logger.info(`reverted fields of ${entityType}/${key} not modifiable by ${caller.name}: ${merged.revertedFields.join(', ')}`)
    }

    if (merged.snapshot === current) {
      return {
        outcome: 'unchanged',
        snapshot: current,
        record: merged.record,
        consolidated: false,
        revertedFields: merged.revertedFields,
      }
    }

    await this.checkGuards({ entityType, key, caller, current: current.fields, next: merged.snapshot.fields })

    const committed = await this.persistence.commit(entityType, key, current.revision, merged.snapshot)
    if (!committed.ok) {
      throw new VersionConflictError(current.revision, committed.actualRevision, { entityType, key })
    }

    try {
      if (!merged.consolidated) {
        await this.history.append(entityType, key, merged.record)
      } else if (merged.record.updateType === 'NO_CHANGE') {
        await this.history.replaceLast(entityType, key, null)
      } else {
        await this.history.replaceLast(entityType, key, merged.record)
      }
    } catch (error) {
      // The commit stands; only its record is missing
      logger.error(
        `history gap: ${entityType}/${key} committed version ${committed.snapshot.version} without its change record`,
        error
      )
      throw error
    }

    return {
      outcome: merged.record.updateType === 'NO_CHANGE' ? 'unchanged' : 'updated',
      snapshot: committed.snapshot,
      record: merged.record,
      consolidated: merged.consolidated,
      revertedFields: merged.revertedFields,
    }
  }

  private async checkGuards(mutation: GuardedMutation): Promise<void> {
    for (const guard of this.guards) {
      await guard.check(mutation)
    }
  }

  /**
   * Replace references held in default states by the stored entities of the
   * same name, so a declared default matches what an import resolves
   */
  private async resolveDefaults(descriptor: EntityTypeDescriptor, states: FieldStates): Promise<FieldStates> {
    if (!this.resolver) return states

    const resolved: Record<string, FieldState> = { ...states }
    for (const field of descriptor.fields) {
      const state = states[field.name]
      if (field.kind === 'scalar' || state === undefined || state.kind !== 'default') continue

      if (isEntityReference(state.value)) {
        resolved[field.name] = defaulted(await this.resolveReference(state.value))
      } else if (isReferenceList(state.value)) {
        const refs: EntityReference[] = []
        for (const ref of state.value) {
          refs.push(await this.resolveReference(ref))
        }
        resolved[field.name] = defaulted(refs)
      }
    }
    return resolved
  }

  private async resolveReference(ref: EntityReference): Promise<EntityReference> {
    return (await this.resolver?.resolve(ref.type, ref.name)) ?? ref
  }

  private async allowedFields(descriptor: EntityTypeDescriptor, caller: Caller, key: string): Promise<string[]> {
    const allowed = await this.authorization.canModifyFields(caller, descriptor.entityType, patchableFields(descriptor))
    if (allowed.length === 0) {
      throw new PermissionDeniedError(`${descriptor.entityType}/${key}`, caller.name)
    }
    return allowed
  }

  // ===========================================================================
  // Serialization and Retry
  // ===========================================================================

  private async run<T>(entityType: string, key: string, attempt: () => Promise<T>): Promise<T> {
    const retrying = (): Promise<T> =>
      withRetry(attempt, {
        maxRetries: this.config.maxCommitRetries,
        baseDelay: this.config.retryBaseDelayMs,
        maxDelay: this.config.retryMaxDelayMs,
        onRetry: ({ attempt: n, delay }) => {
          logger.debug(`version conflict on ${entityType}/${key}, retry ${n} in ${delay}ms`)
        },
      })

    try {
      return this.config.serializeWrites
        ? await this.mutex.withLock(`${entityType}/${key}`, retrying)
        : await retrying()
    } catch (error) {
      const wrapped = wrapError(error, { entityType, key })
      if (wrapped.code === ErrorCode.INTERNAL) {
        logger.error(`mutation of ${entityType}/${key} failed`, error)
      }
      throw wrapped
    }
  }
}

function assertKey(entityType: string, key: string): void {
  if (key.trim() === '') {
    throw new ValidationError(`${entityType} name must not be empty`, { entityType, field: 'name' }, ErrorCode.INVALID_FIELD)
  }
}
