/**
 * CatalogEngine
 *
 * Entry point of the change tracking and bulk mutation engine. Wires the
 * mutation executor, the CSV pipeline and exporter and the bulk job runner
 * to one set of collaborators. Collaborators left out of the options fall
 * back to the in-memory implementations.
 *
 * @example
 * ```typescript
 * const engine = new CatalogEngine()
 * await engine.createEntity('user', 'alice', { email: 'alice@example.com' }, admin)
 * await engine.applyPatch('user', 'alice', { $addToSet: { roles: dataSteward } }, admin)
 * const result = await engine.importCsv('user', 'Engineering', csv, true, admin)
 * ```
 */

import type { ChangeDescription, ChangeRecord } from './types/changes'
import type {
  Authorization,
  Caller,
  ChangeHistoryStore,
  MutationGuard,
  Persistence,
  ReferenceResolver,
  ScopeResolver,
} from './types/collaborators'
import type { CsvColumnDocumentation, ImportExportResult } from './types/csv'
import type { BulkJob } from './types/jobs'
import type { Snapshot } from './types/snapshot'
import { loadConfigFromEnv, type EngineConfig } from './config'
import type { EntityTypeRegistry } from './schema/registry'
import { createCatalogGuards, createCatalogRegistry, TeamHierarchyScope, USER, withInheritedRoles } from './entities'
import {
  FieldPolicyAuthorization,
  MemoryChangeHistoryStore,
  MemoryPersistence,
  PersistenceReferenceResolver,
} from './backends/memory'
import { MutationExecutor, type CreateResult, type UpdateResult } from './mutation/executor'
import { applyPatch as applyOperators, type Patch } from './mutation/operators'
import { describeChanges } from './changes/describe'
import { CsvPipeline } from './csv/pipeline'
import { CsvExporter } from './csv/export'
import { describeContract } from './csv/contract'
import { BulkJobRunner } from './jobs/runner'
import type { JobStore } from './jobs/store'
import { EntityNotFoundError } from './errors'
import { scopedLogger } from './utils/logger'

const logger = scopedLogger('engine')

// =============================================================================
// Options
// =============================================================================

export interface CatalogEngineOptions {
  /** Entity types and CSV contracts (defaults to team, role and user) */
  registry?: EntityTypeRegistry | undefined
  persistence?: Persistence | undefined
  history?: ChangeHistoryStore | undefined
  authorization?: Authorization | undefined
  resolver?: ReferenceResolver | undefined
  /** Scope used by imports and exports (defaults to the team hierarchy) */
  scopeResolver?: ScopeResolver | undefined
  /** Write rules (defaults to the user name, email and joinable team rules) */
  guards?: readonly MutationGuard[] | undefined
  jobStore?: JobStore | undefined
  /** Settings taking precedence over the `CATALOG_*` environment variables */
  config?: Partial<EngineConfig> | undefined
  env?: Record<string, string | undefined> | undefined
  now?: (() => number) | undefined
}

// =============================================================================
// Engine
// =============================================================================

export class CatalogEngine {
  readonly config: EngineConfig
  readonly registry: EntityTypeRegistry
  private readonly persistence: Persistence
  private readonly history: ChangeHistoryStore
  private readonly executor: MutationExecutor
  private readonly pipeline: CsvPipeline
  private readonly exporter: CsvExporter
  private readonly jobs: BulkJobRunner

  constructor(options: CatalogEngineOptions = {}) {
    this.config = loadConfigFromEnv(options.env ?? process.env, options.config)
    this.registry = options.registry ?? createCatalogRegistry()
    this.persistence = options.persistence ?? new MemoryPersistence()
    this.history = options.history ?? new MemoryChangeHistoryStore()

    const scopeResolver = options.scopeResolver ?? new TeamHierarchyScope(this.persistence)
    const resolver = options.resolver ?? new PersistenceReferenceResolver(this.persistence)

    this.executor = new MutationExecutor({
      registry: this.registry,
      persistence: this.persistence,
      authorization: options.authorization ?? new FieldPolicyAuthorization(this.registry),
      history: this.history,
      config: this.config,
      resolver,
      guards: options.guards ?? createCatalogGuards(this.persistence),
      now: options.now,
    })
    this.pipeline = new CsvPipeline({
      registry: this.registry,
      executor: this.executor,
      resolver,
      scopeResolver,
      config: this.config,
    })
    this.exporter = new CsvExporter({
      registry: this.registry,
      persistence: this.persistence,
      scopeResolver,
      config: this.config,
    })
    this.jobs = new BulkJobRunner({ store: options.jobStore, now: options.now })
  }

  // ===========================================================================
  // Single-entity operations
  // ===========================================================================

  /**
   * Create an entity. Fields left out of `values` take their declared
   * defaults; protected fields the caller may not set keep them.
   */
  async createEntity(
    entityType: string,
    key: string,
    values: Patch,
    caller: Caller,
    options: { id?: string | undefined } = {}
  ): Promise<CreateResult> {
    const descriptor = this.registry.descriptor(entityType)
    return this.executor.create(
      entityType,
      key,
      caller,
      initial => applyOperators(descriptor, initial, values).fields,
      options.id
    )
  }

  /**
   * Apply a patch to an existing entity and record the change
   *
   * @throws EntityNotFoundError, ValidationError, PermissionDeniedError, or
   * ConflictError once commit retries are exhausted
   */
  async applyPatch(entityType: string, key: string, patch: Patch, caller: Caller): Promise<UpdateResult> {
    const descriptor = this.registry.descriptor(entityType)
    return this.executor.update(entityType, key, caller, current => applyOperators(descriptor, current.fields, patch).fields)
  }

  /**
   * Current snapshot; users come back with their inherited roles
   */
  async getEntity(entityType: string, key: string): Promise<Snapshot> {
    this.registry.descriptor(entityType)
    const snapshot = await this.persistence.load(entityType, key)
    if (!snapshot) {
      throw new EntityNotFoundError(entityType, key)
    }
    return entityType === USER ? withInheritedRoles(this.persistence, snapshot) : snapshot
  }

  /**
   * Grouped description of the latest stored change, or null when the
   * entity has not changed since it was created
   */
  async getChangeDescription(entityType: string, key: string): Promise<ChangeDescription | null> {
    await this.getEntity(entityType, key)
    const record = await this.history.getLastRecord(entityType, key)
    return record ? describeChanges(record) : null
  }

  /** Stored change records, oldest first */
  async getHistory(entityType: string, key: string): Promise<ChangeRecord[]> {
    await this.getEntity(entityType, key)
    return this.history.list(entityType, key)
  }

  // ===========================================================================
  // CSV
  // ===========================================================================

  async importCsv(
    entityType: string,
    scopeHint: string | undefined,
    csv: string,
    dryRun: boolean,
    caller: Caller
  ): Promise<ImportExportResult> {
    return this.pipeline.run({ entityType, text: csv, dryRun, caller, scopeHint })
  }

  async exportCsv(entityType: string, scopeHint?: string): Promise<string> {
    const { csv } = await this.exporter.export(entityType, scopeHint)
    return csv
  }

  getCsvDocumentation(entityType: string): CsvColumnDocumentation[] {
    return describeContract(this.registry.contract(entityType))
  }

  // ===========================================================================
  // Bulk jobs
  // ===========================================================================

  /**
   * Run an import as a background job
   *
   * @returns the job id to poll with {@link getJobStatus}
   */
  async submitImport(
    entityType: string,
    scopeHint: string | undefined,
    csv: string,
    dryRun: boolean,
    caller: Caller
  ): Promise<string> {
    // Fail fast on an unknown type instead of inside the job
    this.registry.contract(entityType)
    const jobId = await this.jobs.submit('import', entityType, ({ signal }) =>
      this.pipeline.run({ entityType, text: csv, dryRun, caller, scopeHint, signal })
    )
    logger.info(`submitted import job ${jobId} for ${entityType}${dryRun ? ' (dry run)' : ''}`)
    return jobId
  }

  async submitExport(entityType: string, scopeHint?: string): Promise<string> {
    this.registry.contract(entityType)
    const jobId = await this.jobs.submit('export', entityType, async () => {
      const { csv, count } = await this.exporter.export(entityType, scopeHint)
      return {
        dryRun: false,
        totalRows: count + 1,
        successCount: count + 1,
        failureCount: 0,
        status: 'SUCCESS',
        rows: [],
        resultRows: [],
        csv,
      }
    })
    logger.info(`submitted export job ${jobId} for ${entityType}`)
    return jobId
  }

  async getJobStatus(jobId: string): Promise<BulkJob> {
    return this.jobs.status(jobId)
  }

  async cancelJob(jobId: string): Promise<BulkJob> {
    return this.jobs.cancel(jobId)
  }

  async purgeJob(jobId: string): Promise<void> {
    return this.jobs.purge(jobId)
  }

  /** Wait for every running job to settle */
  async drain(): Promise<void> {
    return this.jobs.drain()
  }
}
