/**
 * CSV Record Pipeline
 *
 * One run moves through PARSE -> VALIDATE -> APPLY -> AGGREGATE:
 * - PARSE splits the payload into records and checks the header; a missing
 *   or mismatched header aborts the run
 * - VALIDATE checks every data row on its own, rows in parallel
 * - APPLY (skipped on dry runs) creates or updates one entity per valid row,
 *   in row order, checking for cancellation between rows. A run cancelled
 *   before it starts is aborted; one cancelled part way keeps the rows it
 *   applied and fails the rest
 * - AGGREGATE counts rows and renders the result CSV
 *
 * Row-level failures are reported in the result, never thrown. Collaborator
 * failures propagate as InternalFailureError.
 *
 * @module csv/pipeline
 */

import type { Caller, ReferenceResolver, ScopeResolver } from '../types/collaborators'
import type { CsvContract, CsvRowResult, ImportExportResult, ImportStatus } from '../types/csv'
import type { EngineConfig } from '../config'
import type { EntityTypeRegistry } from '../schema/registry'
import type { MutationExecutor, MutationOutcome } from '../mutation/executor'
import { RESULT_HEADERS } from '../constants'
import { ErrorCode, errorMessage, isValidationError, wrapError } from '../errors'
import { mapWithConcurrency } from '../utils/concurrency'
import { scopedLogger } from '../utils/logger'
import { formatCsvRecord, parseCsv } from './format'
import {
  applyFailed,
  contractHeaders,
  invalidFieldCount,
  requestedStates,
  validateRecord,
  type RowValidation,
} from './contract'

const logger = scopedLogger('csv')

const CANCELLED = 'Import cancelled'

const OUTCOME_DETAILS: Record<MutationOutcome, string> = {
  created: 'Entity created',
  updated: 'Entity updated',
  unchanged: 'Entity unchanged',
}

// =============================================================================
// Types
// =============================================================================

export interface CsvPipelineConfig {
  registry: EntityTypeRegistry
  executor: MutationExecutor
  resolver: ReferenceResolver
  scopeResolver?: ScopeResolver | undefined
  config: EngineConfig
}

export interface PipelineRun {
  readonly entityType: string
  readonly text: string
  readonly dryRun: boolean
  readonly caller: Caller
  /** Entity the import is scoped to (e.g. the target team) */
  readonly scopeHint?: string | undefined
  /** Checked between rows of the apply phase */
  readonly signal?: AbortSignal | undefined
}

interface RowState {
  readonly rowNumber: number
  readonly record: readonly string[]
  validation: RowValidation | null
  status: CsvRowResult['status']
  errors: string[]
  details: string
}

// =============================================================================
// Pipeline
// =============================================================================

export class CsvPipeline {
  private readonly registry: EntityTypeRegistry
  private readonly executor: MutationExecutor
  private readonly resolver: ReferenceResolver
  private readonly scopeResolver: ScopeResolver | undefined
  private readonly config: EngineConfig

  constructor(options: CsvPipelineConfig) {
    this.registry = options.registry
    this.executor = options.executor
    this.resolver = options.resolver
    this.scopeResolver = options.scopeResolver
    this.config = options.config
  }

  async run(run: PipelineRun): Promise<ImportExportResult> {
    const contract = this.registry.contract(run.entityType)
    const headers = contractHeaders(contract)
    if (run.signal?.aborted) {
      return this.aborted(run, contract, CANCELLED)
    }

    // PARSE
    let records: string[][]
    try {
      records = parseCsv(run.text, this.config.csvDelimiter)
    } catch (error) {
      if (isValidationError(error)) return this.aborted(run, contract, error.message)
      throw wrapError(error, { entityType: run.entityType })
    }

    const [header, ...data] = records
    if (!header) {
      return this.aborted(run, contract, 'Empty CSV payload')
    }
    const found = header.map(h => h.trim())
    if (found.length !== headers.length || found.some((h, i) => h !== headers[i])) {
      return this.aborted(run, contract, `Invalid headers: expected [${headers.join(',')}], found [${found.join(',')}]`)
    }

    const rows: RowState[] = data.map((record, i) => ({
      rowNumber: i + 1,
      record,
      validation: null,
      status: 'SUCCESS',
      errors: [],
      details: '',
    }))

    // VALIDATE
    await this.guard(run, () =>
      mapWithConcurrency(rows, this.config.validationConcurrency, async row => {
        if (row.record.length !== headers.length) {
          row.validation = { ok: false, errors: [invalidFieldCount(headers.length, row.record.length)] }
        } else {
          row.validation = await validateRecord(contract, row.record, {
            resolver: this.resolver,
            scopeResolver: this.scopeResolver,
            scopeHint: run.scopeHint,
            valueSeparator: this.config.valueSeparator,
          })
        }
        if (!row.validation.ok) {
          row.status = 'FAILURE'
          row.errors = row.validation.errors
        }
      })
    )

    // APPLY
    let abortReason: string | undefined
    for (const row of rows) {
      const validation = row.validation
      if (!validation?.ok) continue

      if (run.signal?.aborted) {
        abortReason = CANCELLED
        row.status = 'FAILURE'
        row.errors = [applyFailed('Import cancelled before this row was applied')]
        continue
      }

      const { key } = validation.row
      if (run.dryRun) {
        const exists = await this.guard(run, () => this.resolver.resolve(contract.entityType, key))
        row.details = exists ? OUTCOME_DETAILS.updated : OUTCOME_DETAILS.created
        continue
      }

      try {
        const descriptor = this.registry.descriptor(contract.entityType)
        const result = await this.executor.upsert(contract.entityType, key, run.caller, {
          create: initial => requestedStates(descriptor, initial, validation.row),
          update: current => requestedStates(descriptor, current.fields, validation.row),
        })
        row.details = OUTCOME_DETAILS[result.outcome]
      } catch (error) {
        const wrapped = wrapError(error, { entityType: contract.entityType, key })
        if (wrapped.code === ErrorCode.INTERNAL) throw wrapped
        row.status = 'FAILURE'
        row.errors = [applyFailed(errorMessage(wrapped))]
      }
    }

    // AGGREGATE
    const result = this.aggregate(run, contract, rows, abortReason)
    logger.info(
      `${run.dryRun ? 'dry run of ' : ''}${contract.entityType} import: ${result.status}, ` +
        `${result.successCount} passed, ${result.failureCount} failed`
    )
    return result
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Run a collaborator call, turning unexpected failures into InternalFailureError
   */
  private async guard<T>(run: PipelineRun, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      const wrapped = wrapError(error, { entityType: run.entityType })
      logger.error(`${run.entityType} import failed`, wrapped)
      throw wrapped
    }
  }

  private aggregate(
    run: PipelineRun,
    contract: CsvContract,
    rows: readonly RowState[],
    abortReason: string | undefined
  ): ImportExportResult {
    const results: CsvRowResult[] = rows.map(row => ({
      rowNumber: row.rowNumber,
      status: row.status,
      errors: row.errors,
      details: row.status === 'SUCCESS' ? row.details : row.errors.join('; '),
      record: row.record,
    }))

    // The header is the first processed row and always passes
    const failureCount = results.filter(r => r.status === 'FAILURE').length
    const totalRows = results.length + 1
    const successCount = totalRows - failureCount

    // A run cancelled part way is judged by its rows; abortReason says why
    // the remaining rows were not applied
    let status: ImportStatus
    if (failureCount === 0) {
      status = 'SUCCESS'
    } else if (successCount === 0) {
      status = 'FAILURE'
    } else {
      status = 'PARTIAL_SUCCESS'
    }

    const delimiter = this.config.csvDelimiter
    const resultRows = [
      formatCsvRecord([...RESULT_HEADERS, ...contractHeaders(contract)], delimiter),
      ...results.map(r => formatCsvRecord([r.status.toLowerCase(), r.details, ...r.record], delimiter)),
    ]

    return {
      dryRun: run.dryRun,
      totalRows,
      successCount,
      failureCount,
      status,
      abortReason,
      rows: results,
      resultRows,
    }
  }

  private aborted(run: PipelineRun, contract: CsvContract, reason: string): ImportExportResult {
    logger.warn(`${contract.entityType} import aborted: ${reason}`)
    return {
      dryRun: run.dryRun,
      totalRows: 0,
      successCount: 0,
      failureCount: 0,
      status: 'ABORTED',
      abortReason: reason,
      rows: [],
      resultRows: [formatCsvRecord([...RESULT_HEADERS, ...contractHeaders(contract)], this.config.csvDelimiter)],
    }
  }
}
