/**
 * catalog-changes - change tracking and CSV bulk mutation for a metadata catalog
 *
 * @packageDocumentation
 */

// =============================================================================
// Engine
// =============================================================================

export { CatalogEngine, type CatalogEngineOptions } from './engine'

// =============================================================================
// Types
// =============================================================================

export * from './types'

// =============================================================================
// Schema and Entity Types
// =============================================================================

export * from './schema'
export * from './entities'

// =============================================================================
// Change Recording
// =============================================================================

export { diff, diffField, diffFields, keyedElements, valuesEqual } from './changes/diff'
export { consolidateChanges } from './changes/consolidate'
export { classifyChanges, nextVersion } from './changes/version'
export { describeChanges, replay } from './changes/describe'

// =============================================================================
// Mutation
// =============================================================================

export * from './mutation'

// =============================================================================
// CSV
// =============================================================================

export { parseCsv, formatCsv, formatCsvField, formatCsvRecord, joinValues, splitValues } from './csv/format'
export { describeContract, toRecord, validateRecord } from './csv/contract'
export { CsvPipeline, type CsvPipelineConfig, type PipelineRun } from './csv/pipeline'
export { CsvExporter, type CsvExport, type CsvExporterConfig } from './csv/export'

// =============================================================================
// Jobs
// =============================================================================

export { BulkJobRunner, type BulkJobRunnerOptions } from './jobs/runner'
export { MemoryJobStore, type JobStore } from './jobs/store'

// =============================================================================
// Collaborators
// =============================================================================

export {
  FieldPolicyAuthorization,
  MemoryChangeHistoryStore,
  MemoryPersistence,
  PersistenceReferenceResolver,
  toReference,
} from './backends/memory'

// =============================================================================
// Configuration, Errors and Logging
// =============================================================================

export * from './config'
export * from './errors'
export * from './constants'
export { consoleLogger, getLogger, noopLogger, scopedLogger, setLogger, type Logger } from './utils/logger'
export { withRetry, isRetryableError, type RetryConfig } from './utils/retry'
