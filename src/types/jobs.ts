/**
 * Bulk job types
 */

import type { SerializedError } from '../errors'
import type { ImportExportResult } from './csv'

export type JobState = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED' | 'CANCELLED'

export type JobKind = 'import' | 'export'

export interface BulkJob {
  readonly jobId: string
  readonly kind: JobKind
  readonly entityType: string
  readonly state: JobState
  readonly result: ImportExportResult | null
  readonly error?: SerializedError | undefined
  readonly createdAt: number
  readonly startedAt?: number | undefined
  readonly finishedAt?: number | undefined
}

/**
 * Passed to a running job so it can observe cancellation at row boundaries
 */
export interface JobContext {
  readonly jobId: string
  readonly signal: AbortSignal
}

export type JobInvocation = (context: JobContext) => Promise<ImportExportResult>

export function isTerminal(state: JobState): boolean {
  return state === 'COMPLETED' || state === 'FAILED' || state === 'CANCELLED'
}
