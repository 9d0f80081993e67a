/**
 * CSV contract and result types
 */

export type CsvColumnType = 'string' | 'boolean' | 'number' | 'enum' | 'reference' | 'references'

/**
 * One declared column of a CSV header contract
 */
export interface CsvColumn {
  readonly name: string
  /** Snapshot field the column maps to (defaults to the column name) */
  readonly field?: string | undefined
  readonly type: CsvColumnType
  readonly required?: boolean | undefined
  readonly pattern?: RegExp | undefined
  /** Allowed values of an enum column */
  readonly values?: readonly string[] | undefined
  /** Entity type of reference columns */
  readonly referenceType?: string | undefined
  /** Referenced entities must lie within the caller's scope hint */
  readonly scoped?: boolean | undefined
  readonly description?: string | undefined
  readonly examples?: readonly string[] | undefined
}

/**
 * Immutable header contract declared per entity type
 */
export interface CsvContract {
  readonly entityType: string
  /** Column holding the entity key (name) */
  readonly keyColumn: string
  /**
   * Reference field used to decide whether an entity belongs to a scope hint
   * on export
   */
  readonly scopeField?: string | undefined
  readonly columns: readonly CsvColumn[]
}

export type RowStatus = 'SUCCESS' | 'FAILURE'

export type ImportStatus = 'SUCCESS' | 'PARTIAL_SUCCESS' | 'FAILURE' | 'ABORTED'

export interface CsvRowResult {
  /** 1-based data row number (the header is not numbered) */
  readonly rowNumber: number
  readonly status: RowStatus
  readonly errors: readonly string[]
  /** Outcome text echoed in the result row */
  readonly details: string
  /** Raw fields of the row */
  readonly record: readonly string[]
}

export interface ImportExportResult {
  readonly dryRun: boolean
  /** Processed rows including the header row */
  readonly totalRows: number
  readonly successCount: number
  readonly failureCount: number
  readonly status: ImportStatus
  readonly abortReason?: string | undefined
  readonly rows: readonly CsvRowResult[]
  /** Header plus one line per row with status and details inline */
  readonly resultRows: readonly string[]
  /** Exported payload of an export run */
  readonly csv?: string | undefined
}

/**
 * Documentation of one contract column
 */
export interface CsvColumnDocumentation {
  readonly name: string
  readonly required: boolean
  readonly description: string
  readonly examples: readonly string[]
}
