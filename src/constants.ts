/**
 * Catalog Constants
 *
 * Centralized defaults used throughout the codebase.
 */

// =============================================================================
// Versioning
// =============================================================================

/** Version assigned to a newly created entity */
export const INITIAL_VERSION = 0.1

/** Version increment of a MINOR update */
export const MINOR_VERSION_STEP = 0.1

/** Version increment of a MAJOR update */
export const MAJOR_VERSION_STEP = 1.0

/**
 * Window in which follow-up patches by the same caller are consolidated
 * into the open change record (10 minutes)
 */
export const DEFAULT_SESSION_TIMEOUT_MS = 10 * 60 * 1000

// =============================================================================
// Retry
// =============================================================================

/**
 * Default number of retries after a commit-time version conflict
 */
export const DEFAULT_MAX_COMMIT_RETRIES = 3

/**
 * Default base delay for commit retries in milliseconds
 */
export const DEFAULT_RETRY_BASE_DELAY = 25

/**
 * Default maximum delay for commit retries in milliseconds
 */
export const DEFAULT_RETRY_MAX_DELAY = 1000

/**
 * Default multiplier for exponential backoff
 */
export const DEFAULT_RETRY_MULTIPLIER = 2

/**
 * Default jitter factor (+/- 50%)
 */
export const DEFAULT_RETRY_JITTER_FACTOR = 0.5

// =============================================================================
// CSV
// =============================================================================

/** Primary field delimiter */
export const DEFAULT_CSV_DELIMITER = ','

/** In-field separator of multi-valued cells */
export const DEFAULT_VALUE_SEPARATOR = ';'

/**
 * Rows validated concurrently
 */
export const DEFAULT_VALIDATION_CONCURRENCY = 8

/** Leading columns of every import result row */
export const RESULT_HEADERS = ['status', 'details'] as const

// =============================================================================
// Jobs
// =============================================================================

/** Minimum length of generated job ids */
export const JOB_ID_MIN_LENGTH = 8
