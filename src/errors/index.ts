/**
 * Catalog Error Handling Module
 *
 * Provides the error hierarchy shared by the change recorder, the patch
 * merge engine, the CSV pipeline and the job runner.
 * All errors extend from CatalogError which provides:
 * - Error codes for programmatic handling
 * - Serialization for job results and transport
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - CatalogError (base class)
 *   - ValidationError (row/field-level input failures)
 *   - NotFoundError (entity, job or reference not found)
 *   - ConflictError (version conflicts, duplicates)
 *   - AuthorizationError (permission denied)
 *   - CancelledError (operation cancelled by its caller)
 *   - InternalFailureError (unexpected collaborator failure)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for catalog operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',
  CANCELLED = 'CANCELLED',

  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_FIELD = 'INVALID_FIELD',
  UNKNOWN_FIELD = 'UNKNOWN_FIELD',
  INVALID_OPERATOR = 'INVALID_OPERATOR',

  // Not found errors
  NOT_FOUND = 'NOT_FOUND',
  ENTITY_NOT_FOUND = 'ENTITY_NOT_FOUND',
  ENTITY_TYPE_NOT_FOUND = 'ENTITY_TYPE_NOT_FOUND',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',

  // Conflict errors
  CONFLICT = 'CONFLICT',
  VERSION_CONFLICT = 'VERSION_CONFLICT',
  ALREADY_EXISTS = 'ALREADY_EXISTS',

  // Authorization errors
  AUTHORIZATION_ERROR = 'AUTHORIZATION_ERROR',
  PERMISSION_DENIED = 'PERMISSION_DENIED',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all catalog errors.
 *
 * @example
 * ```typescript
 * throw new CatalogError('Commit failed', ErrorCode.INTERNAL, {
 *   entityType: 'user',
 *   key: 'alice'
 * })
 * ```
 */
export class CatalogError extends Error {
  override readonly name: string = 'CatalogError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for job results and transport
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof CatalogError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input validation fails.
 *
 * Used for:
 * - Unknown fields in a patch
 * - Values of the wrong shape for a field kind
 * - Invalid patch operators
 */
export class ValidationError extends CatalogError {
  override readonly name = 'ValidationError'
  readonly field: string | undefined

  constructor(
    message: string,
    context?: {
      field?: string | undefined
      entityType?: string | undefined
      value?: unknown
    },
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    cause?: Error
  ) {
    super(message, code, context, cause)
    this.field = context?.field
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when a requested resource is not found.
 */
export class NotFoundError extends CatalogError {
  override readonly name: string = 'NotFoundError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when an entity is not found.
 */
export class EntityNotFoundError extends NotFoundError {
  override readonly name = 'EntityNotFoundError'
  readonly entityType: string
  readonly key: string

  constructor(entityType: string, key: string, cause?: Error) {
    super(
      `Entity not found: ${entityType}/${key}`,
      ErrorCode.ENTITY_NOT_FOUND,
      { entityType, key },
      cause
    )
    this.entityType = entityType
    this.key = key
    Object.setPrototypeOf(this, EntityNotFoundError.prototype)
  }
}

/**
 * Error thrown when no descriptor is registered for an entity type.
 */
export class EntityTypeNotFoundError extends NotFoundError {
  override readonly name = 'EntityTypeNotFoundError'

  constructor(entityType: string) {
    super(`Unknown entity type: ${entityType}`, ErrorCode.ENTITY_TYPE_NOT_FOUND, { entityType })
    Object.setPrototypeOf(this, EntityTypeNotFoundError.prototype)
  }
}

/**
 * Error thrown when a bulk job id is unknown (never submitted or purged).
 */
export class JobNotFoundError extends NotFoundError {
  override readonly name = 'JobNotFoundError'
  readonly jobId: string

  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, ErrorCode.JOB_NOT_FOUND, { jobId })
    this.jobId = jobId
    Object.setPrototypeOf(this, JobNotFoundError.prototype)
  }
}

// =============================================================================
// Conflict Errors
// =============================================================================

/**
 * Error thrown when a conflict occurs (version, duplicate, etc.)
 */
export class ConflictError extends CatalogError {
  override readonly name: string = 'ConflictError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFLICT,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when the optimistic revision check fails at commit time.
 * Retryable: the executor reloads the snapshot and re-applies the patch.
 */
export class VersionConflictError extends ConflictError {
  override readonly name = 'VersionConflictError'
  readonly retryable = true
  readonly expectedRevision: number
  readonly actualRevision: number | undefined

  constructor(
    expectedRevision: number,
    actualRevision: number | undefined,
    context?: { entityType?: string; key?: string }
  ) {
    const entityPath = context?.entityType && context.key
      ? ` for ${context.entityType}/${context.key}`
      : ''

    super(
      `Version conflict: expected revision ${expectedRevision}, got ${actualRevision}${entityPath}`,
      ErrorCode.VERSION_CONFLICT,
      {
        expectedRevision,
        actualRevision,
        entityType: context?.entityType,
        key: context?.key,
      }
    )
    this.expectedRevision = expectedRevision
    this.actualRevision = actualRevision
    Object.setPrototypeOf(this, VersionConflictError.prototype)
  }
}

/**
 * Error thrown when creating an entity whose key is already taken.
 */
export class AlreadyExistsError extends ConflictError {
  override readonly name = 'AlreadyExistsError'

  constructor(entityType: string, key: string) {
    super(`Entity already exists: ${entityType}/${key}`, ErrorCode.ALREADY_EXISTS, { entityType, key })
    Object.setPrototypeOf(this, AlreadyExistsError.prototype)
  }
}

// =============================================================================
// Authorization Errors
// =============================================================================

/**
 * Error thrown when authorization fails.
 */
export class AuthorizationError extends CatalogError {
  override readonly name: string = 'AuthorizationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.AUTHORIZATION_ERROR,
    context?: {
      resource?: string
      action?: string
      actor?: string
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when the caller may not touch an entity at all (Forbidden).
 */
export class PermissionDeniedError extends AuthorizationError {
  override readonly name = 'PermissionDeniedError'
  readonly resource: string
  readonly actor: string | undefined

  constructor(resource: string, actor?: string, cause?: Error) {
    const actorPart = actor ? ` for ${actor}` : ''
    super(
      `Permission denied: ${resource}${actorPart}`,
      ErrorCode.PERMISSION_DENIED,
      { resource, action: 'modify', actor },
      cause
    )
    this.resource = resource
    this.actor = actor
    Object.setPrototypeOf(this, PermissionDeniedError.prototype)
  }
}

// =============================================================================
// Cancellation and Internal Errors
// =============================================================================

/**
 * Error thrown when an operation observes its abort signal.
 */
export class CancelledError extends CatalogError {
  override readonly name = 'CancelledError'

  constructor(message = 'Operation was cancelled', context?: Record<string, unknown>) {
    super(message, ErrorCode.CANCELLED, context)
    Object.setPrototypeOf(this, CancelledError.prototype)
  }
}

/**
 * Unexpected failure of a collaborator (persistence, authorization, lookups).
 */
export class InternalFailureError extends CatalogError {
  override readonly name = 'InternalFailureError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.INTERNAL, context, cause)
    Object.setPrototypeOf(this, InternalFailureError.prototype)
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends CatalogError {
  override readonly name = 'ConfigurationError'

  constructor(message: string, key?: string, value?: unknown) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { key, value })
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a CatalogError
 */
export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is a NotFoundError (or any subclass)
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError
}

/**
 * Check if an error is a ConflictError (or any subclass)
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError
}

/**
 * Check if an error is a VersionConflictError
 */
export function isVersionConflictError(error: unknown): error is VersionConflictError {
  return error instanceof VersionConflictError
}

/**
 * Check if an error is an AuthorizationError
 */
export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return error instanceof AuthorizationError
}

/**
 * Check if an error is a CancelledError
 */
export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error. Catalog errors pass through; anything else is an
 * internal failure.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): CatalogError {
  if (error instanceof CatalogError) {
    return error
  }

  if (error instanceof Error) {
    return new InternalFailureError(error.message, context, error)
  }

  return new InternalFailureError(String(error), context)
}

/**
 * Human-readable message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
