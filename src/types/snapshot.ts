/**
 * Entity snapshot types
 *
 * A snapshot is the full, immutable field state of one entity at one
 * version. Field values carry an explicit tag so that values applied by the
 * system at creation time can be told apart from values a caller chose.
 */

// =============================================================================
// Values
// =============================================================================

/**
 * JSON-compatible scalar or structured value
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/**
 * Reference to another catalog entity
 */
export interface EntityReference {
  id: string
  type: string
  name: string
  displayName?: string | undefined
}

/**
 * Value held by a field: a JSON value, a single reference or a reference list
 */
export type FieldValue = JsonValue | EntityReference | EntityReference[]

// =============================================================================
// Tagged Field State
// =============================================================================

/** Field has no value */
export interface UnsetState {
  readonly kind: 'unset'
}

/** Field holds a value applied by the system (e.g. default team) */
export interface DefaultState {
  readonly kind: 'default'
  readonly value: FieldValue
}

/** Field holds a value chosen by a caller */
export interface ExplicitState {
  readonly kind: 'explicit'
  readonly value: FieldValue
}

export type FieldState = UnsetState | DefaultState | ExplicitState

/** Present states carry a value */
export type PresentState = DefaultState | ExplicitState

export const UNSET: UnsetState = Object.freeze({ kind: 'unset' })

export function explicit(value: FieldValue): ExplicitState {
  return { kind: 'explicit', value }
}

export function defaulted(value: FieldValue): DefaultState {
  return { kind: 'default', value }
}

export function isPresent(state: FieldState | undefined): state is PresentState {
  return state !== undefined && state.kind !== 'unset'
}

/**
 * Field states keyed by field name. A missing key is equivalent to unset.
 */
export type FieldStates = Readonly<Record<string, FieldState>>

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Immutable state of one versioned entity
 */
export interface Snapshot {
  readonly entityType: string
  /** Unique name of the entity within its type */
  readonly key: string
  readonly id: string
  /** Semantic version (0.1, 0.2, 1.2, ...) */
  readonly version: number
  /** Storage commit counter checked at commit time */
  readonly revision: number
  readonly updatedAt: number
  readonly updatedBy: string
  readonly fields: FieldStates
}

// =============================================================================
// Type Guards
// =============================================================================

export function isEntityReference(value: unknown): value is EntityReference {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  return (
    'id' in value && typeof value.id === 'string' &&
    'type' in value && typeof value.type === 'string' &&
    'name' in value && typeof value.name === 'string'
  )
}

export function isReferenceList(value: unknown): value is EntityReference[] {
  return Array.isArray(value) && value.every(isEntityReference)
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue)
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

/**
 * Whether `value` can be held by a field
 */
export function isFieldValue(value: unknown): value is FieldValue {
  return isEntityReference(value) || isReferenceList(value) || isJsonValue(value)
}

/**
 * Plain value of a field, or undefined when unset
 */
export function valueOf(state: FieldState | undefined): FieldValue | undefined {
  return isPresent(state) ? state.value : undefined
}
