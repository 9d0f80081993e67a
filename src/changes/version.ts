/**
 * Semantic version arithmetic and update classification
 */

import type { FieldChange, UpdateType } from '../types/changes'
import type { EntityTypeDescriptor } from '../types/schema'
import { MAJOR_VERSION_STEP, MINOR_VERSION_STEP } from '../constants'
import { roundVersion } from '../utils/comparison'

/**
 * MAJOR when an identity-defining field changed, MINOR when anything else
 * changed, NO_CHANGE otherwise
 */
export function classifyChanges(descriptor: EntityTypeDescriptor, changes: readonly FieldChange[]): UpdateType {
  if (changes.length === 0) {
    return 'NO_CHANGE'
  }
  const identityFields = new Set(descriptor.fields.filter(f => f.identityDefining).map(f => f.name))
  return changes.some(c => identityFields.has(c.name)) ? 'MAJOR' : 'MINOR'
}

/**
 * Version following `version` after an update of the given type
 *
 * @example
 * nextVersion(0.1, 'MINOR') // 0.2
 * nextVersion(0.9, 'MAJOR') // 1.9
 */
export function nextVersion(version: number, updateType: UpdateType): number {
  switch (updateType) {
    case 'NO_CHANGE':
      return version
    case 'MINOR':
      return roundVersion(version + MINOR_VERSION_STEP)
    case 'MAJOR':
      return roundVersion(version + MAJOR_VERSION_STEP)
  }
}
