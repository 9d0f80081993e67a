/**
 * Mutation Layer
 *
 * - MutationExecutor: load, merge, commit and record one entity mutation
 * - Operators: `$set`, `$unset`, `$addToSet` and `$pull` patches
 * - Merge: field resolution, versioning and session consolidation
 *
 * @example
 * ```typescript
 * const result = await executor.update('user', 'alice', caller, current =>
 *   applyPatch(userType, current.fields, { $addToSet: { roles: dataSteward } }).fields
 * )
 * ```
 */

export {
  MutationExecutor,
  type CreateBuilder,
  type CreateResult,
  type MutationExecutorConfig,
  type MutationOutcome,
  type MutationResult,
  type UpdateBuilder,
  type UpdateResult,
} from './executor'

export {
  applyPatch,
  isPatchDocument,
  validatePatch,
  type AddToSetValue,
  type ApplyPatchResult,
  type PartialSnapshot,
  type Patch,
  type PatchDocument,
  type PullValue,
} from './operators'

export { continuesSession, mergePatch, resolveFields, type MergeInput, type MergeResult } from './merge'
