/**
 * User entity type
 *
 * Besides the descriptor and CSV contract, users carry rules the catalog
 * enforces on every write (unique names regardless of case, unique email
 * addresses, teams closed to joining) and the roles they inherit from the
 * default roles of their teams.
 */

import type { GuardedMutation, MutationGuard, Persistence } from '../types/collaborators'
import type { CsvContract } from '../types/csv'
import {
  defaulted,
  isReferenceList,
  valueOf,
  type EntityReference,
  type FieldState,
  type FieldStates,
  type Snapshot,
} from '../types/snapshot'
import { AlreadyExistsError, ConflictError, ErrorCode, PermissionDeniedError } from '../errors'
import { defineEntityType } from '../schema/builder'
import { ORGANIZATION, TEAM } from './team'
import { ROLE } from './role'

export const USER = 'user'

export const userType = defineEntityType(USER)
  .scalar('displayName')
  .scalar('description')
  .scalar('email', { identityDefining: true })
  .scalar('timezone')
  .scalar('isAdmin', { protected: true, default: false })
  .scalar('isBot', { protected: true, default: false })
  .references('teams', TEAM, { default: [ORGANIZATION] })
  .references('roles', ROLE, { protected: true })
  .scalar('profile')
  // Computed on read from the teams' default roles
  .references('inheritedRoles', ROLE, { excluded: true })
  .build()

export const userCsv: CsvContract = {
  entityType: USER,
  keyColumn: 'name',
  scopeField: 'teams',
  columns: [
    {
      name: 'name',
      type: 'string',
      required: true,
      pattern: /^((?!::).)*$/,
      description: 'The name of the user being created.',
      examples: ['`bob`, `alice`'],
    },
    {
      name: 'displayName',
      type: 'string',
      description: 'Display name for the user.',
      examples: ['`Bob Smith`'],
    },
    {
      name: 'description',
      type: 'string',
      description: 'Description for the user in Markdown format.',
      examples: ['`Bob` leads the *data platform* team.'],
    },
    {
      name: 'email',
      type: 'string',
      required: true,
      pattern: /^[^\s@]+@[^\s@]+\.[^\s@]+$/,
      description: 'Email address of the user.',
      examples: ['`bob@example.com`'],
    },
    {
      name: 'timezone',
      type: 'string',
      description: 'Timezone of the user.',
      examples: ['`America/Los_Angeles`'],
    },
    {
      name: 'isAdmin',
      type: 'boolean',
      description: 'Whether the user is an administrator. Empty means `false`.',
      examples: ['`true`', '`false`'],
    },
    {
      name: 'teams',
      type: 'references',
      referenceType: TEAM,
      scoped: true,
      required: true,
      description: 'Teams the user belongs to, separated by `;`. Every team must lie within the team hierarchy being imported into.',
      examples: ['`Engineering`', '`Engineering;Sales`'],
    },
    {
      name: 'roles',
      type: 'references',
      referenceType: ROLE,
      description: 'Roles assigned to the user, separated by `;`.',
      examples: ['`DataSteward`', '`DataSteward;DataConsumer`'],
    },
  ],
}

// =============================================================================
// Rules
// =============================================================================

function referenceList(state: FieldState | undefined): EntityReference[] {
  const value = valueOf(state)
  return isReferenceList(value) ? value : []
}

function emailOf(fields: FieldStates): string | undefined {
  const email = valueOf(fields['email'])
  return typeof email === 'string' ? email.toLowerCase() : undefined
}

/**
 * User names are unique regardless of case; email addresses are unique
 * regardless of case
 */
export class UserIdentityGuard implements MutationGuard {
  constructor(private readonly persistence: Persistence) {}

  async check({ entityType, key, current, next }: GuardedMutation): Promise<void> {
    if (entityType !== USER) return

    const email = emailOf(next)
    const checkEmail = email !== undefined && (current === null || emailOf(current) !== email)
    if (current !== null && !checkEmail) return

    for (const user of await this.persistence.list(USER)) {
      if (user.key === key) continue
      if (current === null && user.key.toLowerCase() === key.toLowerCase()) {
        throw new AlreadyExistsError(USER, user.key)
      }
      if (checkEmail && emailOf(user.fields) === email) {
        throw new ConflictError(`Email ${email} is already used by ${USER} ${user.key}`, ErrorCode.ALREADY_EXISTS, {
          entityType: USER,
          key,
          email,
        })
      }
    }
  }
}

/**
 * Only admins may add a user to a team that is not joinable
 */
export class JoinableTeamsGuard implements MutationGuard {
  constructor(private readonly persistence: Persistence) {}

  async check({ entityType, caller, current, next }: GuardedMutation): Promise<void> {
    if (entityType !== USER || caller.admin) return

    const before = new Set(referenceList(current?.['teams']).map(team => team.id))
    for (const team of referenceList(next['teams'])) {
      if (before.has(team.id)) continue
      const stored = await this.persistence.load(TEAM, team.name)
      if (valueOf(stored?.fields['isJoinable']) === false) {
        throw new PermissionDeniedError(`${TEAM}/${team.name}`, caller.name)
      }
    }
  }
}

/**
 * Roles a user inherits: the default roles of each of the user's teams and
 * of their ancestors, breadth first, each role once
 */
export async function inheritedRoles(persistence: Persistence, fields: FieldStates): Promise<EntityReference[]> {
  const roles = new Map<string, EntityReference>()
  const visited = new Set<string>()
  const queue = referenceList(fields['teams']).map(team => team.name)

  while (queue.length > 0) {
    const name = queue.shift()
    if (name === undefined || visited.has(name)) continue
    visited.add(name)

    const team = await persistence.load(TEAM, name)
    if (!team) continue
    for (const role of referenceList(team.fields['defaultRoles'])) {
      if (!roles.has(role.id)) roles.set(role.id, role)
    }
    queue.push(...referenceList(team.fields['parents']).map(parent => parent.name))
  }
  return [...roles.values()]
}

/**
 * Snapshot of a user with `inheritedRoles` computed from the current teams
 */
export async function withInheritedRoles(persistence: Persistence, snapshot: Snapshot): Promise<Snapshot> {
  const roles = await inheritedRoles(persistence, snapshot.fields)
  const fields: Record<string, FieldState> = {}
  for (const [name, state] of Object.entries(snapshot.fields)) {
    if (name !== 'inheritedRoles') fields[name] = state
  }
  if (roles.length > 0) {
    fields['inheritedRoles'] = defaulted(roles)
  }
  return { ...snapshot, fields }
}
