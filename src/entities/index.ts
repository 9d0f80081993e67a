/**
 * Built-in entity types
 */

import type { MutationGuard, Persistence } from '../types/collaborators'
import { EntityTypeRegistry } from '../schema/registry'
import { roleType } from './role'
import { teamCsv, teamType } from './team'
import { JoinableTeamsGuard, UserIdentityGuard, userCsv, userType } from './user'

export { ROLE, roleType } from './role'
export {
  TEAM,
  TEAM_TYPES,
  ORGANIZATION,
  ORGANIZATION_NAME,
  TeamHierarchyScope,
  teamCsv,
  teamType,
  type TeamType,
} from './team'
export {
  USER,
  JoinableTeamsGuard,
  UserIdentityGuard,
  inheritedRoles,
  userCsv,
  userType,
  withInheritedRoles,
} from './user'

/**
 * Registry holding the team, role and user types
 */
export function createCatalogRegistry(): EntityTypeRegistry {
  return new EntityTypeRegistry()
    .register(teamType, teamCsv)
    .register(roleType)
    .register(userType, userCsv)
}

/**
 * Write rules of the built-in types
 */
export function createCatalogGuards(persistence: Persistence): MutationGuard[] {
  return [new UserIdentityGuard(persistence), new JoinableTeamsGuard(persistence)]
}
