/**
 * Team entity type
 *
 * Teams form a hierarchy through their `parents` references, rooted at the
 * Organization team.
 */

import type { Persistence, ScopeResolver } from '../types/collaborators'
import type { CsvContract } from '../types/csv'
import type { EntityReference } from '../types/snapshot'
import { isReferenceList, valueOf } from '../types/snapshot'
import { defineEntityType } from '../schema/builder'

export const TEAM = 'team'

export const ORGANIZATION_NAME = 'Organization'

/** Root of the team hierarchy */
export const ORGANIZATION: EntityReference = Object.freeze({
  id: 'organization',
  type: TEAM,
  name: ORGANIZATION_NAME,
})

export const TEAM_TYPES = ['Group', 'Department', 'Division', 'BusinessUnit', 'Organization'] as const

export type TeamType = (typeof TEAM_TYPES)[number]

export const teamType = defineEntityType(TEAM)
  .scalar('displayName')
  .scalar('description')
  .scalar('teamType', { default: 'Group' })
  .references('parents', TEAM)
  .scalar('isJoinable', { default: true })
  .references('defaultRoles', 'role')
  .build()

export const teamCsv: CsvContract = {
  entityType: TEAM,
  keyColumn: 'name',
  columns: [
    {
      name: 'name',
      type: 'string',
      required: true,
      pattern: /^((?!::).)*$/,
      description: 'The name of the team being created.',
      examples: ['`Marketing`, `Sales`'],
    },
    {
      name: 'displayName',
      type: 'string',
      description: 'Display name for the team.',
      examples: ['`Marketing Team`'],
    },
    {
      name: 'description',
      type: 'string',
      description: 'Description for the team in Markdown format.',
      examples: ['`Marketing team` *drives* growth.'],
    },
    {
      name: 'teamType',
      type: 'enum',
      required: true,
      values: TEAM_TYPES,
      description: 'Type of the team: Group, Department, Division, BusinessUnit or Organization.',
      examples: ['`Group`', '`Department`'],
    },
    {
      name: 'parents',
      type: 'references',
      referenceType: TEAM,
      scoped: true,
      description: 'Parent teams, separated by `;`. Every parent must lie within the team hierarchy being imported into.',
      examples: ['`Engineering`', '`Engineering;Sales`'],
    },
    {
      name: 'isJoinable',
      type: 'boolean',
      description: 'Whether users may join the team without an invitation. Empty means `true`.',
      examples: ['`true`', '`false`'],
    },
    {
      name: 'defaultRoles',
      type: 'references',
      referenceType: 'role',
      description: 'Roles given to every member of the team, separated by `;`.',
      examples: ['`DataConsumer`', '`DataConsumer;DataSteward`'],
    },
  ],
}

/**
 * Scope over the team hierarchy: a team lies within scope S when S is the
 * team itself or one of its ancestors. Every team lies within the
 * Organization. Entity types other than teams are not restricted.
 */
export class TeamHierarchyScope implements ScopeResolver {
  constructor(private readonly persistence: Persistence) {}

  async contains(scope: string, entityType: string, name: string): Promise<boolean> {
    if (entityType !== TEAM || scope === ORGANIZATION_NAME) return true

    const visited = new Set<string>()
    const queue = [name]
    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined || visited.has(current)) continue
      if (current === scope) return true
      visited.add(current)

      const team = await this.persistence.load(TEAM, current)
      const parents = valueOf(team?.fields['parents'])
      if (isReferenceList(parents)) {
        queue.push(...parents.map(p => p.name))
      }
    }
    return false
  }
}
