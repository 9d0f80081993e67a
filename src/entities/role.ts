/**
 * Role entity type
 */

import { defineEntityType } from '../schema/builder'

export const ROLE = 'role'

export const roleType = defineEntityType(ROLE)
  .scalar('displayName')
  .scalar('description')
  .build()
