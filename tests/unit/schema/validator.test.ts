/**
 * Field Value Validation Tests
 */

import { describe, it, expect } from 'vitest'
import { assertFieldValue, defaultStates, initialState, validateFieldStates } from '../../../src/schema/validator'
import { getField, type FieldDescriptor } from '../../../src/types/schema'
import { defaulted, explicit, UNSET } from '../../../src/types/snapshot'
import { userType, ORGANIZATION } from '../../../src/entities'
import { ErrorCode, ValidationError } from '../../../src/errors'
import { ROLES, TEAMS } from '../../fixtures'

function field(name: string): FieldDescriptor {
  const found = getField(userType, name)
  if (!found) throw new Error(`no field ${name}`)
  return found
}

describe('assertFieldValue', () => {
  it('should accept values of the declared kind', () => {
    expect(() => assertFieldValue('user', field('email'), 'alice@example.com')).not.toThrow()
    expect(() => assertFieldValue('user', field('isAdmin'), true)).not.toThrow()
    expect(() => assertFieldValue('user', field('teams'), [TEAMS.sales])).not.toThrow()
    expect(() => assertFieldValue('user', field('teams'), [])).not.toThrow()
  })

  it('should reject references in scalar fields', () => {
    expect(() => assertFieldValue('user', field('email'), TEAMS.sales)).toThrow(
      'Invalid value for user.email: expected a scalar value'
    )
  })

  it('should reject collections of the wrong shape or type', () => {
    expect(() => assertFieldValue('user', field('teams'), 'Sales')).toThrow(
      'Invalid value for user.teams: expected a list of entity references'
    )
    expect(() => assertFieldValue('user', field('teams'), [ROLES.steward])).toThrow(
      'Invalid value for user.teams: expected references to team'
    )
  })

  it('should tag failures as invalid fields', () => {
    try {
      assertFieldValue('user', field('roles'), 'DataSteward')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ErrorCode.INVALID_FIELD)
        expect(error.field).toBe('roles')
      }
    }
  })
})

describe('validateFieldStates', () => {
  it('should reject unknown fields', () => {
    expect(() => validateFieldStates(userType, { nickname: explicit('al') })).toThrow('Unknown field user.nickname')
  })

  it('should skip unset states', () => {
    expect(() => validateFieldStates(userType, { teams: UNSET, email: explicit('a@b.c') })).not.toThrow()
  })
})

describe('initial states', () => {
  it('should tag declared defaults', () => {
    expect(initialState(field('isAdmin'))).toEqual(defaulted(false))
    expect(initialState(field('timezone'))).toBe(UNSET)
  })

  it('should copy collection defaults', () => {
    const state = initialState(field('teams'))
    const declared = field('teams').default

    expect(state).toEqual(defaulted([ORGANIZATION]))
    expect(state.kind !== 'unset' && state.value).not.toBe(declared)
  })

  it('should hold only fields with defaults', () => {
    expect(defaultStates(userType)).toEqual({
      isAdmin: defaulted(false),
      isBot: defaulted(false),
      teams: defaulted([ORGANIZATION]),
    })
  })
})
