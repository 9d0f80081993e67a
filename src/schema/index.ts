/**
 * Schema Module
 *
 * Entity type declaration, field value validation and the type registry.
 */

export * from './builder'
export * from './validator'
export { EntityTypeRegistry } from './registry'
