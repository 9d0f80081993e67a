/**
 * Type exports
 */

export * from './snapshot'
export * from './schema'
export * from './changes'
export * from './collaborators'
export * from './csv'
export * from './jobs'
