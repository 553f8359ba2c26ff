/**
 * Configuration module
 * Errors, zod-validated options, environment and file location helpers
 */

export * from './errors'
export * from './schema'
export * from './environment'
export * from './location'
export * from './loader'
