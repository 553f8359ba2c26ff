/**
 * Typed sections - declarations, file sources and the config context
 */

export * from './section'
export * from './file-source'
export * from './config-context'
