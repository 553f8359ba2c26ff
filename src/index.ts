// Core exports
export * from './sections'
export * from './convert'
export * from './ini'

// Configuration, errors and logging
export * from './config'
export * from './observability'
