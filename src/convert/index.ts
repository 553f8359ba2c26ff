/**
 * Value conversion between raw INI text and typed field values
 */

export * from './geometry'
export * from './kinds'
export * from './primitives'
export * from './type-registry'
export * from './value-converter'
