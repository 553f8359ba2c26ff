export * from './codec'
export * from './property-table'
