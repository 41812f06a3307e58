export * from './research.js'
export * from './trace.js'
export * from './protocol.js'
export * from './search-filters.js'
export * from './normalization.js'
export * from './run-result.js'
