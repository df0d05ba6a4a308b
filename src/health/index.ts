export * from './status.js'
export * from './stats.js'
