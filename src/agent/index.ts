export * from './status.js'
