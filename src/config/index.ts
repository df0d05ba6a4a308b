export * from './infrastructure.js'
