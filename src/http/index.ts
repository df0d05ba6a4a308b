export * from './error.js'
export * from './response.js'
