/**
 * fleet-health: wire contracts for the fleet health API
 *
 * Wire format: snake_case JSON. Every schema carries a `$id` and is
 * exported to JSON Schema by `npm run schemas`.
 */

import './formats.js'

export * from './health/index.js'
export * from './agent/index.js'
export * from './gateway/index.js'
export * from './metrics/index.js'
export * from './config/index.js'
export * from './webhook/index.js'
export * from './http/index.js'
