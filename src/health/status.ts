import { Type, Static } from '@sinclair/typebox'

/**
 * Tri-state classification. Strict priority: down > degraded > up.
 */
export const StatusLevel = Type.Union([
  Type.Literal('up'),
  Type.Literal('degraded'),
  Type.Literal('down'),
], { $id: 'StatusLevel' })

export type StatusLevel = Static<typeof StatusLevel>

export const ServiceHealth = Type.Object({
  name: Type.String({ minLength: 1 }),
  job: Type.Optional(Type.String()),
  port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  is_up: Type.Boolean(),
  error: Type.Optional(Type.String()),
}, { $id: 'ServiceHealth', description: 'Up/down state of one declared service.' })

export type ServiceHealth = Static<typeof ServiceHealth>

export const ServerHealth = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  icon: Type.String(),
  cloud_name: Type.String(),
  cloud_icon: Type.String(),
  address: Type.String(),
  level: StatusLevel,
  is_up: Type.Boolean(),
  cpu_percent: Type.Number({ minimum: 0 }),
  memory_percent: Type.Number({ minimum: 0 }),
  memory_used_bytes: Type.Number({ minimum: 0 }),
  memory_total_bytes: Type.Number({ minimum: 0 }),
  disk_percent: Type.Number({ minimum: 0 }),
  disk_used_bytes: Type.Number({ minimum: 0 }),
  disk_total_bytes: Type.Number({ minimum: 0 }),
  uptime_seconds: Type.Number({ minimum: 0 }),
  external: Type.Object({
    reachable: Type.Boolean(),
    latency_ms: Type.Number({ minimum: 0 }),
    error: Type.Optional(Type.String()),
  }),
  services: Type.Array(ServiceHealth),
  checked_at: Type.String({ format: 'date-time' }),
}, { $id: 'ServerHealth', description: 'Health snapshot of a single server from one refresh pass.' })

export type ServerHealth = Static<typeof ServerHealth>

export const FleetHealth = Type.Object({
  servers: Type.Array(ServerHealth),
  summary: Type.Object({
    total: Type.Integer({ minimum: 0 }),
    up: Type.Integer({ minimum: 0 }),
    degraded: Type.Integer({ minimum: 0 }),
    down: Type.Integer({ minimum: 0 }),
  }),
  refreshed_at: Type.Union([Type.String({ format: 'date-time' }), Type.Null()]),
}, { $id: 'FleetHealth', description: 'Ordered fleet view, grouped by cloud in configuration order.' })

export type FleetHealth = Static<typeof FleetHealth>
