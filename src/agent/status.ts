import { Type, Static } from '@sinclair/typebox'

/** Egress modes a remote agent knows how to route through */
export const AgentMode = Type.Union([
  Type.Literal('direct'),
  Type.Literal('warp'),
  Type.Literal('home'),
], { $id: 'AgentMode', description: 'Known remote agent egress mode' })

export type AgentMode = Static<typeof AgentMode>

export const AgentTraffic = Type.Object({
  direct_mb: Type.Number({ minimum: 0 }),
  warp_mb: Type.Number({ minimum: 0 }),
  home_mb: Type.Number({ minimum: 0 }),
  total_mb: Type.Number({ minimum: 0 }),
}, { $id: 'AgentTraffic', description: 'Traffic counters per egress mode, in MB' })

export type AgentTraffic = Static<typeof AgentTraffic>

export const AgentHomeStats = Type.Object({
  limit_mb: Type.Number({ minimum: 0 }),
  used_mb: Type.Number({ minimum: 0 }),
  remaining_mb: Type.Number(),
  cost_usd: Type.Number({ minimum: 0 }),
}, { $id: 'AgentHomeStats', description: 'Metered residential egress budget' })

export type AgentHomeStats = Static<typeof AgentHomeStats>

/**
 * Body of `GET http://127.0.0.1:{port}/status` on the remote side.
 * `mode_healthy` / `mode_error` only appear with `?check=true`.
 */
export const AgentStatus = Type.Object({
  mode: Type.String(),
  mode_healthy: Type.Optional(Type.Boolean()),
  mode_error: Type.Optional(Type.String()),
  uptime: Type.Optional(Type.String({ description: 'Duration string, e.g. 72h3m5.2s' })),
  connections: Type.Optional(Type.Integer({ minimum: 0 })),
  traffic: Type.Optional(AgentTraffic),
  home: Type.Optional(AgentHomeStats),
  available_modes: Type.Optional(Type.Array(Type.String())),
}, { $id: 'AgentStatus', description: 'Remote agent status as returned over the tunnel' })

export type AgentStatus = Static<typeof AgentStatus>

export const NodeMetrics = Type.Object({
  memory_used_bytes: Type.Number({ minimum: 0 }),
  memory_total_bytes: Type.Number({ minimum: 0 }),
  memory_used_percent: Type.Number({ minimum: 0 }),
  disk_used_bytes: Type.Number({ minimum: 0 }),
  disk_total_bytes: Type.Number({ minimum: 0 }),
  disk_used_percent: Type.Number({ minimum: 0 }),
  load1: Type.Number({ minimum: 0 }),
}, { $id: 'NodeMetrics', description: 'Resource figures scraped from the remote node exporter' })

export type NodeMetrics = Static<typeof NodeMetrics>
