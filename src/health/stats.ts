import { Type, Static } from '@sinclair/typebox'

export const CallStats = Type.Object({
  endpoint: Type.String({ description: 'Jump host or tunneled target the counters belong to' }),
  success_count: Type.Integer({ minimum: 0 }),
  error_count: Type.Integer({ minimum: 0 }),
  last_latency_ms: Type.Number({ minimum: 0 }),
  last_error: Type.Union([Type.String(), Type.Null()]),
  last_error_at: Type.Union([Type.String({ format: 'date-time' }), Type.Null()]),
}, { $id: 'CallStats', description: 'Process-lifetime counters for one remote endpoint.' })

export type CallStats = Static<typeof CallStats>
