import { Type, Static } from '@sinclair/typebox'

/** Parsed `KEY=VALUE` output of the gateway status script */
export const GatewayStatus = Type.Object({
  server: Type.String(),
  mode: Type.String(),
  table: Type.String(),
}, { $id: 'GatewayStatus', description: 'Routing state reported by the jump host' })

export type GatewayStatus = Static<typeof GatewayStatus>

export const InterfaceTraffic = Type.Object({
  name: Type.String(),
  tx_bytes: Type.Integer({ minimum: 0 }),
  tx_mb: Type.Number({ minimum: 0 }),
})

export type InterfaceTraffic = Static<typeof InterfaceTraffic>

export const GatewayTraffic = Type.Object({
  timestamp: Type.String(),
  interfaces: Type.Record(Type.String(), InterfaceTraffic),
  summary: Type.Object({
    direct_mb: Type.Number(),
    vpn_mb: Type.Number(),
    total_mb: Type.Number(),
    total_gb: Type.Number(),
  }),
  billing: Type.Object({
    free_quota_gb: Type.Number(),
    billable_gb: Type.Number(),
    rate_rub_per_gb: Type.Number(),
    cost_rub: Type.Number(),
  }),
}, { $id: 'GatewayTraffic', description: 'Egress traffic and billing figures from the traffic script' })

export type GatewayTraffic = Static<typeof GatewayTraffic>
