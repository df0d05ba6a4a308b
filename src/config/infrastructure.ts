import { Type, Static } from '@sinclair/typebox'

export const ServiceConfig = Type.Object({
  name: Type.String({ minLength: 1 }),
  job: Type.Optional(Type.String({ description: 'Metrics job whose up gauge decides this service' })),
  port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535, description: 'Display only' })),
}, { $id: 'ServiceConfig', description: 'A service declared on a monitored server.' })

export type ServiceConfig = Static<typeof ServiceConfig>

export const ServerConfig = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
  icon: Type.Optional(Type.String()),
  ip: Type.String({ minLength: 1 }),
  prometheus_instance: Type.Optional(Type.String({ description: 'instance label; defaults to name' })),
  external_check: Type.Optional(Type.String({
    pattern: '^(https?|tcp)://.+',
    description: 'https://host[:port][/path], http://..., or tcp://host:port',
  })),
  services: Type.Optional(Type.Array(ServiceConfig)),
}, { $id: 'ServerConfig', description: 'A monitored server.' })

export type ServerConfig = Static<typeof ServerConfig>

export const CloudConfig = Type.Object({
  name: Type.String({ minLength: 1 }),
  icon: Type.Optional(Type.String()),
  servers: Type.Array(ServerConfig),
}, { $id: 'CloudConfig', description: 'A cloud grouping; order is display order.' })

export type CloudConfig = Static<typeof CloudConfig>

export const InfrastructureConfig = Type.Object({
  enabled: Type.Optional(Type.Boolean({ default: true })),
  prometheus_url: Type.Optional(Type.String({ pattern: '^https?://' })),
  cache_ttl_seconds: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  concurrency: Type.Optional(Type.Integer({ minimum: 1, maximum: 64 })),
  clouds: Type.Array(CloudConfig),
}, { $id: 'InfrastructureConfig' })

export type InfrastructureConfig = Static<typeof InfrastructureConfig>

export const UpstreamConfig = Type.Object({
  name: Type.Optional(Type.String()),
  ip: Type.String({ minLength: 1 }),
  user: Type.Optional(Type.String()),
  switch_gate: Type.Optional(Type.Boolean({ description: 'Reach this host through its remote agent' })),
  switch_gate_port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
}, { $id: 'UpstreamConfig', description: 'Remote host reachable only through the jump host.' })

export type UpstreamConfig = Static<typeof UpstreamConfig>

export const JumpHostConfig = Type.Object({
  name: Type.Optional(Type.String()),
  host: Type.String({ minLength: 1, description: 'user@host' }),
  key_path: Type.Optional(Type.String()),
  status_script: Type.Optional(Type.String()),
  traffic_script: Type.Optional(Type.String()),
}, { $id: 'JumpHostConfig', description: 'SSH jump host used for every tunneled call.' })

export type JumpHostConfig = Static<typeof JumpHostConfig>

export const WebhooksConfig = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  secret: Type.Optional(Type.String()),
}, { $id: 'WebhooksConfig' })

export type WebhooksConfig = Static<typeof WebhooksConfig>

export const HealthConfig = Type.Object({
  infrastructure: InfrastructureConfig,
  jump_host: Type.Optional(JumpHostConfig),
  upstreams: Type.Optional(Type.Record(Type.String(), UpstreamConfig)),
  webhooks: Type.Optional(WebhooksConfig),
  server: Type.Optional(Type.Object({
    port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  })),
}, { $id: 'HealthConfig', description: 'Root configuration document.' })

export type HealthConfig = Static<typeof HealthConfig>
