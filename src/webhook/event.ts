import { Type, Static } from '@sinclair/typebox'

export const WebhookEventName = Type.Union([
  Type.Literal('mode.changed'),
  Type.Literal('limit.reached'),
], { $id: 'WebhookEventName', description: 'Events a remote agent knows how to push' })

export type WebhookEventName = Static<typeof WebhookEventName>

export const WebhookEvent = Type.Object({
  event: Type.String({ minLength: 1 }),
  timestamp: Type.String({ format: 'date-time' }),
  source: Type.String({ description: 'Upstream key of the sender, e.g. primary' }),
  payload: Type.Record(Type.String(), Type.Unknown(), {
    description: 'Event-type-specific data',
  }),
}, { $id: 'WebhookEvent', description: 'Body of POST /webhook/switch-gate.' })

export type WebhookEvent = Static<typeof WebhookEvent>
