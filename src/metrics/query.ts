import { Type, Static } from '@sinclair/typebox'

export const PromSample = Type.Object({
  metric: Type.Record(Type.String(), Type.String()),
  // [unix timestamp, "value"]
  value: Type.Tuple([Type.Number(), Type.String()]),
})

export type PromSample = Static<typeof PromSample>

export const PromQueryResponse = Type.Object({
  status: Type.Union([Type.Literal('success'), Type.Literal('error')]),
  data: Type.Optional(Type.Object({
    resultType: Type.String(),
    result: Type.Array(PromSample),
  })),
  errorType: Type.Optional(Type.String()),
  error: Type.Optional(Type.String()),
}, { $id: 'PromQueryResponse', description: 'Instant-vector response of GET /api/v1/query' })

export type PromQueryResponse = Static<typeof PromQueryResponse>
