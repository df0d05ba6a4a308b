import { Type, Static } from '@sinclair/typebox'

export const ApiErrorCode = Type.Union([
  Type.Literal('VALIDATION_ERROR'),
  Type.Literal('AUTH_ERROR'),
  Type.Literal('NOT_FOUND'),
  Type.Literal('INTERNAL_ERROR'),
  Type.Literal('TIMEOUT'),
  Type.Literal('SERVICE_UNAVAILABLE'),
])

export type ApiErrorCode = Static<typeof ApiErrorCode>

export const ApiError = Type.Object({
  code: ApiErrorCode,
  message: Type.String(),
  status_code: Type.Integer({ minimum: 100, maximum: 599 }),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
}, { $id: 'ApiError', description: 'Error envelope returned by the health API.' })

export type ApiError = Static<typeof ApiError>
