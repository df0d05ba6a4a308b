import { Type, Static } from '@sinclair/typebox'
import { ApiError } from './error.js'

export const ResponseMetadata = Type.Object({
  timestamp: Type.Optional(Type.String({ format: 'date-time' })),
  duration_ms: Type.Optional(Type.Integer({ minimum: 0 })),
  cached: Type.Optional(Type.Boolean()),
})

export type ResponseMetadata = Static<typeof ResponseMetadata>

export const ApiResponse = Type.Object({
  success: Type.Boolean(),
  data: Type.Optional(Type.Unknown()),
  error: Type.Optional(ApiError),
  metadata: Type.Optional(ResponseMetadata),
}, { $id: 'ApiResponse', description: 'Standard API response envelope.' })

/** Typed envelope for route handlers. */
export type ApiResponse<T = unknown> = {
  success: boolean
  data?: T
  error?: Static<typeof ApiError>
  metadata?: Static<typeof ResponseMetadata>
}
