import type { ZodType, ZodTypeDef } from 'zod'

export type THttpMethod = 'GET' | 'POST'

export type TCredentials = {
  /** Organisation- or team-scoped API key sent as X-Api-Key */
  apiKey: string
  /** Organisation code sent as X-Customer-Code */
  customerCode: string
}

/**
 * Per-call header substitutes for negative tests.
 * An empty string leaves the header out of the request entirely.
 */
export type TCredentialOverrides = Partial<TCredentials>

export type TRequestOptions<TResponse> = {
  queryString?: Record<string, string | number | boolean | undefined>
  /** Serialised as JSON unless already a string */
  body?: unknown
  credentials?: TCredentialOverrides
  /** Schema the parsed JSON body must satisfy for `body` to be populated */
  schema?: ZodType<TResponse, ZodTypeDef, unknown>
}

/**
 * Outcome of every HTTP call, successful or not.
 * `body` is undefined when the response is empty, not JSON, or not of the expected shape.
 */
export type TApiResponse<TBody> = {
  statusCode: number
  body: TBody | undefined
  rawBody: string
}
