import type { ZodType, ZodTypeDef } from 'zod'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/$/, '')
}

/**
 * Parses a raw response body as JSON and validates it against `schema`.
 * Returns undefined for empty bodies, invalid JSON, or a shape mismatch.
 */
export function parseBody<T>(
  rawBody: string,
  schema?: ZodType<T, ZodTypeDef, unknown>,
): T | undefined {
  if (!schema || rawBody.trim() === '') return undefined

  let json: unknown
  try {
    json = JSON.parse(rawBody)
  } catch {
    return undefined
  }

  const result = schema.safeParse(json)
  return result.success ? result.data : undefined
}

/** Drops keys whose value is undefined, recursing into plain objects. */
export function compact(value: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue
    output[key] = isPlainObject(entry) ? compact(entry) : entry
  }
  return output
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
