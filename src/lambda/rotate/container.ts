import type { ZodRawShape, ZodType, ZodTypeDef } from 'zod'

/**
 * Zod object schema describing the fields of a secret the runner cares about,
 * e.g. `z.object({ username: z.string(), password: z.string() })`.
 */
export type SecretSchema<T> = ZodType<T, ZodTypeDef, unknown> & {
  readonly shape: ZodRawShape
}

/**
 * A secret payload split into the typed fields of the runner's schema and
 * everything else. Writing a container back keeps the fields the schema does
 * not model, so rotating a password never drops store-managed metadata such
 * as `engine` or `dbClusterIdentifier`.
 */
export interface SecretContainer<T> {
  readonly data: T
  /** Fields absent from the schema, by name. Never shares a key with `data`. */
  readonly extra: Readonly<Record<string, unknown>>
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseSecretContainer<T>(
  schema: SecretSchema<T>,
  payload: string,
): SecretContainer<T> {
  const parsed: unknown = JSON.parse(payload)
  if (!isPlainObject(parsed)) {
    throw new TypeError('Secret payload must be a JSON object')
  }

  const knownKeys = new Set(Object.keys(schema.shape))
  const known: Record<string, unknown> = {}
  const extra: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (knownKeys.has(key)) {
      known[key] = value
    } else {
      extra[key] = value
    }
  }

  return { data: schema.parse(known), extra }
}

export function serializeSecretContainer<T>(container: SecretContainer<T>): string {
  return JSON.stringify({ ...container.extra, ...container.data })
}

/** Copy of `container` with some typed fields replaced. Extra fields are kept. */
export function updateSecret<T>(
  container: SecretContainer<T>,
  patch: Partial<T>,
): SecretContainer<T> {
  return { data: { ...container.data, ...patch }, extra: container.extra }
}
