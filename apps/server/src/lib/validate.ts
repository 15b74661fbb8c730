import type { Context } from 'hono'
import { z } from 'zod'

/** Parse and validate request body with a Zod schema. Returns 400 on failure. */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.infer<T> | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  return validated(c, schema, body)
}

/** Parse and validate the query string with a Zod schema. Returns 400 on failure. */
export function parseQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> | Response {
  return validated(c, schema, c.req.query())
}

function validated<T extends z.ZodTypeAny>(c: Context, schema: T, input: unknown): z.infer<T> | Response {
  const result = schema.safeParse(input)
  if (!result.success) {
    const errors = result.error.flatten().fieldErrors
    return c.json({ error: 'Validation failed.', fields: errors }, 400)
  }

  return result.data
}

/** Check if a parse result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
