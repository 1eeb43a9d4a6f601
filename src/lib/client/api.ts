import { z } from "zod"

const ApiErrorSchema = z.object({ error: z.string() })

export async function postJson<T extends z.ZodTypeAny>(url: string, body: unknown, schema: T): Promise<z.infer<T>> {
  const res = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  })

  const payload: unknown = await res.json().catch(() => null)
  if (!res.ok) {
    const parsedError = ApiErrorSchema.safeParse(payload)
    throw new Error(parsedError.success ? parsedError.data.error : `Request to ${url} failed (${res.status}).`)
  }

  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    throw new Error(`Unexpected response from ${url}.`)
  }
  return parsed.data
}
