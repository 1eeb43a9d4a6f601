import { z } from "zod"

const emptyToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value)

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  OPENAI_BASE_URL: z.preprocess(emptyToUndefined, z.string().trim().url().optional()),
  MODEL: z.preprocess(emptyToUndefined, z.string().trim().default("gpt-4o-mini")),
  AI_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30_000)),
})

export type AppConfig = {
  openaiApiKey?: string
  openaiBaseUrl?: string
  model: string
  aiTimeoutMs: number
}

// Read on every call so route handlers pick up the current environment.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    throw new Error(`[config] Invalid environment: ${issues}`)
  }

  return {
    openaiApiKey: parsed.data.OPENAI_API_KEY,
    openaiBaseUrl: parsed.data.OPENAI_BASE_URL,
    model: parsed.data.MODEL,
    aiTimeoutMs: parsed.data.AI_TIMEOUT_MS,
  }
}

export const providerName = (config: AppConfig): string => {
  if (!config.openaiApiKey) return "mock"
  return config.openaiBaseUrl ? new URL(config.openaiBaseUrl).host : "api.openai.com"
}
