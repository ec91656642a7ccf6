// apps/backend/src/lib/config.ts
// Environment → typed config. The generation key is required before any
// document is touched, so loading fails fast.
import { z } from 'zod'

const EnvSchema = z.object({
  GENERATION_API_KEY: z.string().trim().min(1).optional(),
  GROQ_API_KEY: z.string().trim().min(1).optional(),
  GENERATION_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  MODEL_DEFAULT: z.string().trim().min(1).optional(),
  FILL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  FILL_MAX_TOKENS: z.coerce.number().int().positive().default(800),
  CONTEXT_RADIUS: z.coerce.number().int().min(0).default(1),
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),
  UPLOAD_LIMIT: z.string().default('10mb'),
  FILL_TRACE: z.string().optional(),
})

export type AppConfig = {
  apiKey: string
  baseURL: string
  model?: string
  temperature: number
  maxTokens: number
  radius: number
  port: number
  corsOrigins: string[]
  uploadLimit: string
  trace: boolean
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid environment: ${issues}`)
  }
  const e = parsed.data
  const apiKey = e.GENERATION_API_KEY ?? e.GROQ_API_KEY
  if (!apiKey) throw new Error('Missing required environment variable: GENERATION_API_KEY (or GROQ_API_KEY)')

  return {
    apiKey,
    baseURL: e.GENERATION_BASE_URL,
    model: e.MODEL_DEFAULT,
    temperature: e.FILL_TEMPERATURE,
    maxTokens: e.FILL_MAX_TOKENS,
    radius: e.CONTEXT_RADIUS,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGIN ? e.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean) : ['http://localhost:5173'],
    uploadLimit: e.UPLOAD_LIMIT,
    trace: e.FILL_TRACE === '1' || e.FILL_TRACE?.toLowerCase() === 'true',
  }
}
