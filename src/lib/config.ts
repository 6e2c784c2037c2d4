import path from 'path'
import { z } from 'zod'
import { resolveAdminPassword } from '@/lib/admin'

export interface AppConfig {
  /** Gemini credential; `null` means every overview is heuristic. */
  geminiApiKey: string | null
  geminiModel: string
  geminiTimeoutMs: number
  adminPassword: string
  logsDir: string
  pagesDir: string
  maxPages: number
  maxSources: number
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const DEFAULT_MODEL = 'gemini-1.5-flash'
export const DEFAULT_TIMEOUT_MS = 8000

// Blank values count as unset
const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined))

const positiveInt = (fallback: number) =>
  optionalString.pipe(
    z.coerce.number().int().positive().optional().transform(value => value ?? fallback)
  )

const envSchema = z.object({
  GEMINI_API_KEY: optionalString,
  GOOGLE_API_KEY: optionalString,
  GEMINI_MODEL: optionalString,
  GEMINI_TIMEOUT_MS: positiveInt(DEFAULT_TIMEOUT_MS),
  ADMIN_PASSWORD: optionalString,
  LOGS_DIR: optionalString,
  PAGES_DIR: optionalString,
  MAX_PAGES: positiveInt(80),
  MAX_SOURCES: positiveInt(8),
})

export type Env = Record<string, string | undefined>

export function loadConfig(env: Env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`)
  }

  const vars = parsed.data
  return Object.freeze({
    geminiApiKey: vars.GEMINI_API_KEY ?? vars.GOOGLE_API_KEY ?? null,
    geminiModel: vars.GEMINI_MODEL ?? DEFAULT_MODEL,
    geminiTimeoutMs: vars.GEMINI_TIMEOUT_MS,
    adminPassword: resolveAdminPassword(vars.ADMIN_PASSWORD),
    logsDir: path.resolve(cwd, vars.LOGS_DIR ?? 'logs'),
    pagesDir: path.resolve(cwd, vars.PAGES_DIR ?? '.'),
    maxPages: vars.MAX_PAGES,
    maxSources: vars.MAX_SOURCES,
  })
}

let cached: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig(process.env)
  }
  return cached
}
