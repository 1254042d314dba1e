import type { LogLevel } from '@nestjs/common'
import { z } from 'zod'

const LOG_LEVEL_ORDER = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'] as const

// Blank env values count as unset.
const optionalSecret = z.preprocess(
  (v) => (typeof v === 'string' && v.trim().length === 0 ? undefined : v),
  z.string().trim().optional(),
)

const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback)

export const appConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(LOG_LEVEL_ORDER).default('log'),

  PLAN_ARTIFACT_DIR: z.string().min(1).default('training_plans'),
  PLAN_JOB_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  PLAN_JOB_STALE_AFTER_MS: nonNegativeInt(0),
  PLAN_JOB_RETENTION_MS: nonNegativeInt(0),
  PLAN_JOB_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),

  ACTIVITY_PROVIDER: z.enum(['strava', 'none']).default('strava'),
  STRAVA_API_BASE_URL: z.string().url().default('https://www.strava.com/api/v3'),
  STRAVA_OAUTH_URL: z.string().url().default('https://www.strava.com/oauth/token'),
  STRAVA_ACCESS_TOKEN: optionalSecret,
  STRAVA_REFRESH_TOKEN: optionalSecret,
  STRAVA_CLIENT_ID: optionalSecret,
  STRAVA_CLIENT_SECRET: optionalSecret,
  STRAVA_TIMEOUT_MS: z.coerce.number().int().min(1).default(15_000),

  AI_PLAN_PROVIDER: z.enum(['stub', 'openai']).default('stub'),
  OPENAI_API_KEY: optionalSecret,
  AI_PLAN_MODEL: z.string().min(1).default('gpt-4o'),
  AI_PLAN_MAX_OUTPUT_TOKENS: z.coerce.number().int().min(1).default(2000),
})

export type AppConfig = {
  port: number
  corsOrigin: string
  logLevel: LogLevel
  planJobs: {
    artifactDir: string
    concurrency: number
    staleAfterMs: number
    retentionMs: number
    sweepIntervalMs: number
  }
  activity: {
    provider: 'strava' | 'none'
    strava: {
      apiBaseUrl: string
      oauthUrl: string
      accessToken?: string
      refreshToken?: string
      clientId?: string
      clientSecret?: string
      timeoutMs: number
    }
  }
  aiPlan: {
    provider: 'stub' | 'openai'
    openAiApiKey?: string
    model: string
    maxOutputTokens: number
  }
}

export const APP_CONFIG = Symbol('APP_CONFIG')

export class InvalidConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'InvalidConfigError'
  }
}

export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = appConfigSchema.safeParse(env)
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const e = parsed.data
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    logLevel: e.LOG_LEVEL,
    planJobs: {
      artifactDir: e.PLAN_ARTIFACT_DIR,
      concurrency: e.PLAN_JOB_CONCURRENCY,
      staleAfterMs: e.PLAN_JOB_STALE_AFTER_MS,
      retentionMs: e.PLAN_JOB_RETENTION_MS,
      sweepIntervalMs: e.PLAN_JOB_SWEEP_INTERVAL_MS,
    },
    activity: {
      provider: e.ACTIVITY_PROVIDER,
      strava: {
        apiBaseUrl: e.STRAVA_API_BASE_URL,
        oauthUrl: e.STRAVA_OAUTH_URL,
        accessToken: e.STRAVA_ACCESS_TOKEN,
        refreshToken: e.STRAVA_REFRESH_TOKEN,
        clientId: e.STRAVA_CLIENT_ID,
        clientSecret: e.STRAVA_CLIENT_SECRET,
        timeoutMs: e.STRAVA_TIMEOUT_MS,
      },
    },
    aiPlan: {
      provider: e.AI_PLAN_PROVIDER,
      openAiApiKey: e.OPENAI_API_KEY,
      model: e.AI_PLAN_MODEL,
      maxOutputTokens: e.AI_PLAN_MAX_OUTPUT_TOKENS,
    },
  }
}

/** Nest expects the full list of enabled levels, not a threshold. */
export function logLevelsFrom(minimum: LogLevel): LogLevel[] {
  const start = LOG_LEVEL_ORDER.indexOf(minimum)
  return LOG_LEVEL_ORDER.slice(start < 0 ? 0 : start)
}
