import { resolve } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { PROVIDER_VARIANTS } from '@shared/types'
import {
  DEFAULT_VARIANT,
  DOTABUFF_BASE_URL,
  DOTABUFF_USER_AGENT,
  HEROES_FILE,
  OPENDOTA_BASE_URL,
} from '@shared/constants/defaults'
import {
  FETCH_MAX_RETRIES,
  FETCH_TIMEOUT_MS,
} from '@shared/constants/thresholds'

// @DEV-GUIDE: Process configuration, read from the environment (populated from .env by
// `dotenv/config` in src/cli/index.ts). Every key is optional; unset or blank keys fall back
// to the defaults in @shared/constants. The result is validated once with zod and never
// mutated afterwards.
//
//   OPENDOTA_BASE_URL, DOTABUFF_BASE_URL   provider roots
//   DOTABUFF_USER_AGENT                    User-Agent sent to Dotabuff (must not be blank)
//   FETCH_TIMEOUT_MS, FETCH_RETRIES        per-request timeout, retries on transient errors (0-1)
//   HEROES_FILE                            hero table path, relative to the working directory
//   DEFAULT_MODE                           starting provider variant
//   LOG_LEVEL, LOG_FILE                    electron-log console level, optional log file

const PROJECT_ROOT = fileURLToPath(new URL('../../../', import.meta.url))

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const

const configSchema = z.object({
  openDotaBaseUrl: z.string().url(),
  dotabuffBaseUrl: z.string().url(),
  dotabuffUserAgent: z.string().min(1),
  fetchTimeoutMs: z.coerce.number().int().min(1_000).max(120_000),
  fetchRetries: z.coerce.number().int().min(0).max(1),
  heroesFile: z.string().min(1),
  defaultMode: z.enum(PROVIDER_VARIANTS),
  logLevel: z.enum(LOG_LEVELS),
  logFile: z.string().min(1).optional(),
})

export type AppConfig = z.infer<typeof configSchema>

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const heroesFile = readEnv(env, 'HEROES_FILE')

  return configSchema.parse({
    openDotaBaseUrl: readEnv(env, 'OPENDOTA_BASE_URL') ?? OPENDOTA_BASE_URL,
    dotabuffBaseUrl: readEnv(env, 'DOTABUFF_BASE_URL') ?? DOTABUFF_BASE_URL,
    dotabuffUserAgent: readEnv(env, 'DOTABUFF_USER_AGENT') ?? DOTABUFF_USER_AGENT,
    fetchTimeoutMs: readEnv(env, 'FETCH_TIMEOUT_MS') ?? FETCH_TIMEOUT_MS,
    fetchRetries: readEnv(env, 'FETCH_RETRIES') ?? FETCH_MAX_RETRIES,
    heroesFile: heroesFile ? resolve(heroesFile) : resolve(PROJECT_ROOT, HEROES_FILE),
    defaultMode: readEnv(env, 'DEFAULT_MODE')?.toUpperCase() ?? DEFAULT_VARIANT,
    logLevel: readEnv(env, 'LOG_LEVEL')?.toLowerCase() ?? 'warn',
    logFile: readEnv(env, 'LOG_FILE'),
  })
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}
