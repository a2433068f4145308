// ── Provider variants ────────────────────────────────────────────────────────

export const PROVIDER_VARIANTS = ['DB_SCRAPE', 'OD_API', 'OD_SCRAPE'] as const

/**
 * Supported data sources.
 * - DB_SCRAPE: Dotabuff counters page (HTML), advantage percentages
 * - OD_API: OpenDota matchups endpoint (JSON), raw win fractions
 * - OD_SCRAPE: OpenDota web page, reserved and not implemented yet
 */
export type ProviderVariant = (typeof PROVIDER_VARIANTS)[number]

export function isProviderVariant(value: string): value is ProviderVariant {
  return PROVIDER_VARIANTS.some((variant) => variant === value)
}

// ── Results ──────────────────────────────────────────────────────────────────

export interface RankedMatchup {
  opponentId: number
  score: number
}

export interface CounterResult {
  /** Opponents that beat this hero, strongest first (lowest score first). */
  counters: RankedMatchup[]
  /** Opponents this hero beats, strongest first (highest score first). */
  countered: RankedMatchup[]
}

// ── Failures ─────────────────────────────────────────────────────────────────

export type CounterFailureKind = 'NetworkError' | 'NotFound' | 'SchemaError' | 'MarkupError'

export interface CounterFailure {
  kind: CounterFailureKind
  message: string
  /** HTTP status, when the failure came from a response. */
  status?: number
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: CounterFailure }
