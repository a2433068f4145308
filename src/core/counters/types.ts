import type { Outcome } from '@shared/types'
import type { HeroLookup } from '@core/heroes'
import type { RawPayload } from '@core/http/types'

export type { FetchOptions, RawPayload } from '@core/http/types'

// ── Records ──────────────────────────────────────────────────────────────────

/** Bucket assigned by a provider's page layout rather than by score. */
export type MatchupSection = 'counters' | 'countered'

/** One normalized matchup between the subject hero and an opponent. */
export interface MatchupRecord {
  opponentId: number
  /** Games observed, or null when the provider only exposes an aggregated score. */
  sampleSize: number | null
  /** Provider-defined: raw win fraction (OD_API) or advantage percentage (DB_SCRAPE). */
  score: number
  section?: MatchupSection
}

export interface ClassificationThresholds {
  /** score <= counterCutoff: the opponent counters the hero */
  counterCutoff: number
  /** score >= counteredCutoff: the hero counters the opponent */
  counteredCutoff: number
  /** records with a known sampleSize below this are ignored */
  minSampleSize: number
}

// ── Provider seams ───────────────────────────────────────────────────────────

export interface HeroRef {
  id: number
  displayName: string
}

export interface MatchupFetcher {
  fetch(hero: HeroRef): Promise<Outcome<RawPayload>>
}

export interface Extraction {
  records: MatchupRecord[]
  /** Opponent keys (ids or names) that the hero table could not resolve. */
  unresolved: string[]
}

export interface MatchupExtractor {
  extract(body: string, heroes: HeroLookup): Outcome<Extraction>
}

/** A fetcher and the extractor that understands its payload. */
export interface MatchupSource {
  fetcher: MatchupFetcher
  extractor: MatchupExtractor
}
