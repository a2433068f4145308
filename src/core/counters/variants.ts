import type { ProviderVariant } from '@shared/types'
import { createOpenDotaClient, type OpenDotaClientOptions } from './opendota-api-client'
import { openDotaExtractor } from './opendota-extractor'
import { createDotabuffScraper, type DotabuffScraperOptions } from './dotabuff-scraper'
import { dotabuffExtractor } from './dotabuff-extractor'
import type { FetchOptions, MatchupSource } from './types'

// null = not yet supported; the engine answers it with an empty result.

export type VariantRegistry = Record<ProviderVariant, MatchupSource | null>

export interface VariantRegistryOptions extends FetchOptions {
  openDota?: Pick<OpenDotaClientOptions, 'baseUrl'>
  dotabuff?: Pick<DotabuffScraperOptions, 'baseUrl' | 'userAgent'>
}

export function createVariantRegistry(options: VariantRegistryOptions = {}): VariantRegistry {
  const { openDota, dotabuff, ...fetchOptions } = options

  return {
    DB_SCRAPE: {
      fetcher: createDotabuffScraper({ ...fetchOptions, ...dotabuff }),
      extractor: dotabuffExtractor,
    },
    OD_API: {
      fetcher: createOpenDotaClient({ ...fetchOptions, ...openDota }),
      extractor: openDotaExtractor,
    },
    OD_SCRAPE: null,
  }
}

const VARIANT_DESCRIPTIONS: Record<ProviderVariant, string> = {
  DB_SCRAPE: 'Obtain advantage-scores in public matches from Dotabuff (with web-scraping techniques)',
  OD_API: 'Obtain raw winrates in professional matches from OpenDota (with the OpenDota API)',
  OD_SCRAPE: 'Obtain matchups from the OpenDota website (not yet supported)',
}

/** Human-readable description of where a variant's data comes from, for menus. */
export function describeVariant(variant: ProviderVariant): string {
  return VARIANT_DESCRIPTIONS[variant]
}
