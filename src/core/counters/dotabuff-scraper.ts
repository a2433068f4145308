import type { Outcome } from '@shared/types'
import { DOTABUFF_BASE_URL, DOTABUFF_USER_AGENT } from '@shared/constants/defaults'
import { fetchText } from '@core/http/fetch-text'
import type { FetchOptions, HeroRef, MatchupFetcher, RawPayload } from './types'

// Dotabuff answers 429 to requests without a browser User-Agent.

export interface DotabuffScraperOptions extends FetchOptions {
  baseUrl?: string
  userAgent?: string
}

export function createDotabuffScraper(options: DotabuffScraperOptions = {}): MatchupFetcher {
  const { baseUrl = DOTABUFF_BASE_URL, userAgent, ...fetchOptions } = options
  const agent = userAgent?.trim() || DOTABUFF_USER_AGENT

  return {
    fetch(hero: HeroRef): Promise<Outcome<RawPayload>> {
      return fetchText(
        {
          url: countersUrl(baseUrl, heroSlug(hero.displayName)),
          headers: {
            'User-Agent': agent,
            Accept: 'text/html',
          },
        },
        fetchOptions,
      )
    },
  }
}

/**
 * Converts a display name to a Dotabuff page slug.
 *
 * Examples:
 *   "Axe"            → "axe"
 *   "Crystal Maiden" → "crystal-maiden"
 *   "Anti-Mage"      → "anti-mage"
 */
export function heroSlug(displayName: string): string {
  return displayName.trim().toLowerCase().replace(/ /g, '-')
}

export function countersUrl(baseUrl: string, slug: string): string {
  const url = new URL(
    `heroes/${encodeURIComponent(slug)}/counters`,
    baseUrl.endsWith('/') ? baseUrl : baseUrl + '/',
  )
  return url.toString()
}
