import type { Outcome } from '@shared/types'
import { OPENDOTA_BASE_URL } from '@shared/constants/defaults'
import { fetchText } from '@core/http/fetch-text'
import type { FetchOptions, HeroRef, MatchupFetcher, RawPayload } from './types'

// GET /heroes/{id}/matchups -> [{ hero_id, games_played, wins }], professional matches only.

export interface OpenDotaClientOptions extends FetchOptions {
  baseUrl?: string
}

export function createOpenDotaClient(options: OpenDotaClientOptions = {}): MatchupFetcher {
  const { baseUrl = OPENDOTA_BASE_URL, ...fetchOptions } = options

  return {
    fetch(hero: HeroRef): Promise<Outcome<RawPayload>> {
      return fetchText(
        {
          url: matchupsUrl(baseUrl, hero.id),
          headers: { Accept: 'application/json' },
        },
        fetchOptions,
      )
    },
  }
}

export function matchupsUrl(baseUrl: string, heroId: number): string {
  const url = new URL(`heroes/${heroId}/matchups`, baseUrl.endsWith('/') ? baseUrl : baseUrl + '/')
  return url.toString()
}
