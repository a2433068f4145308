import { z } from 'zod'
import type { Outcome } from '@shared/types'
import type { HeroLookup } from '@core/heroes'
import { fail, ok } from '@core/outcome'
import type { Extraction, MatchupExtractor, MatchupRecord } from './types'

// @DEV-GUIDE: Turns an OpenDota matchups body into MatchupRecords.
// score = wins / games_played (raw win fraction), sampleSize = games_played.
// games_played = 0 is rejected before dividing, wins > games_played likewise. Any schema problem fails the whole
// payload with SchemaError; only unknown opponent ids are dropped row by row.

const matchupSchema = z.object({
  hero_id: z.number().int(),
  games_played: z.number().int().nonnegative(),
  wins: z.number().int().nonnegative(),
})

const matchupsSchema = z.array(matchupSchema)

export type OpenDotaMatchup = z.infer<typeof matchupSchema>

export function extractOpenDotaMatchups(body: string, heroes: HeroLookup): Outcome<Extraction> {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch {
    return fail('SchemaError', 'Matchups response is not valid JSON')
  }

  const parsed = matchupsSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    return fail('SchemaError', `Unexpected matchups response: ${path}${issue.message}`)
  }

  const records: MatchupRecord[] = []
  const unresolved: string[] = []

  for (const [index, matchup] of parsed.data.entries()) {
    if (matchup.games_played === 0) {
      return fail('SchemaError', `Matchup ${index} (hero ${matchup.hero_id}) has zero games played`)
    }
    if (matchup.wins > matchup.games_played) {
      return fail(
        'SchemaError',
        `Matchup ${index} (hero ${matchup.hero_id}) has ${matchup.wins} wins in ${matchup.games_played} games`,
      )
    }

    if (heroes.idToName(matchup.hero_id) === null) {
      unresolved.push(String(matchup.hero_id))
      continue
    }

    records.push({
      opponentId: matchup.hero_id,
      sampleSize: matchup.games_played,
      score: matchup.wins / matchup.games_played,
    })
  }

  return ok({ records, unresolved })
}

export const openDotaExtractor: MatchupExtractor = {
  extract: extractOpenDotaMatchups,
}
