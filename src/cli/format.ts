import type { CounterFailure, CounterFailureKind, CounterResult, RankedMatchup } from '@shared/types'
import type { HeroLookup } from '@core/heroes'

const FAILURE_HEADLINES: Record<CounterFailureKind, string> = {
  NetworkError: 'Network Error: unable to reach the data provider',
  NotFound: 'Hero not found at the data provider, please try again with another name',
  SchemaError: 'The data provider returned matchups in an unexpected format',
  MarkupError: 'The data provider page layout has changed, unable to read counters',
}

/** 0.625 → "62.50%" */
export function formatScore(score: number): string {
  return `${(score * 100).toFixed(2)}%`
}

export function formatMatchupList(matchups: RankedMatchup[], heroes: HeroLookup): string[] {
  if (matchups.length === 0) return ['\t(none)']
  return matchups.map((matchup) => {
    const name = heroes.idToName(matchup.opponentId) ?? `Hero #${matchup.opponentId}`
    return `\t${name}:\t${formatScore(matchup.score)}`
  })
}

export function formatCounterResult(result: CounterResult, heroes: HeroLookup): string[] {
  return [
    'This hero counters:',
    ...formatMatchupList(result.countered, heroes),
    'This hero is countered by:',
    ...formatMatchupList(result.counters, heroes),
  ]
}

export function formatFailure(failure: CounterFailure): string {
  return `${FAILURE_HEADLINES[failure.kind]} (${failure.message})`
}

export function formatHeroNames(names: string[]): string[] {
  return ['Hero name list:', ...names.map((name) => `\t${name}`)]
}
