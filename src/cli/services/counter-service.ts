import log from 'electron-log/node'
import type { ProviderVariant } from '@shared/types'
import type { CounterEngine } from '@core/counters'
import type { HeroLookup } from '@core/heroes'
import { formatCounterResult, formatFailure } from '../format'

const logger = log.scope('counters')

export interface CounterService {
  lookup(heroName: string, variant?: ProviderVariant): Promise<boolean>
}

export interface CounterServiceDeps {
  engine: CounterEngine
  heroes: HeroLookup
  output: (line: string) => void
}

/**
 * Resolves a typed hero name, runs one compute() and prints the two ranked lists or
 * the failure message. lookup() resolves to false when nothing was shown.
 */
export function createCounterService(deps: CounterServiceDeps): CounterService {
  const { engine, heroes, output } = deps

  return {
    async lookup(heroName, variant = engine.selectedVariant()) {
      const heroId = heroes.nameToId(heroName)
      if (heroId === null) {
        output('Hero not found...')
        return false
      }

      if (!engine.isSupported(variant)) {
        output(`Mode ${variant} is not yet supported, no matchups to show.`)
      }

      const result = await engine.compute(heroId, variant)
      if (!result.ok) {
        logger.warn('Counter lookup failed', {
          hero: heroName,
          variant,
          kind: result.failure.kind,
          status: result.failure.status,
          message: result.failure.message,
        })
        output(formatFailure(result.failure))
        return false
      }

      logger.info(
        `${heroName} (${variant}): ${result.value.countered.length} countered, ${result.value.counters.length} counters`,
      )
      for (const line of formatCounterResult(result.value, heroes)) {
        output(line)
      }
      return true
    },
  }
}
