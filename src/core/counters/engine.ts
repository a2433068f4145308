import type { CounterResult, Outcome, ProviderVariant } from '@shared/types'
import { DEFAULT_VARIANT } from '@shared/constants/defaults'
import type { HeroLookup } from '@core/heroes'
import { fail, ok } from '@core/outcome'
import { classifyMatchups, DEFAULT_THRESHOLDS } from './classifier'
import { describeVariant, type VariantRegistry } from './variants'
import type { ClassificationThresholds } from './types'

// @DEV-GUIDE: fetch -> extract -> classify for one hero and one provider variant.
// Every compute() call builds its own locals and returns them; nothing from a previous
// hero survives into the next call. The selected variant is the only state the engine holds.
// Failures from fetch/extract come back unchanged as { ok: false, failure }. A variant with
// no registered source returns empty lists (not a failure) and reports it via onProgress.

export interface CounterEngineDeps {
  heroes: HeroLookup
  sources: VariantRegistry
  thresholds?: Readonly<ClassificationThresholds>
  initialVariant?: ProviderVariant
  /** Receives human-readable status messages (source URL, dropped rows, ...). */
  onProgress?: (message: string) => void
}

export interface CounterEngine {
  compute(heroId: number, variant?: ProviderVariant): Promise<Outcome<CounterResult>>
  selectVariant(variant: ProviderVariant): void
  selectedVariant(): ProviderVariant
  isSupported(variant: ProviderVariant): boolean
  describeVariant(variant: ProviderVariant): string
}

export function createCounterEngine(deps: CounterEngineDeps): CounterEngine {
  const { heroes, sources, thresholds = DEFAULT_THRESHOLDS, onProgress } = deps
  let current: ProviderVariant = deps.initialVariant ?? DEFAULT_VARIANT

  return {
    async compute(heroId, variant = current): Promise<Outcome<CounterResult>> {
      const source = sources[variant]
      if (!source) {
        onProgress?.(`${variant} is not yet supported; no matchups available`)
        return ok({ counters: [], countered: [] })
      }

      const displayName = heroes.idToName(heroId)
      if (displayName === null) {
        return fail('NotFound', `Unknown hero id ${heroId}`)
      }

      const payload = await source.fetcher.fetch({ id: heroId, displayName })
      if (!payload.ok) return payload

      onProgress?.(`Obtained data from: ${payload.value.url}`)

      const extraction = source.extractor.extract(payload.value.body, heroes)
      if (!extraction.ok) return extraction

      const { records, unresolved } = extraction.value
      if (unresolved.length > 0) {
        onProgress?.(`Skipped ${unresolved.length} unknown opponent(s): ${unresolved.join(', ')}`)
      }

      return ok(classifyMatchups(records, thresholds))
    },

    selectVariant(variant) {
      current = variant
    },

    selectedVariant() {
      return current
    },

    isSupported(variant) {
      return sources[variant] !== null
    },

    describeVariant,
  }
}
