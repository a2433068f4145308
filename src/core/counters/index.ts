export { createCounterEngine } from './engine'
export type { CounterEngine, CounterEngineDeps } from './engine'
export { classifyMatchups, DEFAULT_THRESHOLDS } from './classifier'
export { createVariantRegistry, describeVariant } from './variants'
export type { VariantRegistry, VariantRegistryOptions } from './variants'
export { createOpenDotaClient } from './opendota-api-client'
export { extractOpenDotaMatchups, openDotaExtractor } from './opendota-extractor'
export { createDotabuffScraper, heroSlug } from './dotabuff-scraper'
export { extractDotabuffMatchups, dotabuffExtractor, parsePercentage } from './dotabuff-extractor'
export type {
  MatchupRecord,
  MatchupSection,
  ClassificationThresholds,
  HeroRef,
  RawPayload,
  Extraction,
  MatchupFetcher,
  MatchupExtractor,
  MatchupSource,
  FetchOptions,
} from './types'
