export { createHeroLookup, loadHeroTable, HeroTableError } from './hero-lookup'
export type { HeroLookup, HeroTable } from './hero-lookup'
