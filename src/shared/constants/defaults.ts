import type { ProviderVariant } from '../types'

export const APP_NAME = 'dota-counters'

export const DEFAULT_VARIANT: ProviderVariant = 'OD_API'

export const OPENDOTA_BASE_URL = 'https://api.opendota.com/api'
export const DOTABUFF_BASE_URL = 'https://www.dotabuff.com'

// Dotabuff answers 429 to requests that carry the default fetch User-Agent.
export const DOTABUFF_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'

export const HEROES_FILE = 'resources/heroes.json'
