// Classification
export const COUNTER_CUTOFF = 0.4
export const COUNTERED_CUTOFF = 0.6
export const MIN_SAMPLE_SIZE = 10

// Network
export const FETCH_TIMEOUT_MS = 30_000
export const FETCH_MAX_RETRIES = 1
export const FETCH_RETRY_DELAY_MS = 1_000
