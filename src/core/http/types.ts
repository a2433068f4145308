export interface RawPayload {
  url: string
  body: string
}

export interface FetchOptions {
  timeoutMs?: number
  /** Extra attempts after a transient failure. */
  retries?: number
  retryDelayMs?: number
  onRetry?: (message: string, attempt: number, delayMs: number) => void
}
