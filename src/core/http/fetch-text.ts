import type { CounterFailure, Outcome } from '@shared/types'
import {
  FETCH_MAX_RETRIES,
  FETCH_RETRY_DELAY_MS,
  FETCH_TIMEOUT_MS,
} from '@shared/constants/thresholds'
import { fail, ok } from '@core/outcome'
import type { FetchOptions, RawPayload } from './types'

// @DEV-GUIDE: The single HTTP entry point for every provider fetcher.
// One GET with an AbortSignal timeout, plus a bounded retry when the failure is transient:
// transport errors (DNS, refused connection, timeout) and HTTP 429/5xx all surface as
// NetworkError and are retried up to `retries` times. Any other non-ok status is NotFound,
// as is an ok response with an empty body. Nothing here throws.

export interface FetchTextRequest {
  url: string
  headers?: Record<string, string>
}

export async function fetchText(
  request: FetchTextRequest,
  options: FetchOptions = {},
): Promise<Outcome<RawPayload>> {
  const {
    timeoutMs = FETCH_TIMEOUT_MS,
    retries = FETCH_MAX_RETRIES,
    retryDelayMs = FETCH_RETRY_DELAY_MS,
    onRetry,
  } = options

  let result = await attemptFetch(request, timeoutMs)
  for (let attempt = 1; attempt <= retries; attempt++) {
    if (result.ok || !isTransient(result.failure)) break

    onRetry?.(result.failure.message, attempt, retryDelayMs)
    if (retryDelayMs > 0) await delay(retryDelayMs)
    result = await attemptFetch(request, timeoutMs)
  }
  return result
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500
}

// ── Internal Helpers ────────────────────────────────────────────────────────────

async function attemptFetch(
  request: FetchTextRequest,
  timeoutMs: number,
): Promise<Outcome<RawPayload>> {
  const { url, headers = {} } = request

  let response: Response
  try {
    response = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error: unknown) {
    return fail('NetworkError', `Unable to connect to ${url}: ${describeError(error)}`)
  }

  if (!response.ok) {
    await response.body?.cancel()
    const kind = isTransientStatus(response.status) ? 'NetworkError' : 'NotFound'
    return fail(kind, `HTTP ${response.status} ${response.statusText} for ${url}`, response.status)
  }

  let body: string
  try {
    body = await response.text()
  } catch (error: unknown) {
    return fail('NetworkError', `Connection dropped while reading ${url}: ${describeError(error)}`)
  }

  if (body.trim() === '') {
    return fail('NotFound', `Empty response for ${url}`, response.status)
  }

  return ok({ url, body })
}

function isTransient(failure: CounterFailure): boolean {
  return failure.kind === 'NetworkError'
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'TimeoutError' ? 'request timed out' : error.message
  }
  return String(error)
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
