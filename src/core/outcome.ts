import type { CounterFailure, CounterFailureKind, Outcome } from '@shared/types'

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value }
}

export function fail<T>(kind: CounterFailureKind, message: string, status?: number): Outcome<T> {
  const failure: CounterFailure = status === undefined ? { kind, message } : { kind, message, status }
  return { ok: false, failure }
}
