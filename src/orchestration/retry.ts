/**
 * Backoff between publish attempts.
 */

import { setTimeout as delay } from 'node:timers/promises'

import { DEFAULT_SETTINGS, type RetrySettings } from '../core/index.js'

/** Sleep function; injectable so tests run without waiting */
export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = async (ms) => {
  await delay(ms)
}

/**
 * Resolve a partial policy against the defaults.
 */
export function retryPolicy(overrides: Partial<RetrySettings> = {}): RetrySettings {
  const policy = { ...DEFAULT_SETTINGS.retry }
  if (overrides.maxRetries !== undefined) policy.maxRetries = overrides.maxRetries
  if (overrides.strategy !== undefined) policy.strategy = overrides.strategy
  if (overrides.baseDelayMs !== undefined) policy.baseDelayMs = overrides.baseDelayMs
  if (overrides.maxDelayMs !== undefined) policy.maxDelayMs = overrides.maxDelayMs
  return policy
}

/**
 * Delay before retry number `retry` (1 = first retry).
 *
 * `fixed` waits baseDelayMs every time; `exponential` doubles from
 * baseDelayMs and is capped at maxDelayMs.
 */
export function backoffDelay(policy: RetrySettings, retry: number): number {
  const base = Math.max(0, policy.baseDelayMs)
  if (policy.strategy === 'fixed') {
    return base
  }
  const exponent = Math.max(0, retry - 1)
  return Math.min(base * 2 ** exponent, Math.max(base, policy.maxDelayMs))
}
