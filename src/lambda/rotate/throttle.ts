import { setTimeout as sleep } from 'timers/promises'
import type { Logger } from '../runtime/logger'

const THROTTLING_MARKERS = [
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'SlowDown',
  'Too Many Requests',
]

export interface ThrottleRetryOptions {
  /** First cool-down; doubles on every retry up to `maxDelayMs`. */
  baseDelayMs?: number
  maxDelayMs?: number
  /** Total attempts including the first. `Infinity` retries for as long as the store throttles. */
  maxAttempts?: number
  sleep?: (ms: number) => Promise<void>
}

export const DEFAULT_THROTTLE_RETRY: Required<Omit<ThrottleRetryOptions, 'sleep'>> = {
  baseDelayMs: 100,
  maxDelayMs: 400,
  maxAttempts: 10,
}

function httpStatusOf(error: object): number | undefined {
  if ('$metadata' in error) {
    const metadata = error.$metadata
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
      return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined
    }
  }
  return undefined
}

function describe(error: object): string {
  const name = 'name' in error && typeof error.name === 'string' ? error.name : ''
  const message = 'message' in error && typeof error.message === 'string' ? error.message : ''
  return `${name} ${message}`
}

/**
 * Rate limiting shows up as HTTP 429, or as a 400/503 whose error names a
 * throttling condition.
 */
export function isThrottlingError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false
  }
  const status = httpStatusOf(error)
  if (status === 429) {
    return true
  }
  if (status === 400 || status === 503) {
    const text = describe(error)
    return THROTTLING_MARKERS.some((marker) => text.includes(marker))
  }
  return false
}

export function throttleDelay(attempt: number, options: ThrottleRetryOptions = {}): number {
  const base = options.baseDelayMs ?? DEFAULT_THROTTLE_RETRY.baseDelayMs
  const max = options.maxDelayMs ?? DEFAULT_THROTTLE_RETRY.maxDelayMs
  return Math.min(base * 2 ** (attempt - 1), max)
}

/**
 * Repeats `request` while it fails with a throttling error, cooling down
 * between attempts. Any other error, and the last throttling error once
 * `maxAttempts` is used up, is rethrown as is.
 */
export async function withThrottleRetry<T>(
  request: () => Promise<T>,
  options: ThrottleRetryOptions = {},
  logger?: Logger,
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_THROTTLE_RETRY.maxAttempts
  const wait = options.sleep ?? ((ms: number) => sleep(ms))

  for (let attempt = 1; ; attempt++) {
    try {
      return await request()
    } catch (e) {
      if (!isThrottlingError(e) || attempt >= maxAttempts) {
        throw e
      }
      const delayMs = throttleDelay(attempt, options)
      logger?.warn('Cooling down to prevent request limits', { attempt, delayMs })
      await wait(delayMs)
    }
  }
}
