import { performance } from 'perf_hooks'
import { setTimeout as sleep } from 'timers/promises'

/** Lead time subtracted from the deadline so the synthetic timeout fires first. */
export const SAFETY_MARGIN_MS = 100

/** Longest delay a Node.js timer accepts; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

export interface Clock {
  /** Wall-clock time in epoch milliseconds. */
  wallNow(): number
  /** Monotonic time in milliseconds from an arbitrary origin. */
  monotonicNow(): number
}

export const systemClock: Clock = {
  wallNow: () => Date.now(),
  monotonicNow: () => performance.now(),
}

export interface DeadlineOptions {
  signal?: AbortSignal
  clock?: Clock
  marginMs?: number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

const timerSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleep(ms, undefined, { signal })
}

/**
 * Converts an absolute deadline into a monotonic wake instant. Both clocks are
 * sampled once, so wall-clock adjustments after this point do not move the
 * target. A deadline that is already (effectively) past saturates to "now".
 */
export function computeWakeInstant(
  deadline: number,
  clock: Clock = systemClock,
  marginMs: number = SAFETY_MARGIN_MS,
): number {
  const wallNow = clock.wallNow()
  const monotonicNow = clock.monotonicNow()
  const remaining = Math.max(0, deadline - wallNow - marginMs)
  return monotonicNow + remaining
}

/**
 * Suspends until `deadline - margin`. Best effort: the timer only fires when
 * the event loop gets a turn, so CPU-bound work can delay it. Waits longer
 * than one timer allows are split into consecutive timers.
 */
export async function sleepUntilDeadline(
  deadline: number,
  options: DeadlineOptions = {},
): Promise<void> {
  const clock = options.clock ?? systemClock
  const wait = options.sleep ?? timerSleep
  const wakeAt = computeWakeInstant(deadline, clock, options.marginMs)

  do {
    const remaining = Math.max(0, wakeAt - clock.monotonicNow())
    await wait(Math.min(remaining, MAX_TIMER_DELAY_MS), options.signal)
  } while (clock.monotonicNow() < wakeAt)
}
