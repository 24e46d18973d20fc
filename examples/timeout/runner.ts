import { setTimeout as sleep } from 'timers/promises'
import { z } from 'zod'
import type { Runner } from '../../src/lambda'

const TimeoutEvent = z.object({
  timeout_secs: z.number().int().nonnegative().optional(),
})

type TimeoutEvent = z.infer<typeof TimeoutEvent>

/**
 * Sleeps for `timeout_secs` (60 by default). Deployed with a shorter function
 * timeout, the invocation fails with "Lambda failed by running into a timeout"
 * just before Lambda would kill it.
 */
export const runner: Runner<void, TimeoutEvent, void> = {
  eventSchema: TimeoutEvent,
  setup: async () => undefined,
  run: async (_shared, event, context) => {
    const timeoutMs = (event.timeout_secs ?? 60) * 1000
    await sleep(timeoutMs, undefined, { signal: context.signal })
  },
}
