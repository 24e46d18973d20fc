import { z } from 'zod'
import type { Runner } from '../../src/lambda'

interface InvocationCounter {
  count: number
}

/** Returns how many invocations this execution environment has served. */
export const runner: Runner<InvocationCounter, unknown, number> = {
  eventSchema: z.unknown(),
  setup: async () => ({ count: 0 }),
  run: async (shared) => {
    shared.count += 1
    return shared.count
  },
}
