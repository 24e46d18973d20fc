import { z } from 'zod'
import type { Runner } from '../../src/lambda'

const AttributesEvent = z.record(z.unknown())

type AttributesEvent = z.infer<typeof AttributesEvent>

interface PreviousValue {
  value: string | undefined
}

export interface MatchResult {
  matches_prev: boolean
}

/**
 * Compares the `test` attribute of each event with the one seen by the
 * previous invocation in the same execution environment.
 */
export const runner: Runner<PreviousValue, AttributesEvent, MatchResult> = {
  eventSchema: AttributesEvent,
  setup: async () => ({ value: undefined }),
  run: async (shared, event) => {
    const attribute = event.test
    const value = typeof attribute === 'string' ? attribute : undefined
    const matches = value === shared.value
    shared.value = value
    return { matches_prev: matches }
  },
}
