import { z } from 'zod';
import type { Runner } from '../../src/lambda';

const Attributes = z.record(z.unknown());

export const runner: Runner<void, Record<string, unknown>, { data: string }> = {
  eventSchema: Attributes,
  setup: async () => undefined,
  run: async (_shared, event) => ({
    data: typeof event.test === 'string' ? event.test : 'none',
  }),
};
