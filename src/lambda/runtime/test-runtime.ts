import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import type { ZodType, ZodTypeDef } from 'zod'
import { ConfigurationError } from './errors'
import { invoke } from './harness'
import { Logger } from './logger'
import type { Runner } from './runner'

/**
 * A local replay document: the region to report to the runner and the events
 * to feed it, in order.
 */
export interface TestData<Event> {
  region: string
  invocations: Event[]
}

const TestDataSchema = z.object({
  region: z.string().min(1),
  invocations: z.array(z.unknown()),
})

export function parseTestData<Event>(
  eventSchema: ZodType<Event, ZodTypeDef, unknown>,
  document: string,
): TestData<Event> {
  let raw: unknown
  try {
    raw = JSON.parse(document)
  } catch (e) {
    throw new ConfigurationError('Unable to deserialize test data: not valid JSON', {
      cause: e,
    })
  }

  const result = TestDataSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(
      `Unable to deserialize test data: ${result.error.message}`,
      { cause: result.error },
    )
  }

  const invocations = result.data.invocations.map((entry, index) => {
    const event = eventSchema.safeParse(entry)
    if (!event.success) {
      throw new ConfigurationError(
        `Unable to deserialize test data: invocation ${index} is not a valid event: ${event.error.message}`,
        { cause: event.error },
      )
    }
    return event.data
  })

  return { region: result.data.region, invocations }
}

export interface ExecTestOptions {
  logger?: Logger
}

/**
 * Replays a test document through the same invocation path the Lambda
 * handler uses, without a deadline. Shared state is created once and reused
 * for every invocation, like a warm execution environment. Stops at the
 * first failing invocation.
 */
export async function execTest<Shared, Event, Return>(
  runner: Runner<Shared, Event, Return>,
  document: string,
  options: ExecTestOptions = {},
): Promise<Return[]> {
  const logger = options.logger ?? new Logger('lambda-test-runtime')
  const testData = parseTestData(runner.eventSchema, document)

  const shared = await runner.setup()
  logger.info('Starting lambda test runtime', {
    region: testData.region,
    invocations: testData.invocations.length,
  })

  const results: Return[] = []
  for (const [index, event] of testData.invocations.entries()) {
    logger.info(`Invocation: ${index}`)
    const result = await invoke(
      runner,
      shared,
      { event, region: testData.region, requestId: `local-${uuidv4()}` },
      logger,
    )
    results.push(result)
  }
  return results
}
