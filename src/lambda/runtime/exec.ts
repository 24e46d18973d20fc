import type { Context } from 'aws-lambda'
import type { ZodType, ZodTypeDef } from 'zod'
import { loadRuntimeConfig } from './config'
import { InvalidEventError } from './errors'
import { invoke } from './harness'
import { Logger } from './logger'
import type { Runner } from './runner'

export type LambdaHandler<Return> = (
  event: unknown,
  context: Context,
) => Promise<Return>

export interface HandlerOptions {
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv
  logger?: Logger
}

export function parseEvent<Event>(
  schema: ZodType<Event, ZodTypeDef, unknown>,
  raw: unknown,
): Event {
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new InvalidEventError(
      `Unable to parse lambda event: ${result.error.message}`,
      result.error.issues,
      { cause: result.error },
    )
  }
  return result.data
}

/**
 * Builds the function exported to the Node.js Lambda runtime.
 *
 * ```ts
 * export const handler = createHandler(new RotationRunner(new PostgresRotator()))
 * ```
 *
 * Configuration is read when the module loads, so a missing region fails the
 * init phase. `setup` runs on the first invocation and its result is kept for
 * every later invocation in the same execution environment. A failed
 * `setup` fails the invocation and runs again on the next one.
 */
export function createHandler<Shared, Event, Return>(
  runner: Runner<Shared, Event, Return>,
  options: HandlerOptions = {},
): LambdaHandler<Return> {
  const config = loadRuntimeConfig(options.env)
  const logger = options.logger ?? new Logger('lambda-runtime', config.logLevel)
  let shared: Promise<Shared> | undefined

  const start = async (): Promise<Shared> => {
    logger.info('Starting lambda runtime', { region: config.region })
    try {
      return await runner.setup()
    } catch (e) {
      logger.error('Lambda runtime setup failed', { region: config.region, error: e })
      throw e
    }
  }

  return async (rawEvent, context) => {
    const requestId = context.awsRequestId
    if (!shared) {
      // A failed setup is retried by the next invocation.
      shared = start().catch((e: unknown) => {
        shared = undefined
        throw e
      })
    }
    const state = await shared

    let event: Event
    try {
      event = parseEvent(runner.eventSchema, rawEvent)
    } catch (e) {
      logger.error('Lambda invocation failed', { requestId, event: rawEvent, error: e })
      throw e
    }

    return invoke(
      runner,
      state,
      {
        event,
        region: config.region,
        deadline: Date.now() + context.getRemainingTimeInMillis(),
        requestId,
      },
      logger,
    )
  }
}
