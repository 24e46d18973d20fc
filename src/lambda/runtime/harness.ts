import { sleepUntilDeadline } from './deadline'
import { InvocationTimeoutError } from './errors'
import { Logger } from './logger'
import type { InvocationContext, Runner } from './runner'

export interface InvocationRequest<Event> {
  event: Event
  region: string
  /** Absolute deadline in epoch milliseconds. Omit to wait for the work unconditionally. */
  deadline?: number
  requestId?: string
}

const defaultLogger = new Logger('lambda-runtime')

/**
 * Runs one invocation. With a deadline, the work races a watcher that fails
 * the invocation shortly before the deadline; the losing side
 * is abandoned, not cancelled.
 */
export async function invoke<Shared, Event, Return>(
  runner: Runner<Shared, Event, Return>,
  shared: Shared,
  request: InvocationRequest<Event>,
  logger: Logger = defaultLogger,
): Promise<Return> {
  const { event, region, deadline, requestId } = request
  logger.info('Received lambda invocation', { requestId, event })

  const abandon = new AbortController()
  const context: InvocationContext = {
    region,
    deadline,
    requestId,
    signal: abandon.signal,
  }
  const work = Promise.resolve().then(() => runner.run(shared, event, context))

  try {
    const result =
      deadline === undefined
        ? await work
        : await raceDeadline(work, deadline, abandon)
    logger.info('Completed lambda invocation', { requestId, result })
    return result
  } catch (e) {
    if (e instanceof InvocationTimeoutError) {
      logger.error('Lambda invocation timed out', { requestId, deadline, error: e })
    } else {
      logger.error('Lambda invocation failed', { requestId, error: e })
    }
    throw e
  }
}

async function raceDeadline<Return>(
  work: Promise<Return>,
  deadline: number,
  abandon: AbortController,
): Promise<Return> {
  const watcher = new AbortController()
  const timeout = sleepUntilDeadline(deadline, { signal: watcher.signal }).then(
    (): never => {
      throw new InvocationTimeoutError(deadline)
    },
  )

  try {
    return await Promise.race([work, timeout])
  } catch (e) {
    if (e instanceof InvocationTimeoutError) {
      abandon.abort(e)
    }
    throw e
  } finally {
    // Clears the pending timer; the rejection it causes is already observed by race().
    watcher.abort()
  }
}
