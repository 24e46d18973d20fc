import type { ZodType, ZodTypeDef } from 'zod'

/**
 * Per-invocation data handed to a runner.
 */
export interface InvocationContext {
  /** Region the function runs in, used to build AWS clients. */
  readonly region: string
  /** Absolute deadline in epoch milliseconds. Absent in local test runs. */
  readonly deadline?: number
  readonly requestId?: string
  /**
   * Aborted when the harness stops waiting for this invocation (timeout).
   * Work that keeps running afterwards is not killed, and calls it already
   * started may still complete on the remote side.
   */
  readonly signal: AbortSignal
}

/**
 * The work a Lambda function runs.
 *
 * `setup` is called once per execution environment, before the first
 * invocation. Its result is the shared state passed to every `run` in that
 * environment. Lambda may or may not reuse an environment, so shared state is
 * a cache, never something correctness can depend on. Lambda never runs two
 * invocations at once in one environment, so plain mutation of shared state
 * needs no locking unless `run` itself fans out.
 */
export interface Runner<Shared, Event, Return> {
  readonly eventSchema: ZodType<Event, ZodTypeDef, unknown>
  setup(): Promise<Shared>
  run(shared: Shared, event: Event, context: InvocationContext): Promise<Return>
}
