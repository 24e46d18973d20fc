import type { ZodIssue } from 'zod'

/**
 * Raised before any invocation runs when the process environment or a local
 * test document cannot be used.
 */
export class ConfigurationError extends Error {
  readonly name: string = 'ConfigurationError'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

/**
 * The inbound event does not match the runner's event schema. An unknown
 * rotation step ends up here rather than in a runtime branch.
 */
export class InvalidEventError extends Error {
  readonly name: string = 'InvalidEventError'

  constructor(
    message: string,
    readonly issues: ZodIssue[],
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/**
 * Synthetic failure produced when the deadline watcher wins the race, so a
 * timeout is reported through the function's error path instead of a silent kill.
 */
export class InvocationTimeoutError extends Error {
  readonly name: string = 'InvocationTimeoutError'

  constructor(readonly deadline: number) {
    super('Lambda failed by running into a timeout')
  }
}

/**
 * A secret store call failed permanently (or ran out of throttle retries).
 * Carries the store operation and secret id for diagnosis.
 */
export class SecretStoreError extends Error {
  readonly name: string = 'SecretStoreError'

  constructor(
    readonly operation: string,
    readonly secretId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** No version of the secret carries the requested stage label. */
export class SecretNotFoundError extends SecretStoreError {
  readonly name: string = 'SecretNotFoundError'
}
