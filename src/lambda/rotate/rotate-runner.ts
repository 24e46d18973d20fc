import { SecretNotFoundError } from '../runtime/errors'
import { Logger } from '../runtime/logger'
import type { InvocationContext, Runner } from '../runtime/runner'
import { serializeSecretContainer } from './container'
import type { SecretContainer, SecretSchema } from './container'
import { RotationEventSchema } from './event'
import type { RotationEvent } from './event'
import { CURRENT_STAGE, PENDING_STAGE } from './gateway'
import type { SecretRecord, SecretStoreGateway } from './gateway'
import { SecretsManagerGateway } from './secrets-manager-gateway'

/**
 * The service-specific part of a Secrets Manager rotation function.
 *
 * ```ts
 * const DatabaseSecret = z.object({ username: z.string(), password: z.string() })
 *
 * class DatabaseRotator implements RotateRunner<void, z.infer<typeof DatabaseSecret>> {
 *   readonly secretSchema = DatabaseSecret
 *   async setup() {}
 *   async create(_shared, current, store) {
 *     return updateSecret(current, { password: await store.generatePassword() })
 *   }
 *   async set(_shared, current, pending) { ... }
 *   async test(_shared, pending) { ... }
 * }
 *
 * export const handler = createHandler(new RotationRunner(new DatabaseRotator()))
 * ```
 */
export interface RotateRunner<Shared, Secret> {
  readonly secretSchema: SecretSchema<Secret>

  /** See {@link Runner.setup}. */
  setup(): Promise<Shared>

  /**
   * Builds the next secret from the current one without applying it anywhere.
   * Only called when there is no pending version yet.
   */
  create(
    shared: Shared,
    current: SecretContainer<Secret>,
    store: SecretStoreGateway,
    context: InvocationContext,
  ): Promise<SecretContainer<Secret>>

  /**
   * Applies the pending secret in the target service, authenticating with the
   * current one. Skipped when `test` already accepts the pending secret: after
   * a failure in a later step every step runs again, and by then the current
   * credentials no longer work.
   */
  set(
    shared: Shared,
    current: SecretContainer<Secret>,
    pending: SecretContainer<Secret>,
    context: InvocationContext,
  ): Promise<void>

  /** Rejects unless the target service accepts the given secret. */
  test(
    shared: Shared,
    pending: SecretContainer<Secret>,
    context: InvocationContext,
  ): Promise<void>

  /** Runs before the pending version is promoted. */
  finish?(
    shared: Shared,
    current: SecretContainer<Secret>,
    pending: SecretContainer<Secret>,
    context: InvocationContext,
  ): Promise<void>
}

export type GatewayFactory = (region: string) => SecretStoreGateway

export interface RotationRunnerOptions {
  /** Defaults to a SecretsManagerGateway for the invocation's region. */
  gateway?: GatewayFactory
  logger?: Logger
}

/**
 * Adapts a {@link RotateRunner} to the generic {@link Runner} contract by
 * dispatching on the rotation step. All rotation state lives in the store's
 * version stages, so each step can be re-run after a partial failure.
 */
export class RotationRunner<Shared, Secret>
implements Runner<Shared, RotationEvent, void> {
  readonly eventSchema = RotationEventSchema

  private readonly rotator: RotateRunner<Shared, Secret>
  private readonly createGateway: GatewayFactory
  private readonly gateways = new Map<string, SecretStoreGateway>()
  private readonly logger: Logger

  constructor(
    rotator: RotateRunner<Shared, Secret>,
    options: RotationRunnerOptions = {},
  ) {
    this.rotator = rotator
    this.logger = options.logger ?? new Logger('secret-rotation')
    const logger = this.logger
    this.createGateway =
      options.gateway ??
      ((region) => new SecretsManagerGateway({ region, logger }))
  }

  setup(): Promise<Shared> {
    return this.rotator.setup()
  }

  async run(
    shared: Shared,
    event: RotationEvent,
    context: InvocationContext,
  ): Promise<void> {
    const store = this.gatewayFor(context.region)
    this.logger.info(`Rotation step: ${event.step}`, { secretId: event.secretId })

    switch (event.step) {
      case 'create':
        return this.createSecret(shared, event, store, context)
      case 'set':
        return this.setSecret(shared, event, store, context)
      case 'test':
        return this.testSecret(shared, event, store, context)
      case 'finish':
        return this.finishSecret(shared, event, store, context)
    }
  }

  private gatewayFor(region: string): SecretStoreGateway {
    let gateway = this.gateways.get(region)
    if (!gateway) {
      gateway = this.createGateway(region)
      this.gateways.set(region, gateway)
    }
    return gateway
  }

  private async fetchCurrent(
    store: SecretStoreGateway,
    secretId: string,
  ): Promise<SecretRecord<Secret>> {
    return store.fetch(secretId, CURRENT_STAGE, this.rotator.secretSchema)
  }

  private async fetchPending(
    store: SecretStoreGateway,
    secretId: string,
  ): Promise<SecretRecord<Secret>> {
    return store.fetch(secretId, PENDING_STAGE, this.rotator.secretSchema)
  }

  private async createSecret(
    shared: Shared,
    event: RotationEvent,
    store: SecretStoreGateway,
    context: InvocationContext,
  ): Promise<void> {
    const current = await this.fetchCurrent(store, event.secretId)

    let pending: SecretRecord<Secret> | undefined
    try {
      pending = await this.fetchPending(store, event.secretId)
    } catch (e) {
      if (!(e instanceof SecretNotFoundError)) {
        throw e
      }
      pending = undefined
    }

    // AWSPENDING stays on a version after it has been promoted, so a pending
    // label on the current version belongs to a finished rotation.
    if (pending && pending.versionId !== current.versionId) {
      this.logger.info('Found existing pending value.', {
        secretId: event.secretId,
        versionId: pending.versionId,
      })
      return
    }

    this.logger.info('Creating new secret value.', { secretId: event.secretId })
    const next = await this.rotator.create(shared, current.container, store, context)
    await store.writePending(
      event.secretId,
      event.clientRequestToken,
      serializeSecretContainer(next),
    )
  }

  private async setSecret(
    shared: Shared,
    event: RotationEvent,
    store: SecretStoreGateway,
    context: InvocationContext,
  ): Promise<void> {
    const pending = await this.fetchPending(store, event.secretId)

    if (await this.accepts(shared, pending, context)) {
      this.logger.info('Secret already set in remote system.', {
        secretId: event.secretId,
      })
      return
    }

    this.logger.info('Setting secret on remote system.', { secretId: event.secretId })
    const current = await this.fetchCurrent(store, event.secretId)
    await this.rotator.set(shared, current.container, pending.container, context)
  }

  /** Probe used by the set step; a failing test means "not applied yet". */
  private async accepts(
    shared: Shared,
    pending: SecretRecord<Secret>,
    context: InvocationContext,
  ): Promise<boolean> {
    try {
      await this.rotator.test(shared, pending.container, context)
      return true
    } catch (e) {
      this.logger.info('Pending secret not accepted yet.', {
        versionId: pending.versionId,
        error: e,
      })
      return false
    }
  }

  private async testSecret(
    shared: Shared,
    event: RotationEvent,
    store: SecretStoreGateway,
    context: InvocationContext,
  ): Promise<void> {
    this.logger.info('Testing secret on remote system.', { secretId: event.secretId })
    const pending = await this.fetchPending(store, event.secretId)
    await this.rotator.test(shared, pending.container, context)
  }

  private async finishSecret(
    shared: Shared,
    event: RotationEvent,
    store: SecretStoreGateway,
    context: InvocationContext,
  ): Promise<void> {
    const current = await this.fetchCurrent(store, event.secretId)
    const pending = await this.fetchPending(store, event.secretId)

    if (current.versionId === pending.versionId) {
      this.logger.info('Pending version is already current.', {
        secretId: event.secretId,
        versionId: current.versionId,
      })
      return
    }

    this.logger.info('Finishing secret deployment.', { secretId: event.secretId })
    if (this.rotator.finish) {
      await this.rotator.finish(shared, current.container, pending.container, context)
    }
    await store.promote(current.arn, current.versionId, pending.versionId)
  }
}
