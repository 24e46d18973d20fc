import {
  SecretsManagerClient,
  GetRandomPasswordCommand,
  GetSecretValueCommand,
  ListSecretVersionIdsCommand,
  PutSecretValueCommand,
  ResourceNotFoundException,
  UpdateSecretVersionStageCommand,
} from '@aws-sdk/client-secrets-manager'
import type { SecretsManagerClientConfig } from '@aws-sdk/client-secrets-manager'
import { SecretNotFoundError, SecretStoreError } from '../runtime/errors'
import type { Logger } from '../runtime/logger'
import { parseSecretContainer } from './container'
import type { SecretSchema } from './container'
import { CURRENT_STAGE, PENDING_STAGE } from './gateway'
import type {
  PasswordOptions,
  SecretRecord,
  SecretStoreGateway,
  VersionStage,
} from './gateway'
import { withThrottleRetry } from './throttle'
import type { ThrottleRetryOptions } from './throttle'

export interface SecretsManagerGatewayOptions {
  region?: string
  /**
   * Settings for the client the gateway builds, e.g. credentials or an
   * endpoint. Its retries are always disabled; `retry` applies instead.
   */
  clientConfig?: Omit<SecretsManagerClientConfig, 'region' | 'maxAttempts' | 'retryStrategy'>
  /** Pre-built client, used as is. */
  client?: SecretsManagerClient
  retry?: ThrottleRetryOptions
  logger?: Logger
}

export interface SecretVersionStages {
  versionId: string
  stages: string[]
  createdAt?: Date
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/**
 * SecretStoreGateway backed by AWS Secrets Manager.
 */
export class SecretsManagerGateway implements SecretStoreGateway {
  private readonly client: SecretsManagerClient
  private readonly retry: ThrottleRetryOptions
  private readonly logger?: Logger

  constructor(options: SecretsManagerGatewayOptions = {}) {
    this.client =
      options.client ??
      new SecretsManagerClient({
        ...options.clientConfig,
        region: options.region,
        maxAttempts: 1,
      })
    this.retry = options.retry ?? {}
    this.logger = options.logger
  }

  private async send<T>(
    operation: string,
    secretId: string,
    failure: string,
    request: () => Promise<T>,
  ): Promise<T> {
    try {
      return await withThrottleRetry(request, this.retry, this.logger)
    } catch (e) {
      if (e instanceof ResourceNotFoundException) {
        throw new SecretNotFoundError(operation, secretId, `${failure}: ${e.message}`, {
          cause: e,
        })
      }
      throw new SecretStoreError(operation, secretId, `${failure}: ${errorMessage(e)}`, {
        cause: e,
      })
    }
  }

  async fetch<T>(
    secretId: string,
    stage: VersionStage,
    schema: SecretSchema<T>,
  ): Promise<SecretRecord<T>> {
    const operation = 'GetSecretValue'
    const result = await this.send(
      operation,
      secretId,
      `Unable to fetch ${stage} value of secret ${secretId}`,
      () =>
        this.client.send(
          new GetSecretValueCommand({ SecretId: secretId, VersionStage: stage }),
        ),
    )

    if (!result.ARN) {
      throw new SecretStoreError(operation, secretId, `ARN is unavailable for secret ${secretId}`)
    }
    if (!result.VersionId) {
      throw new SecretStoreError(
        operation,
        secretId,
        `VersionId is unavailable for secret ${secretId}`,
      )
    }

    let payload: string
    if (result.SecretString !== undefined) {
      payload = result.SecretString
    } else if (result.SecretBinary !== undefined) {
      payload = new TextDecoder().decode(result.SecretBinary)
    } else {
      throw new SecretStoreError(
        operation,
        secretId,
        `Neither SecretString nor SecretBinary is set for secret ${secretId}`,
      )
    }

    try {
      return {
        arn: result.ARN,
        versionId: result.VersionId,
        container: parseSecretContainer(schema, payload),
      }
    } catch (e) {
      throw new SecretStoreError(
        operation,
        secretId,
        `Unable to parse ${stage} value of secret ${secretId}: ${errorMessage(e)}`,
        { cause: e },
      )
    }
  }

  async generatePassword(options: PasswordOptions = {}): Promise<string> {
    const operation = 'GetRandomPassword'
    const result = await this.send(operation, '', 'Unable to generate new password', () =>
      this.client.send(
        new GetRandomPasswordCommand({
          ExcludeCharacters: '"',
          ExcludePunctuation: options.excludePunctuation ?? false,
          PasswordLength: options.length,
        }),
      ),
    )
    if (!result.RandomPassword) {
      throw new SecretStoreError(operation, '', 'Generated password is empty')
    }
    return result.RandomPassword
  }

  async writePending(
    secretId: string,
    requestToken: string,
    secretString: string,
  ): Promise<void> {
    await this.send(
      'PutSecretValue',
      secretId,
      `Unable to store ${PENDING_STAGE} value of secret ${secretId}`,
      () =>
        this.client.send(
          new PutSecretValueCommand({
            SecretId: secretId,
            ClientRequestToken: requestToken,
            SecretString: secretString,
            VersionStages: [PENDING_STAGE],
          }),
        ),
    )
  }

  async promote(
    arn: string,
    currentVersionId: string,
    pendingVersionId: string,
  ): Promise<void> {
    await this.send(
      'UpdateSecretVersionStage',
      arn,
      `Unable to move ${CURRENT_STAGE} to version ${pendingVersionId} of secret ${arn}`,
      () =>
        this.client.send(
          new UpdateSecretVersionStageCommand({
            SecretId: arn,
            VersionStage: CURRENT_STAGE,
            MoveToVersionId: pendingVersionId,
            RemoveFromVersionId: currentVersionId,
          }),
        ),
    )
  }

  /** Lists the secret's versions with the stage labels each one carries. */
  async describeVersions(secretId: string): Promise<SecretVersionStages[]> {
    const versions: SecretVersionStages[] = []
    let nextToken: string | undefined

    do {
      const token = nextToken
      const result = await this.send(
        'ListSecretVersionIds',
        secretId,
        `Unable to list versions of secret ${secretId}`,
        () =>
          this.client.send(
            new ListSecretVersionIdsCommand({ SecretId: secretId, NextToken: token }),
          ),
      )

      for (const version of result.Versions ?? []) {
        if (!version.VersionId) continue
        versions.push({
          versionId: version.VersionId,
          stages: version.VersionStages ?? [],
          createdAt: version.CreatedDate,
        })
      }

      nextToken = result.NextToken
    } while (nextToken)

    return versions
  }
}
