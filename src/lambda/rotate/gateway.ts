import type { SecretContainer, SecretSchema } from './container'

export const CURRENT_STAGE = 'AWSCURRENT'
export const PENDING_STAGE = 'AWSPENDING'

export type VersionStage = typeof CURRENT_STAGE | typeof PENDING_STAGE

/** One version of a secret, as read from the store. */
export interface SecretRecord<T> {
  readonly arn: string
  readonly versionId: string
  readonly container: SecretContainer<T>
}

export interface PasswordOptions {
  excludePunctuation?: boolean
  length?: number
}

/**
 * Operations the rotation steps need from a versioned secret store. Version
 * stage labels are the only coordination the rotation relies on.
 */
export interface SecretStoreGateway {
  /**
   * Reads the version carrying `stage`. Rejects with SecretNotFoundError when
   * no version carries it, and with SecretStoreError for anything else.
   */
  fetch<T>(
    secretId: string,
    stage: VersionStage,
    schema: SecretSchema<T>,
  ): Promise<SecretRecord<T>>

  /** Random secret material. `"` is always excluded. */
  generatePassword(options?: PasswordOptions): Promise<string>

  /**
   * Stores a new version labelled AWSPENDING. The store deduplicates repeated
   * writes with the same request token.
   */
  writePending(secretId: string, requestToken: string, secretString: string): Promise<void>

  /** Moves AWSCURRENT from `currentVersionId` to `pendingVersionId` in one call. */
  promote(arn: string, currentVersionId: string, pendingVersionId: string): Promise<void>
}
