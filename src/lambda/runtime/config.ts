import { ConfigurationError } from './errors'
import { resolveLogLevel } from './logger'
import type { LogLevel } from './logger'

export interface RuntimeConfig {
  region: string
  logLevel: LogLevel
}

/**
 * Reads the settings the Lambda runtime provides through the environment.
 * AWS_REGION is always set inside Lambda; its absence means the handler is
 * being loaded somewhere it cannot build a store client.
 */
export function loadRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const region = env.AWS_REGION?.trim()
  if (!region) {
    throw new ConfigurationError('Missing AWS_REGION env variable')
  }

  return {
    region,
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  }
}
