export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogMeta = Record<string, unknown>

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return normalized && isLogLevel(normalized) ? normalized : 'info'
}

/**
 * Render an Error as a plain object for JSON output.
 */
export function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
  }
  for (const [key, value] of Object.entries(error)) {
    serialized[key] = value
  }
  if (error.cause !== undefined) {
    serialized.cause =
      error.cause instanceof Error ? serializeError(error.cause) : error.cause
  }
  return serialized
}

function replacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? serializeError(value) : value
}

/** JSON for `meta`, or a placeholder when it holds a BigInt or a cycle. */
function stringifyMeta(meta: LogMeta): string {
  try {
    return JSON.stringify(meta, replacer)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    return `[unserializable metadata: ${reason}]`
  }
}

export class Logger {
  private readonly serviceName: string
  private readonly level: LogLevel

  constructor(serviceName: string, level?: LogLevel) {
    this.serviceName = serviceName
    this.level = level ?? resolveLogLevel(process.env.LOG_LEVEL)
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString()
    const metaStr = meta ? ` ${stringifyMeta(meta)}` : ''
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('debug')) {
      console.log(this.formatMessage('debug', message, meta))
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('info')) {
      console.log(this.formatMessage('info', message, meta))
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, meta))
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled('error')) {
      console.error(this.formatMessage('error', message, meta))
    }
  }
}
