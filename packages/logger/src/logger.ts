import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): process cannot continue
 * - error (50): a request or a network failed
 * - warn (40): configuration smells, degraded behaviour
 * - info (30): lifecycle events (default)
 * - debug (20): per-request details
 * - trace (10): per-attempt details
 *
 * Environment:
 * - LOG_LEVEL: one of the levels above, or `silent`
 * - LOG_FORMAT: `pretty` (default) or `json`
 */

type LogLevel = pino.LevelWithSilent
type LogMethod = (message: string, data?: unknown) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
  isLevelEnabled: (level: pino.Level) => boolean
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LogLevel[]

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return LOG_LEVELS.find(level => level === normalized) ?? fallback
}

/**
 * Turns the optional second argument of a log call into pino merge fields.
 * Errors go under `err` so pino's serializer keeps the stack.
 */
export function toLogFields(data: unknown): Record<string, unknown> {
  if (data instanceof Error) {
    return { err: data }
  }

  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    return Object.fromEntries(Object.entries(data))
  }

  return { detail: data }
}

function createBaseLogger(): pino.Logger {
  const level = resolveLogLevel(process.env.LOG_LEVEL)
  const format = process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'pretty'

  if (level === 'silent' || format === 'json') {
    return pino({ level })
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
      }
    }
  })
}

const baseLogger = createBaseLogger()

const wrapLogger = (logger: pino.Logger): Logger => {
  const wrap =
    (level: pino.Level): LogMethod =>
    (message, data) => {
      if (data === undefined) {
        logger[level](message)
        return
      }

      logger[level](toLogFields(data), message)
    }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: bindings => wrapLogger(logger.child(bindings)),
    isLevelEnabled: level => logger.isLevelEnabled(level)
  }
}

/**
 * Process-wide logger.
 *
 * ```typescript
 * import { log } from '@workspace/logger'
 *
 * log.info('Networks ready')
 * log.warn('Proxy check failed', { network: 'google', proxy: 'socks5h://127.0.0.1:9050' })
 * log.error('Shutdown failed', error)
 * ```
 */
export const log = wrapLogger(baseLogger)

/**
 * Child logger whose lines carry a `context` field, e.g. `network:google`.
 */
export function createLogger(context: string): Logger {
  return wrapLogger(baseLogger.child({ context }))
}

export type { Logger, LogLevel, LogMethod }
