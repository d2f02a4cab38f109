/**
 * Logging interface used across the Ensemble packages.
 *
 * Any logging library (pino, winston, ...) can stand behind it; the packages
 * only ever talk to this shape.
 *
 * **Log levels (from least to most severe):**
 * - `trace`: compiled SQL, forwarding details
 * - `debug`: skipped saves and other expected outcomes worth seeing while developing
 * - `info`: general progress
 * - `warn`: a sub-model refused to persist, a constraint was violated
 * - `error`: failures that do not stop the process
 * - `fatal`: failures that do
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import type { EnsembleLogger } from '@ensemble/core'
 *
 * const base = pino()
 * const logger: EnsembleLogger = {
 *   trace: (msg, ...args) => base.trace({ args }, msg),
 *   debug: (msg, ...args) => base.debug({ args }, msg),
 *   info: (msg, ...args) => base.info({ args }, msg),
 *   warn: (msg, ...args) => base.warn({ args }, msg),
 *   error: (msg, ...args) => base.error({ args }, msg),
 *   fatal: (msg, ...args) => base.fatal({ args }, msg)
 * }
 * ```
 */
export interface EnsembleLogger {
  trace(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  fatal(message: string, ...args: unknown[]): void
}

export type LogLevel = keyof EnsembleLogger

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal']

/**
 * Console logger. Every message is prefixed with `[ensemble:<level>]`.
 *
 * @example
 * ```typescript
 * consoleLogger.warn('Sub-model refused to save', { index: 1 })
 * // Output: [ensemble:warn] Sub-model refused to save { index: 1 }
 * ```
 */
export const consoleLogger: EnsembleLogger = {
  trace: (msg, ...args) => console.debug(`[ensemble:trace] ${msg}`, ...args),
  debug: (msg, ...args) => console.debug(`[ensemble:debug] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[ensemble:info] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[ensemble:warn] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ensemble:error] ${msg}`, ...args),
  fatal: (msg, ...args) => console.error(`[ensemble:fatal] FATAL: ${msg}`, ...args)
}

/**
 * Logger that discards everything.
 */
export const silentLogger: EnsembleLogger = {
  trace: () => {
    /* intentionally empty */
  },
  debug: () => {
    /* intentionally empty */
  },
  info: () => {
    /* intentionally empty */
  },
  warn: () => {
    /* intentionally empty */
  },
  error: () => {
    /* intentionally empty */
  },
  fatal: () => {
    /* intentionally empty */
  }
}

/**
 * Create a logger that adds `[prefix]` in front of every message.
 *
 * @example
 * ```typescript
 * const logger = createPrefixedLogger('conductor')
 * logger.debug('save skipped')
 * // Output: [ensemble:debug] [conductor] save skipped
 * ```
 */
export function createPrefixedLogger(
  prefix: string,
  baseLogger: EnsembleLogger = consoleLogger
): EnsembleLogger {
  return {
    trace: (msg, ...args) => baseLogger.trace(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => baseLogger.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => baseLogger.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => baseLogger.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => baseLogger.error(`[${prefix}] ${msg}`, ...args),
    fatal: (msg, ...args) => baseLogger.fatal(`[${prefix}] ${msg}`, ...args)
  }
}

/**
 * Threshold for {@link createLevelLogger}. `silent` drops everything.
 */
export type LogThreshold = LogLevel | 'silent'

function levelRank(level: LogThreshold): number {
  return level === 'silent' ? LOG_LEVELS.length : LOG_LEVELS.indexOf(level)
}

/**
 * Create a logger that forwards only messages at or above `threshold`.
 *
 * `threshold` may be a function, in which case it is evaluated on every call.
 */
export function createLevelLogger(
  threshold: LogThreshold | (() => LogThreshold),
  baseLogger: EnsembleLogger = consoleLogger
): EnsembleLogger {
  const enabled = (level: LogLevel): boolean => {
    const current = typeof threshold === 'function' ? threshold() : threshold
    return levelRank(level) >= levelRank(current)
  }

  return {
    trace: (msg, ...args) => {
      if (enabled('trace')) baseLogger.trace(msg, ...args)
    },
    debug: (msg, ...args) => {
      if (enabled('debug')) baseLogger.debug(msg, ...args)
    },
    info: (msg, ...args) => {
      if (enabled('info')) baseLogger.info(msg, ...args)
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) baseLogger.warn(msg, ...args)
    },
    error: (msg, ...args) => {
      if (enabled('error')) baseLogger.error(msg, ...args)
    },
    fatal: (msg, ...args) => {
      if (enabled('fatal')) baseLogger.fatal(msg, ...args)
    }
  }
}
