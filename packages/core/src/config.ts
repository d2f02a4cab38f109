import {
  consoleLogger,
  createLevelLogger,
  createPrefixedLogger,
  LOG_LEVELS,
  type EnsembleLogger,
  type LogThreshold
} from './logger.js'

/**
 * Environment-driven configuration.
 *
 * Supported environment variables:
 * - `ENSEMBLE_LOG_LEVEL`: `trace` | `debug` | `info` | `warn` | `error` | `fatal` | `silent`
 * - `NODE_ENV`: `test` makes `silent` the default level
 */

export function getEnv(key: string): string | undefined {
  return globalThis.process?.env?.[key]
}

function isLogThreshold(value: string | undefined): value is LogThreshold {
  return value === 'silent' || LOG_LEVELS.some(level => level === value)
}

/**
 * Resolve the log threshold from the environment.
 *
 * @example
 * ```typescript
 * // ENSEMBLE_LOG_LEVEL=debug
 * getLogLevel() // 'debug'
 *
 * // nothing set, NODE_ENV=production
 * getLogLevel() // 'warn'
 * ```
 */
export function getLogLevel(): LogThreshold {
  const configured = getEnv('ENSEMBLE_LOG_LEVEL')?.trim().toLowerCase()
  if (isLogThreshold(configured)) {
    return configured
  }
  return getEnv('NODE_ENV') === 'test' ? 'silent' : 'warn'
}

/**
 * Prefixed console logger whose threshold follows `ENSEMBLE_LOG_LEVEL`.
 * The variable is re-read on every call, so changing it at runtime takes effect.
 */
export function createEnvLogger(
  prefix: string,
  baseLogger: EnsembleLogger = consoleLogger
): EnsembleLogger {
  return createPrefixedLogger(prefix, createLevelLogger(getLogLevel, baseLogger))
}
