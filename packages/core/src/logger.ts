/**
 * Logging interface shared by all Vaultline packages.
 *
 * Levels, least to most severe: `trace`, `debug`, `info`, `warn`, `error`, `fatal`.
 * Any logging library (pino, winston, bunyan) can sit behind it.
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import type { VaultlineLogger } from '@vaultline/core'
 *
 * const base = pino()
 * const logger: VaultlineLogger = {
 *   trace: (msg, ...args) => base.trace({ args }, msg),
 *   debug: (msg, ...args) => base.debug({ args }, msg),
 *   info: (msg, ...args) => base.info({ args }, msg),
 *   warn: (msg, ...args) => base.warn({ args }, msg),
 *   error: (msg, ...args) => base.error({ args }, msg),
 *   fatal: (msg, ...args) => base.fatal({ args }, msg)
 * }
 *
 * const rule = new EncryptRule(config, { algorithmFactory, logger })
 * ```
 */
export interface VaultlineLogger {
  trace(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  fatal(message: string, ...args: unknown[]): void
}

/**
 * Console-backed logger. Every message is prefixed with `[vaultline:<level>]`.
 *
 * `trace` and `debug` go to `console.debug`; `fatal` goes to `console.error`
 * with a `FATAL:` marker.
 */
export const consoleLogger: VaultlineLogger = {
  trace: (msg, ...args) => console.debug(`[vaultline:trace] ${msg}`, ...args),
  debug: (msg, ...args) => console.debug(`[vaultline:debug] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[vaultline:info] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[vaultline:warn] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[vaultline:error] ${msg}`, ...args),
  fatal: (msg, ...args) => console.error(`[vaultline:fatal] FATAL: ${msg}`, ...args)
}

/**
 * Logger that discards everything. Default for every Vaultline component.
 */
export const silentLogger: VaultlineLogger = {
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
 * Create a logger that prefixes every message with `[prefix]`.
 *
 * @example
 * ```typescript
 * const logger = createPrefixedLogger('encrypt')
 * logger.info('Registered table', { table: 't_user' })
 * // Output: [vaultline:info] [encrypt] Registered table { table: 't_user' }
 * ```
 */
export function createPrefixedLogger(
  prefix: string,
  baseLogger: VaultlineLogger = consoleLogger
): VaultlineLogger {
  return {
    trace: (msg, ...args) => baseLogger.trace(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => baseLogger.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => baseLogger.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => baseLogger.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => baseLogger.error(`[${prefix}] ${msg}`, ...args),
    fatal: (msg, ...args) => baseLogger.fatal(`[${prefix}] ${msg}`, ...args)
  }
}
