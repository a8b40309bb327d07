/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { consoleLogger, silentLogger, createPrefixedLogger, type VaultlineLogger } from '../src/logger.js'

function createRecordingLogger(): VaultlineLogger & { calls: [string, string, unknown[]][] } {
  const calls: [string, string, unknown[]][] = []
  const record =
    (level: string) =>
    (message: string, ...args: unknown[]): void => {
      calls.push([level, message, args])
    }
  return {
    calls,
    trace: record('trace'),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    fatal: record('fatal')
  }
}

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should prefix messages with the level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)

    consoleLogger.info('Registered table', { columns: 2 })
    consoleLogger.warn('Deprecated shape')

    expect(info).toHaveBeenCalledWith('[vaultline:info] Registered table', { columns: 2 })
    expect(warn).toHaveBeenCalledWith('[vaultline:warn] Deprecated shape')
  })

  it('should route trace and debug to console.debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)

    consoleLogger.trace('one')
    consoleLogger.debug('two')

    expect(debug.mock.calls).toEqual([['[vaultline:trace] one'], ['[vaultline:debug] two']])
  })

  it('should mark fatal messages', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)

    consoleLogger.error('failed')
    consoleLogger.fatal('gone')

    expect(error.mock.calls).toEqual([['[vaultline:error] failed'], ['[vaultline:fatal] FATAL: gone']])
  })
})

describe('silentLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should write nothing', () => {
    const spies = [
      vi.spyOn(console, 'debug'),
      vi.spyOn(console, 'info'),
      vi.spyOn(console, 'warn'),
      vi.spyOn(console, 'error')
    ]

    silentLogger.trace('a')
    silentLogger.debug('b')
    silentLogger.info('c')
    silentLogger.warn('d')
    silentLogger.error('e')
    silentLogger.fatal('f')

    for (const spy of spies) {
      expect(spy).not.toHaveBeenCalled()
    }
  })
})

describe('createPrefixedLogger', () => {
  it('should prefix every level and forward arguments', () => {
    const base = createRecordingLogger()
    const logger = createPrefixedLogger('encrypt', base)

    logger.trace('t')
    logger.debug('d', 1)
    logger.info('i', { table: 't_user' })
    logger.warn('w')
    logger.error('e')
    logger.fatal('f')

    expect(base.calls).toEqual([
      ['trace', '[encrypt] t', []],
      ['debug', '[encrypt] d', [1]],
      ['info', '[encrypt] i', [{ table: 't_user' }]],
      ['warn', '[encrypt] w', []],
      ['error', '[encrypt] e', []],
      ['fatal', '[encrypt] f', []]
    ])
  })

  it('should nest prefixes', () => {
    const base = createRecordingLogger()
    const logger = createPrefixedLogger('plugin', createPrefixedLogger('encrypt', base))

    logger.info('ready')

    expect(base.calls).toEqual([['info', '[encrypt] [plugin] ready', []]])
  })
})
