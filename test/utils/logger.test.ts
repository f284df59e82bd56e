import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createLogger, setLogDefaults, type LogLevel, type LogOutput } from '../../src/utils/logger.js'
import { AuthError } from '../../src/errors/index.js'

describe('Logger', () => {
  let output: LogOutput
  let lines: { level: LogLevel; message: string }[]

  beforeEach(() => {
    lines = []
    output = {
      debug: vi.fn((msg: string) => lines.push({ level: 'debug', message: msg })),
      info: vi.fn((msg: string) => lines.push({ level: 'info', message: msg })),
      warn: vi.fn((msg: string) => lines.push({ level: 'warn', message: msg })),
      error: vi.fn((msg: string) => lines.push({ level: 'error', message: msg })),
    }
  })

  afterEach(() => {
    setLogDefaults({ level: 'info', format: 'text' })
  })

  describe('levels', () => {
    it('should drop messages below the configured level', () => {
      const logger = createLogger({ level: 'warn', output, timestamp: false })

      logger.debug('d')
      logger.info('i')
      logger.warn('w')
      logger.error('e')

      expect(lines.map((line) => line.level)).toEqual(['warn', 'error'])
    })

    it('should follow process defaults when no level is set', () => {
      const logger = createLogger({ output, timestamp: false })

      logger.debug('hidden')
      setLogDefaults({ level: 'debug' })
      logger.debug('shown')

      expect(lines).toEqual([{ level: 'debug', message: 'DEBUG: shown' }])
    })

    it('should allow changing the level at runtime', () => {
      const logger = createLogger({ level: 'error', output, timestamp: false })

      logger.info('before')
      logger.setLevel('info')
      logger.info('after')

      expect(lines).toEqual([{ level: 'info', message: 'INFO: after' }])
    })
  })

  describe('text format', () => {
    it('should render service, level, message and context', () => {
      const logger = createLogger({ output, timestamp: false, service: 'auth' })

      logger.info('token issued', { user: 'test-user' })

      expect(lines[0].message).toBe('[auth] INFO: token issued {"user":"test-user"}')
    })

    it('should render error name and code', () => {
      const logger = createLogger({ output, timestamp: false })

      logger.error('setup failed', new AuthError('authentication-failed', 'rejected'))

      expect(lines[0].message).toBe('ERROR: setup failed (AuthError [auth/authentication-failed]: rejected)')
    })

    it('should prefix an ISO timestamp by default', () => {
      const logger = createLogger({ output })

      logger.info('hello')

      expect(lines[0].message).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO: hello$/)
    })
  })

  describe('json format', () => {
    it('should emit one JSON entry per line', () => {
      const logger = createLogger({ output, format: 'json', timestamp: false, service: 'objectstorage' })

      logger.warn('cleanup failed', { container: 'qe_container_a' }, new Error('gone'))

      expect(JSON.parse(lines[0].message)).toEqual({
        level: 'warn',
        message: 'cleanup failed',
        service: 'objectstorage',
        context: { container: 'qe_container_a' },
        error: { name: 'Error', message: 'gone' },
      })
    })
  })

  describe('child loggers', () => {
    it('should merge parent and child context', () => {
      const parent = createLogger({ output, format: 'json', timestamp: false, context: { suite: 'images' } })
      const child = parent.child({ test: 'update' })

      child.info('running', { step: 2 })

      expect(JSON.parse(lines[0].message).context).toEqual({ suite: 'images', test: 'update', step: 2 })
    })
  })
})
