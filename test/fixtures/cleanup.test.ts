import { describe, it, expect, vi } from 'vitest'
import { CleanupRegistry } from '../../src/fixtures/cleanup.js'
import { createLogger, type LogOutput } from '../../src/utils/logger.js'

function recordingLogger() {
  const warnings: string[] = []
  const output: LogOutput = {
    debug: () => {},
    info: () => {},
    warn: (message) => warnings.push(message),
    error: () => {},
  }
  return { warnings, logger: createLogger({ output, timestamp: false }) }
}

describe('CleanupRegistry', () => {
  it('should run cleanups last-in first-out', async () => {
    const order: string[] = []
    const registry = new CleanupRegistry()
    registry.add('first', () => {
      order.push('first')
    })
    registry.add('second', async () => {
      order.push('second')
    })

    await registry.run()

    expect(order).toEqual(['second', 'first'])
  })

  it('should keep going after a failure and report it', async () => {
    const { warnings, logger } = recordingLogger()
    const registry = new CleanupRegistry(logger)
    const survivor = vi.fn()
    registry.add('survivor', survivor)
    registry.add('broken', () => {
      throw new Error('container busy')
    })

    const failures = await registry.run()

    expect(survivor).toHaveBeenCalledOnce()
    expect(failures).toHaveLength(1)
    expect(failures[0].description).toBe('broken')
    expect(failures[0].error.message).toBe('container busy')
    expect(warnings).toEqual(['WARN: cleanup failed: broken (Error: container busy)'])
  })

  it('should clear entries once run', async () => {
    const registry = new CleanupRegistry()
    const fn = vi.fn()
    registry.add('once', fn)

    expect(registry.size).toBe(1)
    await registry.run()
    await registry.run()

    expect(registry.size).toBe(0)
    expect(fn).toHaveBeenCalledOnce()
  })
})
