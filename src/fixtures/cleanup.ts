/**
 * Cleanup registry: the test-runner analogue of addCleanup.
 *
 * Cleanups run last-in first-out. Every registered cleanup runs even when an
 * earlier one fails; failures are logged as warnings and returned.
 */

import { toError } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'

export type CleanupFn = () => Promise<void> | void

interface CleanupEntry {
  description: string
  fn: CleanupFn
}

export interface CleanupFailure {
  description: string
  error: Error
}

export class CleanupRegistry {
  private entries: CleanupEntry[] = []

  constructor(private readonly log: Logger = createLogger({ service: 'cleanup' })) {}

  get size(): number {
    return this.entries.length
  }

  add(description: string, fn: CleanupFn): void {
    this.entries.push({ description, fn })
  }

  /**
   * Run and clear all registered cleanups
   */
  async run(): Promise<CleanupFailure[]> {
    const entries = this.entries.reverse()
    this.entries = []

    const failures: CleanupFailure[] = []
    for (const entry of entries) {
      try {
        await entry.fn()
      } catch (error) {
        const failure = { description: entry.description, error: toError(error) }
        failures.push(failure)
        this.log.warn(`cleanup failed: ${entry.description}`, undefined, failure.error)
      }
    }
    return failures
  }
}
