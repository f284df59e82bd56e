import { describe, it, expect, vi } from 'vitest'
import { memoizeAsync, memoizePerOwner } from '../../src/utils/memoize.js'

describe('memoizeAsync', () => {
  it('should compute once and return the cached value afterwards', async () => {
    const compute = vi.fn(async () => 'token-1')
    const memoized = memoizeAsync(compute)

    expect(memoized.isCached()).toBe(false)
    expect(await memoized()).toBe('token-1')
    expect(await memoized()).toBe('token-1')
    expect(compute).toHaveBeenCalledTimes(1)
    expect(memoized.isCached()).toBe(true)
  })

  it('should share the in-flight computation between concurrent callers', async () => {
    let release: (value: number) => void = () => {}
    const compute = vi.fn(() => new Promise<number>((resolve) => (release = resolve)))
    const memoized = memoizeAsync(compute)

    const first = memoized()
    const second = memoized()
    release(7)

    expect(await Promise.all([first, second])).toEqual([7, 7])
    expect(compute).toHaveBeenCalledTimes(1)
  })

  it('should not cache a rejected computation', async () => {
    const compute = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('auth down'))
      .mockResolvedValueOnce('recovered')
    const memoized = memoizeAsync(compute)

    await expect(memoized()).rejects.toThrow('auth down')
    expect(memoized.isCached()).toBe(false)
    expect(await memoized()).toBe('recovered')
    expect(compute).toHaveBeenCalledTimes(2)
  })

  it('should recompute after reset', async () => {
    let counter = 0
    const memoized = memoizeAsync(async () => ++counter)

    expect(await memoized()).toBe(1)
    memoized.reset()
    expect(await memoized()).toBe(2)
  })
})

describe('memoizePerOwner', () => {
  it('should keep a separate cell per owner', async () => {
    const compute = vi.fn(async (owner: { name: string }) => `${owner.name}-features`)
    const cache = memoizePerOwner(compute)
    const a = { name: 'a' }
    const b = { name: 'b' }

    expect(await cache.get(a)).toBe('a-features')
    expect(await cache.get(a)).toBe('a-features')
    expect(await cache.get(b)).toBe('b-features')
    expect(compute).toHaveBeenCalledTimes(2)

    cache.reset(a)
    await cache.get(a)
    expect(compute).toHaveBeenCalledTimes(3)
  })
})
