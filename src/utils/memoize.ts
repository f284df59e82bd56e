/**
 * Lazy, write-once caching for fixture state.
 *
 * The first caller starts the computation; concurrent callers share the
 * in-flight promise. A rejected computation is not cached, so a later call
 * starts over.
 */

export interface Memoized<T> {
  (): Promise<T>
  /** Whether a settled value is cached */
  isCached(): boolean
  /** Drop the cached value */
  reset(): void
}

export function memoizeAsync<T>(compute: () => Promise<T>): Memoized<T> {
  let pending: Promise<T> | null = null
  let settled = false

  const memoized = (): Promise<T> => {
    if (pending) {
      return pending
    }
    const attempt = compute().then(
      (value) => {
        if (pending === attempt) {
          settled = true
        }
        return value
      },
      (error: unknown) => {
        if (pending === attempt) {
          pending = null
        }
        throw error
      }
    )
    pending = attempt
    return attempt
  }

  return Object.assign(memoized, {
    isCached: () => settled,
    reset: () => {
      pending = null
      settled = false
    },
  })
}

/**
 * Memoize per owner object (typically a fixture class), so that subclasses
 * resolve their own value once each.
 */
export function memoizePerOwner<O extends object, T>(compute: (owner: O) => Promise<T>): {
  get(owner: O): Promise<T>
  reset(owner: O): void
} {
  const cells = new WeakMap<O, Memoized<T>>()

  const cellFor = (owner: O): Memoized<T> => {
    let cell = cells.get(owner)
    if (!cell) {
      cell = memoizeAsync(() => compute(owner))
      cells.set(owner, cell)
    }
    return cell
  }

  return {
    get: (owner) => cellFor(owner)(),
    reset: (owner) => cells.get(owner)?.reset(),
  }
}
