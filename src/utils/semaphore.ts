export type Release = () => void

interface Waiter {
  grant: (release: Release) => void
}

/**
 * Counting semaphore used to cap in-flight connection attempts across every
 * host worker. Waiters are served in FIFO order.
 */
export class Semaphore {
  private available: number
  private readonly waiters: Waiter[] = []

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`)
    }
    this.available = permits
  }

  get inUse(): number {
    return this.permits - this.available
  }

  get pending(): number {
    return this.waiters.length
  }

  /**
   * Wait for a permit. Resolves to a release function, or to null when the
   * signal aborts first (nothing is held in that case).
   */
  acquire(signal?: AbortSignal): Promise<Release | null> {
    if (signal?.aborted) return Promise.resolve(null)

    if (this.available > 0) {
      this.available--
      return Promise.resolve(this.releaser())
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(waiter)
        if (idx !== -1) this.waiters.splice(idx, 1)
        resolve(null)
      }
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(release)
        },
      }
      this.waiters.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  private releaser(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiters.shift()
      if (next) {
        // Hand the permit straight to the next waiter
        next.grant(this.releaser())
      } else {
        this.available++
      }
    }
  }
}
