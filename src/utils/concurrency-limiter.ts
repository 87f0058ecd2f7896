/**
 * Counting semaphore that caps how many tasks run their stages at once.
 * Waiters are served first-in, first-out.
 */

import { abortReason } from './helpers.js'

interface Waiter {
  resolve: () => void
  signal?: AbortSignal
  onAbort?: () => void
}

export class ConcurrencyLimiter {
  private _active = 0
  private readonly _waiters: Waiter[] = []

  constructor(private readonly _limit: number) {
    if (!Number.isInteger(_limit) || _limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${String(_limit)}`)
    }
  }

  get active(): number {
    return this._active
  }

  get pending(): number {
    return this._waiters.length
  }

  /**
   * Wait for a free slot. Rejects with the signal's reason if `signal`
   * aborts while waiting; no slot is held in that case.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted === true) {
      return Promise.reject(abortReason(signal))
    }
    if (this._active < this._limit) {
      this._active++
      return Promise.resolve()
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve }
      if (signal !== undefined) {
        waiter.signal = signal
        waiter.onAbort = () => {
          const idx = this._waiters.indexOf(waiter)
          if (idx !== -1) this._waiters.splice(idx, 1)
          reject(abortReason(signal))
        }
        signal.addEventListener('abort', waiter.onAbort, { once: true })
      }
      this._waiters.push(waiter)
    })
  }

  /** Return a slot; hands it straight to the next waiter if there is one */
  release(): void {
    const next = this._waiters.shift()
    if (next !== undefined) {
      if (next.onAbort !== undefined) next.signal?.removeEventListener('abort', next.onAbort)
      next.resolve()
      return
    }
    if (this._active > 0) this._active--
  }
}
