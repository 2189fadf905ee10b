import { IOFailure } from './errors.js'
import type { SessionState } from './types.js'

/**
 * Integer percentage of `downloaded` over `total`. A zero total never
 * divides: it reads 100 once the session completed and 0 before that.
 */
export function computePercentage(downloaded: number, total: number, state: SessionState): number {
  if (total <= 0) return state === 'completed' ? 100 : 0
  return Math.floor((downloaded * 100) / total)
}

/** Byte counters for one session. Owned and mutated only by the registry. */
export class ProgressAccumulator {
  private downloaded = 0
  private total = 0
  private totalKnown = false

  get downloadedBytes(): number {
    return this.downloaded
  }

  get totalBytes(): number {
    return this.total
  }

  get hasTotal(): boolean {
    return this.totalKnown
  }

  setTotal(total: number): void {
    if (this.totalKnown) {
      throw new Error('Total size already set')
    }
    if (!Number.isSafeInteger(total) || total < 0) {
      throw new IOFailure(`Invalid total size: ${total}`)
    }
    if (total > 0 && this.downloaded > total) {
      throw new IOFailure(`Already received ${this.downloaded} bytes, more than the declared ${total}`)
    }
    this.total = total
    this.totalKnown = true
  }

  /** Whether `n` more bytes stay within a known, non-zero total. */
  fits(n: number): boolean {
    if (this.total === 0) return true
    return this.downloaded + n <= this.total
  }

  advance(n: number): number {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new IOFailure(`Invalid byte count: ${n}`)
    }
    if (!this.fits(n)) {
      throw new IOFailure(`Received ${this.downloaded + n} bytes, more than the declared ${this.total}`)
    }
    this.downloaded += n
    return this.downloaded
  }

  percentage(state: SessionState): number {
    return computePercentage(this.downloaded, this.total, state)
  }
}
