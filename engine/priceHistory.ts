import type { PriceSample } from './types'

export const DEFAULT_HISTORY_CAPACITY = 500

/**
 * Bounded, time-ordered buffer of observed samples. The collector is the only
 * writer; readers take a `snapshot()` and never iterate the live buffer.
 */
export class PriceHistory {
  private readonly samples: PriceSample[] = []
  readonly capacity: number

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  /**
   * Appends a sample, evicting the oldest on overflow. A sample older than the
   * newest one held is refused and `false` is returned.
   */
  push(sample: PriceSample): boolean {
    const newest = this.latest()
    if (newest && sample.timestamp < newest.timestamp) return false

    this.samples.push(Object.freeze({ ...sample }))

    if (this.samples.length > this.capacity) {
      this.samples.splice(0, this.samples.length - this.capacity)
    }

    return true
  }

  get length() {
    return this.samples.length
  }

  latest(): PriceSample | null {
    return this.samples.length > 0 ? this.samples[this.samples.length - 1] : null
  }

  snapshot(): PriceSample[] {
    return this.samples.slice()
  }

  lastIndexAtOrBefore(timestamp: number): number {
    return lastIndexAtOrBefore(this.samples, timestamp)
  }

  closestTo(timestamp: number): PriceSample | null {
    return closestSample(this.samples, timestamp)
  }
}

export function lastIndexAtOrBefore(samples: readonly PriceSample[], timestamp: number): number {
  let lo = 0
  let hi = samples.length - 1
  let ans = -1

  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    if (samples[mid].timestamp <= timestamp) {
      ans = mid
      lo = mid + 1
    } else {
      hi = mid - 1
    }
  }

  return ans
}

// Nearest sample by absolute time distance; ties go to the earlier sample.
export function closestSample(samples: readonly PriceSample[], timestamp: number): PriceSample | null {
  if (samples.length === 0) return null

  const i = lastIndexAtOrBefore(samples, timestamp)
  if (i < 0) return samples[0]
  if (i === samples.length - 1) return samples[i]

  const before = samples[i]
  const after = samples[i + 1]
  return timestamp - before.timestamp <= after.timestamp - timestamp ? before : after
}
