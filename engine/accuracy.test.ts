import { describe, expect, it } from 'vitest'
import { computeAccuracy, findActualPrice, isGoodPrediction } from './accuracy'
import type { PriceSample } from './types'

const MIN = 60 * 1000

function sample(timestamp: number, price: number): PriceSample {
  return { timestamp, price, bid: price - 0.1, ask: price + 0.1 }
}

describe('computeAccuracy', () => {
  it('scores a correct direction with half the magnitude error as 0.75', () => {
    expect(computeAccuracy(101, 102, 100)).toBe(0.75)
  })

  it('scores a wrong direction with equal magnitude as 0', () => {
    expect(computeAccuracy(101, 99, 100)).toBe(0)
  })

  it('returns 0.5 when the price did not move', () => {
    expect(computeAccuracy(105, 100, 100)).toBe(0.5)
  })

  it('gives a perfect forecast 1', () => {
    expect(computeAccuracy(102, 102, 100)).toBe(1)
  })

  it('never rewards a wrong direction above 0.5', () => {
    // predicted move far larger than the actual one: price accuracy clamps to 0
    expect(computeAccuracy(110, 99, 100)).toBe(0.5)
    expect(computeAccuracy(100.5, 99, 100)).toBe(0.25)
  })

  it('treats a no-change forecast as 0.5 against any move', () => {
    expect(computeAccuracy(100, 103, 100)).toBe(0.5)
    expect(computeAccuracy(100, 97, 100)).toBe(0.5)
  })

  it('keeps the score in [0, 1]', () => {
    for (const [p, a] of [[150, 101], [50, 101], [100.01, 130], [99, 60]]) {
      const score = computeAccuracy(p, a, 100)
      expect(score).toBeGreaterThanOrEqual(0)
      expect(score).toBeLessThanOrEqual(1)
    }
  })
})

describe('findActualPrice', () => {
  const t0 = 1_700_000_000_000
  const samples = [sample(t0, 100), sample(t0 + 4 * MIN, 101), sample(t0 + 6 * MIN, 102)]

  it('picks the sample closest to the target time', () => {
    expect(findActualPrice(samples, t0 + 5.5 * MIN)).toBe(102)
    expect(findActualPrice(samples, t0 + 4.4 * MIN)).toBe(101)
  })

  it('prefers the earlier sample on a tie', () => {
    expect(findActualPrice(samples, t0 + 5 * MIN)).toBe(101)
  })

  it('returns null when the closest sample is outside the tolerance', () => {
    expect(findActualPrice(samples, t0 + 20 * MIN)).toBeNull()
    expect(findActualPrice(samples, t0 + 11 * MIN, 5 * MIN)).toBeNull()
  })

  it('accepts a sample just inside the tolerance', () => {
    expect(findActualPrice(samples, t0 + 11 * MIN - 1, 5 * MIN)).toBe(102)
  })

  it('returns null on empty history', () => {
    expect(findActualPrice([], t0)).toBeNull()
  })
})

describe('isGoodPrediction', () => {
  it('counts accuracy strictly above 0.6 as good', () => {
    expect(isGoodPrediction(0.6)).toBe(false)
    expect(isGoodPrediction(0.61)).toBe(true)
  })
})
