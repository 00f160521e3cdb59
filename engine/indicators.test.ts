import { describe, expect, it } from 'vitest'
import { RSI, SMA, lastValue, pctReturns, stdDev } from './indicators'

describe('SMA', () => {
  it('stays null until warm, then averages the window', () => {
    const sma = new SMA(3)
    expect(sma.update(1)).toBeNull()
    expect(sma.update(2)).toBeNull()
    expect(sma.update(3)).toBe(2)
    expect(sma.update(4)).toBe(3)
  })
})

describe('RSI', () => {
  it('reads 100 with only gains and 50 with no movement', () => {
    expect(lastValue(new RSI(14), Array.from({ length: 20 }, (_, i) => 100 + i))).toBe(100)
    expect(lastValue(new RSI(14), Array.from({ length: 20 }, () => 100))).toBe(50)
  })

  it('needs period + 1 prices', () => {
    expect(lastValue(new RSI(14), Array.from({ length: 14 }, (_, i) => 100 + i))).toBeNull()
  })

  it('balances equal gains and losses at 50', () => {
    const prices = Array.from({ length: 15 }, (_, i) => (i % 2 === 0 ? 100 : 101))
    expect(lastValue(new RSI(14), prices)).toBeCloseTo(50, 10)
  })
})

describe('stdDev / pctReturns', () => {
  it('uses the sample standard deviation', () => {
    expect(stdDev([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(5 / 3), 12)
    expect(stdDev([7])).toBe(0)
  })

  it('computes simple returns', () => {
    const r = pctReturns([100, 110, 99])
    expect(r).toHaveLength(2)
    expect(r[0]).toBeCloseTo(0.1, 12)
    expect(r[1]).toBeCloseTo(-0.1, 12)
  })
})
