// Streaming indicators over a price series. `update` returns null until warm.

export interface Indicator {
  update(price: number): number | null
}

export class SMA implements Indicator {
  private window: number[] = []
  private sum = 0

  constructor(private readonly period: number) {}

  update(price: number): number | null {
    this.window.push(price)
    this.sum += price

    if (this.window.length > this.period) {
      const removed = this.window.shift()
      if (removed !== undefined) this.sum -= removed
    }

    if (this.window.length < this.period) return null
    return this.sum / this.period
  }
}

// Wilder-smoothed RSI
export class RSI implements Indicator {
  private prev: number | null = null
  private avgGain = 0
  private avgLoss = 0
  private count = 0

  constructor(private readonly period: number) {}

  update(price: number): number | null {
    if (this.prev === null) {
      this.prev = price
      return null
    }

    const change = price - this.prev
    this.prev = price
    const gain = Math.max(change, 0)
    const loss = Math.max(-change, 0)
    this.count += 1

    if (this.count <= this.period) {
      this.avgGain += gain / this.period
      this.avgLoss += loss / this.period
      if (this.count < this.period) return null
    } else {
      this.avgGain = (this.avgGain * (this.period - 1) + gain) / this.period
      this.avgLoss = (this.avgLoss * (this.period - 1) + loss) / this.period
    }

    if (this.avgLoss === 0) return this.avgGain === 0 ? 50 : 100
    const rs = this.avgGain / this.avgLoss
    return 100 - 100 / (1 + rs)
  }
}

// Feeds the whole series and returns the final reading.
export function lastValue(indicator: Indicator, prices: readonly number[]): number | null {
  let value: number | null = null
  for (const p of prices) {
    value = indicator.update(p)
  }
  return value
}

export function stdDev(values: readonly number[]): number {
  if (values.length < 2) return 0
  const mean = values.reduce((a, b) => a + b, 0) / values.length
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (values.length - 1)
  return Math.sqrt(variance)
}

export function pctReturns(prices: readonly number[]): number[] {
  const out: number[] = []
  for (let i = 1; i < prices.length; i++) {
    if (prices[i - 1] !== 0) out.push((prices[i] - prices[i - 1]) / prices[i - 1])
  }
  return out
}
