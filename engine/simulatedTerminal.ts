import type { MarketTerminal, TerminalInfo, TerminalQuote } from './terminal'

export type SimulatedTerminalOptions = {
  symbols?: string[]
  basePrice?: number
  spread?: number
  // per-tick standard deviation as a fraction of price
  volatility?: number
  seed?: number
  now?: () => number
}

// mulberry32
function seededRandom(seed: number): () => number {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Offline stand-in for a terminal: a random walk around `basePrice`, quoted
 * as bid/ask with no last trade.
 */
export class SimulatedTerminal implements MarketTerminal {
  private connected = false
  private price: number
  private readonly symbols: string[]
  private readonly spread: number
  private readonly volatility: number
  private readonly random: () => number
  private readonly now: () => number

  constructor(options: SimulatedTerminalOptions = {}) {
    this.symbols = options.symbols ?? ['EURUSD', 'XAUUSD', 'US500']
    this.price = options.basePrice ?? 2000
    this.spread = options.spread ?? 0.3
    this.volatility = options.volatility ?? 0.0004
    this.random = seededRandom(options.seed ?? 42)
    this.now = options.now ?? Date.now
  }

  async connect(): Promise<boolean> {
    this.connected = true
    return true
  }

  async terminalInfo(): Promise<TerminalInfo | null> {
    return this.connected ? { name: 'Simulated terminal', connected: true } : null
  }

  async getSymbols(): Promise<string[] | null> {
    return this.connected ? [...this.symbols] : null
  }

  async getQuote(symbol: string): Promise<TerminalQuote | null> {
    if (!this.connected || !this.symbols.includes(symbol)) return null

    // Box-Muller
    const u = Math.max(this.random(), Number.EPSILON)
    const v = this.random()
    const z = Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v)
    this.price = Math.max(0.01, this.price * (1 + z * this.volatility))

    const half = this.spread / 2
    return {
      bid: round2(this.price - half),
      ask: round2(this.price + half),
      last: 0,
      time: this.now(),
      volume: 0
    }
  }

  async disconnect(): Promise<void> {
    this.connected = false
  }
}

function round2(n: number): number {
  return Math.round(n * 100) / 100
}
