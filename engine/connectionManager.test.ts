import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ConnectionManager } from './connectionManager'
import type { MarketTerminal, TerminalInfo, TerminalQuote } from './terminal'

class FakeTerminal implements MarketTerminal {
  connectCalls = 0
  disconnectCalls = 0
  infoCalls = 0
  symbolCalls = 0
  quoteCalls = 0
  inFlightConnects = 0
  maxInFlightConnects = 0

  connectResult = true
  connectDelayMs = 0
  info: TerminalInfo | null = { name: 'Test Terminal' }
  symbols: string[] | null = ['EURUSD', 'XAUUSD', 'US500']
  quotes: Array<TerminalQuote | null | Error> = []
  defaultQuote: TerminalQuote = { bid: 2000.1, ask: 2000.5, last: 2000.3, time: 1_700_000_000_000 }

  async connect(): Promise<boolean> {
    this.connectCalls++
    this.inFlightConnects++
    this.maxInFlightConnects = Math.max(this.maxInFlightConnects, this.inFlightConnects)
    await new Promise((r) => setTimeout(r, this.connectDelayMs))
    this.inFlightConnects--
    return this.connectResult
  }

  async terminalInfo(): Promise<TerminalInfo | null> {
    this.infoCalls++
    return this.info
  }

  async getSymbols(): Promise<string[] | null> {
    this.symbolCalls++
    return this.symbols
  }

  async getQuote(): Promise<TerminalQuote | null> {
    this.quoteCalls++
    const next = this.quotes.length > 0 ? this.quotes.shift() : this.defaultQuote
    if (next instanceof Error) throw next
    return next ?? null
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++
  }
}

describe('ConnectionManager', () => {
  let terminal: FakeTerminal
  let clock: number

  const manager = (opts: ConstructorParameters<typeof ConnectionManager>[1] = {}) =>
    new ConnectionManager(terminal, { retryDelayMs: 0, now: () => clock, ...opts })

  beforeEach(() => {
    terminal = new FakeTerminal()
    clock = 1_700_000_000_000
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  describe('ensureConnection', () => {
    it('connects once and reuses a healthy connection', async () => {
      const cm = manager()
      expect(await cm.ensureConnection()).toBe(true)
      expect(await cm.ensureConnection()).toBe(true)

      expect(terminal.connectCalls).toBe(1)
      expect(cm.getConnectionStatus()).toMatchObject({
        state: 'CONNECTED',
        connected: true,
        lastConnectionTime: clock,
        terminalName: 'Test Terminal'
      })
    })

    it('serializes concurrent callers into a single reconnect', async () => {
      terminal.connectDelayMs = 5
      const cm = manager()

      const results = await Promise.all(Array.from({ length: 8 }, () => cm.ensureConnection()))

      expect(results.every(Boolean)).toBe(true)
      expect(terminal.connectCalls).toBe(1)
      expect(terminal.maxInFlightConnects).toBe(1)
    })

    it('never overlaps reconnect attempts while the terminal keeps failing', async () => {
      terminal.connectDelayMs = 2
      terminal.connectResult = false
      const cm = manager()

      const results = await Promise.all(Array.from({ length: 5 }, () => cm.ensureConnection()))

      expect(results).toEqual([false, false, false, false, false])
      expect(terminal.connectCalls).toBe(5)
      expect(terminal.maxInFlightConnects).toBe(1)
    })

    it('reconnects when the health probe silently returns null', async () => {
      const cm = manager()
      await cm.ensureConnection()

      terminal.info = null
      expect(await cm.ensureConnection()).toBe(false)
      // stale handle torn down, then the fresh handle that failed its probe
      expect(terminal.disconnectCalls).toBe(2)
      expect(terminal.connectCalls).toBe(2)

      terminal.info = { name: 'Test Terminal' }
      expect(await cm.ensureConnection()).toBe(true)
      expect(cm.getConnectionStatus().reconnects).toBe(1)
    })

    it('returns false instead of throwing when connect throws', async () => {
      terminal.connect = async () => {
        throw new Error('ipc broken')
      }
      const cm = manager()

      expect(await cm.ensureConnection()).toBe(false)
      expect(cm.getConnectionStatus().errors[0]).toContain('ipc broken')
    })

    it('emits state changes', async () => {
      const cm = manager()
      const states: string[] = []
      cm.on('stateChange', ({ newState }) => states.push(newState))

      await cm.ensureConnection()
      expect(states).toEqual(['CONNECTING', 'CONNECTED'])
    })
  })

  describe('getSymbol', () => {
    it('prefers the prioritized exact names', async () => {
      terminal.symbols = ['GOLDmicro', 'GOLD', 'XAUUSD']
      expect(await manager().getSymbol()).toBe('XAUUSD')
    })

    it('falls back to a case-insensitive keyword match', async () => {
      terminal.symbols = ['EURUSD', 'xauusd.m', 'GOLDmicro']
      expect(await manager().getSymbol()).toBe('xauusd.m')
    })

    it('returns null when nothing matches', async () => {
      terminal.symbols = ['EURUSD', 'BTCUSD']
      expect(await manager().getSymbol()).toBeNull()
    })

    it('returns null when the symbol list is unavailable', async () => {
      terminal.symbols = null
      expect(await manager().getSymbol()).toBeNull()
    })

    it('caches the symbol for five minutes', async () => {
      const cm = manager()
      expect(await cm.getSymbol()).toBe('XAUUSD')

      terminal.symbols = ['GOLD']
      clock += 4 * 60 * 1000
      expect(await cm.getSymbol()).toBe('XAUUSD')
      expect(terminal.symbolCalls).toBe(1)

      clock += 60 * 1000
      expect(await cm.getSymbol()).toBe('GOLD')
      expect(terminal.symbolCalls).toBe(2)
    })

    it('returns null without a connection', async () => {
      terminal.connectResult = false
      expect(await manager().getSymbol()).toBeNull()
      expect(terminal.symbolCalls).toBe(0)
    })
  })

  describe('getPrice', () => {
    it('returns a quote and records the successful request', async () => {
      const cm = manager()
      const quote = await cm.getPrice('XAUUSD')

      expect(quote).toEqual({
        symbol: 'XAUUSD',
        bid: 2000.1,
        ask: 2000.5,
        last: 2000.3,
        time: 1_700_000_000_000,
        volume: 0
      })
      expect(cm.getConnectionStatus().lastSuccessfulRequest).toBe(clock)
    })

    it('retries with a forced reconnect between attempts', async () => {
      terminal.quotes = [null, new Error('timeout')]
      const cm = manager()

      const quote = await cm.getPrice('XAUUSD')

      expect(quote?.bid).toBe(2000.1)
      expect(terminal.quoteCalls).toBe(3)
      expect(terminal.connectCalls).toBe(3)
    })

    it('gives up after three attempts', async () => {
      terminal.quotes = [null, null, null, null]
      const cm = manager()

      expect(await cm.getPrice('XAUUSD')).toBeNull()
      expect(terminal.quoteCalls).toBe(3)
    })

    it('stops retrying as soon as the signal aborts', async () => {
      terminal.quotes = [null, null, null]
      const cm = manager({ retryDelayMs: 60_000 })
      const abort = new AbortController()

      const started = Date.now()
      const pending = cm.getPrice('XAUUSD', abort.signal)
      setTimeout(() => abort.abort(), 20)

      expect(await pending).toBeNull()
      expect(Date.now() - started).toBeLessThan(5000)
      expect(terminal.quoteCalls).toBe(1)
    })

    it('does not ask the terminal once already aborted', async () => {
      const abort = new AbortController()
      abort.abort()
      expect(await manager().getPrice('XAUUSD', abort.signal)).toBeNull()
      expect(terminal.quoteCalls).toBe(0)
    })

    it('returns null when the terminal never connects', async () => {
      terminal.connectResult = false
      expect(await manager({ maxRetries: 2 }).getPrice('XAUUSD')).toBeNull()
      expect(terminal.connectCalls).toBe(2)
      expect(terminal.quoteCalls).toBe(0)
    })
  })

  describe('close', () => {
    it('disconnects once and degrades every later call', async () => {
      const cm = manager()
      await cm.ensureConnection()

      await cm.close()
      await cm.close()

      expect(terminal.disconnectCalls).toBe(1)
      expect(cm.getState()).toBe('CLOSED')
      expect(await cm.ensureConnection()).toBe(false)
      expect(await cm.getPrice('XAUUSD')).toBeNull()
    })

    it('is safe before any connection was made', async () => {
      const cm = manager()
      await cm.close()
      expect(terminal.disconnectCalls).toBe(0)
      expect(cm.getConnectionStatus().connected).toBe(false)
    })
  })
})
