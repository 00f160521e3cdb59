import { EventEmitter } from 'events'
import { AsyncMutex } from './mutex'
import { sleep } from './sleep'
import type { MarketTerminal } from './terminal'
import type { PriceQuote } from './types'

export type ConnectionState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED' | 'CLOSED'

const SYMBOL_CACHE_MS = 5 * 60 * 1000   // 5 minutes
const MAX_QUOTE_RETRIES = 3
const RETRY_DELAY_MS = 2000
const MAX_RECENT_ERRORS = 10

export const DEFAULT_GOLD_SYMBOLS = ['XAUUSD', 'GOLD', 'XAU/USD', 'XAUUSD.', 'XAUUSD#']
export const DEFAULT_SYMBOL_KEYWORDS = ['XAU', 'GOLD']

export interface ConnectionManagerOptions {
  preferredSymbols?: string[]
  symbolKeywords?: string[]
  symbolCacheMs?: number
  maxRetries?: number
  retryDelayMs?: number
  now?: () => number
}

export interface ConnectionStatus {
  state: ConnectionState
  connected: boolean
  lastConnectionTime: number | null
  lastSuccessfulRequest: number | null
  connectionAttempts: number
  reconnects: number
  symbol: string | null
  symbolCachedAt: number | null
  terminalName: string | null
  errors: string[]
}

type SymbolCache = { symbol: string; cachedAt: number }

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Keeps a single handle to the market-data terminal alive.
 *
 * All ConnectionState mutations happen while holding `lock`, so concurrent
 * callers of `ensureConnection` never reconnect at the same time. Public
 * methods never throw: failure is reported as `false`/`null`.
 */
export class ConnectionManager extends EventEmitter {
  private readonly lock = new AsyncMutex()
  private readonly preferredSymbols: string[]
  private readonly symbolKeywords: string[]
  private readonly symbolCacheMs: number
  private readonly maxRetries: number
  private readonly retryDelayMs: number
  private readonly now: () => number

  private state: ConnectionState = 'DISCONNECTED'
  private lastConnectionTime: number | null = null
  private lastSuccessfulRequest: number | null = null
  private connectionAttempts = 0
  private reconnects = 0
  private symbolCache: SymbolCache | null = null
  private terminalName: string | null = null
  private errors: string[] = []

  constructor(private readonly terminal: MarketTerminal, options: ConnectionManagerOptions = {}) {
    super()
    this.preferredSymbols = options.preferredSymbols ?? DEFAULT_GOLD_SYMBOLS
    this.symbolKeywords = (options.symbolKeywords ?? DEFAULT_SYMBOL_KEYWORDS).map((k) => k.toUpperCase())
    this.symbolCacheMs = options.symbolCacheMs ?? SYMBOL_CACHE_MS
    this.maxRetries = Math.max(1, options.maxRetries ?? MAX_QUOTE_RETRIES)
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS
    this.now = options.now ?? Date.now
  }

  async ensureConnection(): Promise<boolean> {
    try {
      return await this.lock.runExclusive(async () => {
        if (this.state === 'CLOSED') return false
        if (this.state === 'CONNECTED' && (await this.isHealthy())) return true
        return this.establish()
      })
    } catch (err) {
      this.recordError('ensureConnection', err)
      return false
    }
  }

  async getSymbol(): Promise<string | null> {
    const cached = this.symbolCache
    if (cached && this.now() - cached.cachedAt < this.symbolCacheMs) {
      return cached.symbol
    }

    if (!(await this.ensureConnection())) return null

    try {
      const symbols = await this.terminal.getSymbols()
      if (!symbols) {
        console.warn('[Connection] Terminal returned no symbol list')
        return null
      }

      const symbol = this.matchSymbol(symbols)
      if (!symbol) {
        console.warn(`[Connection] No gold symbol among ${symbols.length} instruments`)
        return null
      }

      await this.lock.runExclusive(async () => {
        this.symbolCache = { symbol, cachedAt: this.now() }
      })
      console.log(`[Connection] Using symbol ${symbol}`)
      return symbol
    } catch (err) {
      this.recordError('getSymbol', err)
      return null
    }
  }

  /**
   * Reads a quote, reconnecting between attempts. An aborted `signal` cuts the
   * retry delay short and skips the remaining attempts.
   */
  async getPrice(symbol: string, signal?: AbortSignal): Promise<PriceQuote | null> {
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) break
      try {
        if (!(await this.ensureConnection())) {
          console.warn(`[Connection] Not connected, attempt ${attempt}/${this.maxRetries}`)
        } else {
          const tick = await this.terminal.getQuote(symbol)
          if (tick) {
            await this.lock.runExclusive(async () => {
              this.lastSuccessfulRequest = this.now()
            })
            return {
              symbol,
              bid: tick.bid,
              ask: tick.ask,
              last: tick.last,
              time: tick.time,
              volume: tick.volume ?? 0
            }
          }
          console.warn(`[Connection] No quote for ${symbol}, attempt ${attempt}/${this.maxRetries}`)
        }
      } catch (err) {
        this.recordError(`getPrice attempt ${attempt}/${this.maxRetries}`, err)
      }

      if (attempt < this.maxRetries && !signal?.aborted) {
        await this.invalidate()
        await sleep(this.retryDelayMs, signal)
      }
    }

    return null
  }

  getConnectionStatus(): ConnectionStatus {
    return {
      state: this.state,
      connected: this.state === 'CONNECTED',
      lastConnectionTime: this.lastConnectionTime,
      lastSuccessfulRequest: this.lastSuccessfulRequest,
      connectionAttempts: this.connectionAttempts,
      reconnects: this.reconnects,
      symbol: this.symbolCache?.symbol ?? null,
      symbolCachedAt: this.symbolCache?.cachedAt ?? null,
      terminalName: this.terminalName,
      errors: [...this.errors]
    }
  }

  isConnected(): boolean {
    return this.state === 'CONNECTED'
  }

  getState(): ConnectionState {
    return this.state
  }

  // Idempotent. After close() every call degrades to false/null.
  async close(): Promise<void> {
    try {
      await this.lock.runExclusive(async () => {
        if (this.state === 'CLOSED') return
        await this.safeDisconnect()
        this.setState('CLOSED')
      })
    } catch (err) {
      this.recordError('close', err)
    }
  }

  // Marks the handle stale so the next ensureConnection() reconnects.
  private async invalidate(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.state === 'CONNECTED') this.setState('DISCONNECTED')
    })
  }

  // Caller holds the lock.
  private async isHealthy(): Promise<boolean> {
    try {
      const info = await this.terminal.terminalInfo()
      if (!info) {
        console.warn('[Connection] Terminal info unavailable, connection presumed lost')
        return false
      }
      this.lastSuccessfulRequest = this.now()
      return true
    } catch (err) {
      this.recordError('health check', err)
      return false
    }
  }

  // Caller holds the lock.
  private async establish(): Promise<boolean> {
    const wasConnected = this.lastConnectionTime !== null
    await this.safeDisconnect()

    this.setState('CONNECTING')
    this.connectionAttempts++

    try {
      if (!(await this.terminal.connect())) {
        console.error(`[Connection] Terminal connect failed (attempt ${this.connectionAttempts})`)
        this.setState('DISCONNECTED')
        return false
      }

      const info = await this.terminal.terminalInfo()
      if (!info) {
        console.error('[Connection] Connected but terminal info unavailable')
        await this.terminal.disconnect()
        this.setState('DISCONNECTED')
        return false
      }

      this.terminalName = info.name
      this.lastConnectionTime = this.now()
      this.lastSuccessfulRequest = this.lastConnectionTime
      this.connectionAttempts = 0
      if (wasConnected) this.reconnects++
      this.setState('CONNECTED')
      console.log(`[Connection] Connected to terminal ${info.name}`)
      return true
    } catch (err) {
      this.recordError('connect', err)
      this.setState('DISCONNECTED')
      return false
    }
  }

  // Caller holds the lock.
  private async safeDisconnect(): Promise<void> {
    if (this.state !== 'CONNECTED' && this.state !== 'CONNECTING') return
    try {
      await this.terminal.disconnect()
      console.log('[Connection] Terminal disconnected')
    } catch (err) {
      this.recordError('disconnect', err)
    }
    this.setState('DISCONNECTED')
  }

  private matchSymbol(available: string[]): string | null {
    for (const name of this.preferredSymbols) {
      if (available.includes(name)) return name
    }

    for (const name of available) {
      const upper = name.toUpperCase()
      if (this.symbolKeywords.some((k) => upper.includes(k))) return name
    }

    return null
  }

  private setState(state: ConnectionState): void {
    const oldState = this.state
    this.state = state

    if (oldState !== state) {
      this.emit('stateChange', { oldState, newState: state })
      if (state === 'CONNECTED') this.emit('connected')
      if (oldState === 'CONNECTED') this.emit('disconnected')
    }
  }

  private recordError(context: string, err: unknown): void {
    const message = errorMessage(err)
    console.error(`[Connection] ${context} failed:`, message)
    this.errors.push(`${new Date(this.now()).toISOString()}: ${context}: ${message}`)

    // Keep only the most recent errors
    if (this.errors.length > MAX_RECENT_ERRORS) {
      this.errors = this.errors.slice(-MAX_RECENT_ERRORS)
    }
  }
}
