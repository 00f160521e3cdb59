import WebSocket from 'ws'
import type { MarketTerminal, TerminalInfo, TerminalQuote } from './terminal'

const CONNECT_TIMEOUT_MS = 5000
const REQUEST_TIMEOUT_MS = 5000

export type BridgeTerminalOptions = {
  url: string
  connectTimeoutMs?: number
  requestTimeoutMs?: number
}

type PendingRequest = {
  method: string
  resolve: (result: unknown) => void
  timer: NodeJS.Timeout
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function num(v: unknown): number | null {
  const n = typeof v === 'string' ? Number(v) : v
  return typeof n === 'number' && Number.isFinite(n) ? n : null
}

/**
 * Terminal reached through a JSON-over-WebSocket bridge process.
 *
 * Requests are `{ id, method, params }`; the bridge answers `{ id, result }`
 * or `{ id, error }`. Methods: `terminal_info`, `symbols_get`,
 * `symbol_info_tick`. Quote times are epoch seconds (`time`) or epoch
 * milliseconds (`time_msc`). Any request that fails, times out or is cut off
 * by the socket closing resolves to `null`.
 */
export class BridgeTerminal implements MarketTerminal {
  private ws: WebSocket | null = null
  private nextId = 1
  private readonly pending = new Map<number, PendingRequest>()
  private readonly connectTimeoutMs: number
  private readonly requestTimeoutMs: number

  constructor(private readonly options: BridgeTerminalOptions) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS
  }

  connect(): Promise<boolean> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) return Promise.resolve(true)
    this.teardown()

    return new Promise((resolve) => {
      const ws = new WebSocket(this.options.url)
      let settled = false

      const finish = (ok: boolean) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        resolve(ok)
      }

      const timer = setTimeout(() => {
        console.warn(`[Terminal] Connect to ${this.options.url} timed out`)
        ws.terminate()
        finish(false)
      }, this.connectTimeoutMs)

      ws.on('open', () => {
        this.ws = ws
        finish(true)
      })

      ws.on('message', (raw: WebSocket.RawData) => this.handleMessage(raw))

      ws.on('close', () => {
        if (this.ws === ws) {
          this.ws = null
          this.failPending()
        }
        finish(false)
      })

      ws.on('error', (err) => {
        console.warn(`[Terminal] Socket error: ${err.message}`)
        finish(false)
      })
    })
  }

  async terminalInfo(): Promise<TerminalInfo | null> {
    const result = await this.request('terminal_info')
    if (!isRecord(result) || typeof result.name !== 'string') return null

    return {
      name: result.name,
      build: num(result.build) ?? undefined,
      connected: typeof result.connected === 'boolean' ? result.connected : undefined
    }
  }

  async getSymbols(): Promise<string[] | null> {
    const result = await this.request('symbols_get')
    if (!Array.isArray(result)) return null

    const names: string[] = []
    for (const item of result) {
      if (typeof item === 'string') names.push(item)
      else if (isRecord(item) && typeof item.name === 'string') names.push(item.name)
    }
    return names
  }

  async getQuote(symbol: string): Promise<TerminalQuote | null> {
    const result = await this.request('symbol_info_tick', { symbol })
    if (!isRecord(result)) return null

    const bid = num(result.bid)
    const ask = num(result.ask)
    if (bid === null || ask === null) return null

    const timeMsc = num(result.time_msc)
    const timeSec = num(result.time)
    const time = timeMsc ?? (timeSec !== null ? timeSec * 1000 : Date.now())

    return {
      bid,
      ask,
      last: num(result.last) ?? 0,
      time,
      volume: num(result.volume) ?? 0
    }
  }

  async disconnect(): Promise<void> {
    const ws = this.ws
    this.ws = null
    this.failPending()
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      ws.removeAllListeners()
      ws.on('error', () => undefined)
      ws.close(1000, 'Client disconnect')
    }
  }

  isOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN
  }

  private request(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    const ws = this.ws
    if (!ws || ws.readyState !== WebSocket.OPEN) return Promise.resolve(null)

    const id = this.nextId++

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(id)
        console.warn(`[Terminal] ${method} timed out after ${this.requestTimeoutMs}ms`)
        resolve(null)
      }, this.requestTimeoutMs)

      this.pending.set(id, { method, resolve, timer })

      ws.send(JSON.stringify({ id, method, params }), (err) => {
        if (!err) return
        console.warn(`[Terminal] ${method} send failed: ${err.message}`)
        this.settle(id, null)
      })
    })
  }

  private handleMessage(raw: WebSocket.RawData): void {
    let parsed: unknown
    try {
      parsed = JSON.parse(raw.toString())
    } catch {
      console.warn('[Terminal] Ignoring non-JSON message from bridge')
      return
    }

    if (!isRecord(parsed) || typeof parsed.id !== 'number') return

    if (parsed.error !== undefined && parsed.error !== null) {
      const method = this.pending.get(parsed.id)?.method ?? 'request'
      console.warn(`[Terminal] ${method} failed: ${String(parsed.error)}`)
      this.settle(parsed.id, null)
      return
    }

    this.settle(parsed.id, parsed.result ?? null)
  }

  private settle(id: number, result: unknown): void {
    const entry = this.pending.get(id)
    if (!entry) return
    this.pending.delete(id)
    clearTimeout(entry.timer)
    entry.resolve(result)
  }

  private failPending(): void {
    for (const id of [...this.pending.keys()]) {
      this.settle(id, null)
    }
  }

  private teardown(): void {
    if (!this.ws) return
    this.ws.removeAllListeners()
    this.ws.on('error', () => undefined)
    this.ws.terminate()
    this.ws = null
    this.failPending()
  }
}
