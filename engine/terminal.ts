export type TerminalInfo = {
  name: string
  build?: number
  connected?: boolean
}

export type TerminalQuote = {
  bid: number
  ask: number
  last: number
  // epoch ms
  time: number
  volume?: number
}

/**
 * Market-data terminal as seen by the connection manager.
 *
 * Implementations report failure by returning `false`/`null`. Callers must
 * still expect the occasional throw and an answer of `null` from a terminal
 * that believes it is connected.
 */
export interface MarketTerminal {
  connect(): Promise<boolean>
  terminalInfo(): Promise<TerminalInfo | null>
  getSymbols(): Promise<string[] | null>
  getQuote(symbol: string): Promise<TerminalQuote | null>
  disconnect(): Promise<void>
}
