import * as path from 'path'
import { DEFAULT_GOLD_SYMBOLS, DEFAULT_SYMBOL_KEYWORDS } from './connectionManager'

export type TerminalKind = 'bridge' | 'simulated'

export type AppConfig = {
  dataDir: string
  terminal: TerminalKind
  terminalUrl: string
  terminalTimeoutMs: number
  horizonMinutes: number
  collectionIntervalMs: number
  minDataPoints: number
  historySize: number
  verifyIntervalMs: number
  verifyToleranceMs: number
  symbolRetryMs: number
  goldSymbols: string[]
  symbolKeywords: string[]
  sequencePredictor: boolean
  fastMode: boolean
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

type Env = Record<string, string | undefined>

function readNumber(env: Env, key: string, fallback: number, { integer = false, min = 0 } = {}): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback

  const n = Number(raw)
  if (!Number.isFinite(n) || (integer && !Number.isInteger(n)) || n <= min) {
    throw new ConfigError(`${key} must be a ${integer ? 'whole ' : ''}number above ${min}, got "${raw}"`)
  }
  return n
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key]
  if (raw === undefined) return fallback
  const items = raw.split(',').map((s) => s.trim()).filter(Boolean)
  return items.length > 0 ? items : fallback
}

function readFlag(env: Env, key: string, fallback = false): boolean {
  const v = (env[key] ?? '').trim().toLowerCase()
  if (v === '') return fallback
  return v === '1' || v === 'true' || v === 'yes' || v === 'on'
}

function parseTerminalKind(raw: string | undefined): TerminalKind {
  const v = (raw ?? 'bridge').toLowerCase()
  if (v === 'bridge' || v === 'simulated') return v
  if (v === 'sim' || v === 'demo') return 'simulated'
  throw new ConfigError(`TERMINAL must be "bridge" or "simulated", got "${raw}"`)
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const fastMode = readFlag(env, 'FAST_MODE')

  const collectSeconds = fastMode ? 2 : readNumber(env, 'COLLECT_SECONDS', 5)
  const minDataPoints = fastMode ? 5 : readNumber(env, 'MIN_DATA_POINTS', 20, { integer: true })

  return {
    dataDir: path.resolve(cwd, env.DATA_DIR ?? 'data'),
    terminal: parseTerminalKind(env.TERMINAL),
    terminalUrl: env.TERMINAL_URL ?? 'ws://127.0.0.1:8765',
    terminalTimeoutMs: readNumber(env, 'TERMINAL_TIMEOUT_MS', 5000),
    horizonMinutes: readNumber(env, 'HORIZON_MINUTES', 5),
    collectionIntervalMs: collectSeconds * 1000,
    minDataPoints,
    historySize: readNumber(env, 'HISTORY_SIZE', 500, { integer: true }),
    verifyIntervalMs: readNumber(env, 'VERIFY_SECONDS', 60) * 1000,
    verifyToleranceMs: readNumber(env, 'VERIFY_TOLERANCE_SECONDS', 300) * 1000,
    symbolRetryMs: readNumber(env, 'SYMBOL_RETRY_SECONDS', 30) * 1000,
    goldSymbols: readList(env, 'GOLD_SYMBOLS', DEFAULT_GOLD_SYMBOLS),
    symbolKeywords: readList(env, 'SYMBOL_KEYWORDS', DEFAULT_SYMBOL_KEYWORDS),
    sequencePredictor: readFlag(env, 'SEQUENCE_PREDICTOR', true),
    fastMode
  }
}
