import Database from 'better-sqlite3'
import * as fs from 'fs'
import * as path from 'path'
import { GOOD_PREDICTION_THRESHOLD } from './accuracy'
import type { ForecastRecord, PredictionStats, PriceSample, Signal, VerificationOutcome } from './types'

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Durable log of raw ticks and forecasts. The only mutation a forecast ever
 * sees is the single pending -> verified transition.
 */
export interface PredictionStore {
  appendTick(sample: PriceSample): Promise<void>
  insert(record: ForecastRecord): Promise<void>
  markVerified(id: string, outcome: VerificationOutcome): Promise<ForecastRecord | null>
  pendingDue(now: number): Promise<ForecastRecord[]>
  recent(limit: number): Promise<ForecastRecord[]>
  statsSince(since: number): Promise<PredictionStats>
  statsLast24h(now?: number): Promise<PredictionStats>
  recentAccuracies(limit: number): Promise<number[]>
  publishLatest(record: ForecastRecord): Promise<void>
  close(): Promise<void>
}

type PredictionRow = {
  id: string
  timestamp: number
  current_price: number
  predicted_price: number
  signal: string
  confidence: number
  method: string
  target_time: number
  actual_price: number | null
  accuracy: number | null
  verified_at: number | null
}

type StatsRow = {
  count: number
  avg_accuracy: number | null
  good: number
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS price_data (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    price REAL NOT NULL,
    bid REAL NOT NULL,
    ask REAL NOT NULL
  );

  CREATE TABLE IF NOT EXISTS predictions (
    id TEXT PRIMARY KEY,
    timestamp INTEGER NOT NULL,
    current_price REAL NOT NULL,
    predicted_price REAL NOT NULL,
    signal TEXT NOT NULL,
    confidence REAL NOT NULL,
    method TEXT NOT NULL,
    target_time INTEGER NOT NULL,
    actual_price REAL,
    accuracy REAL,
    verified_at INTEGER
  );

  CREATE INDEX IF NOT EXISTS idx_price_data_time ON price_data(timestamp);
  CREATE INDEX IF NOT EXISTS idx_predictions_time ON predictions(timestamp);
  CREATE INDEX IF NOT EXISTS idx_predictions_pending ON predictions(verified_at, target_time);
`

const SIGNALS: readonly Signal[] = ['StrongBullish', 'Bullish', 'Flat', 'Bearish', 'StrongBearish']

function isSignal(v: string): v is Signal {
  return (SIGNALS as readonly string[]).includes(v)
}

function toRecord(row: PredictionRow): ForecastRecord | null {
  if (!isSignal(row.signal)) {
    console.warn(`[Store] Skipping forecast ${row.id} with unknown signal "${row.signal}"`)
    return null
  }

  const record: ForecastRecord = {
    id: row.id,
    createdAt: row.timestamp,
    currentPrice: row.current_price,
    predictedPrice: row.predicted_price,
    signal: row.signal,
    confidence: row.confidence,
    method: row.method,
    targetTime: row.target_time,
    status: 'pending'
  }

  if (row.verified_at !== null && row.actual_price !== null && row.accuracy !== null) {
    record.status = 'verified'
    record.actualPrice = row.actual_price
    record.accuracy = row.accuracy
    record.verifiedAt = row.verified_at
  }
  return record
}

function toRecords(rows: PredictionRow[]): ForecastRecord[] {
  const out: ForecastRecord[] = []
  for (const row of rows) {
    const record = toRecord(row)
    if (record) out.push(record)
  }
  return out
}

export type SqlitePredictionStoreOptions = {
  now?: () => number
  fileName?: string
}

/**
 * PredictionStore on SQLite:
 *
 * - `price_data`: one row per tick
 * - `predictions`: one row per forecast; `verified_at IS NULL` marks pending
 * - `latest_prediction.json` beside the database: the most recently published forecast
 *
 * better-sqlite3 runs every statement synchronously on one connection, so
 * writes are serialized.
 */
export class SqlitePredictionStore implements PredictionStore {
  readonly databasePath: string
  private readonly db: Database.Database
  private readonly now: () => number
  private closed = false

  private readonly insertTickStmt: Database.Statement<[number, number, number, number]>
  private readonly insertStmt: Database.Statement<[string, number, number, number, string, number, string, number]>
  private readonly existsStmt: Database.Statement<[string], { id: string }>
  private readonly verifyStmt: Database.Statement<[number, number, number, string]>
  private readonly byIdStmt: Database.Statement<[string], PredictionRow>
  private readonly pendingDueStmt: Database.Statement<[number], PredictionRow>
  private readonly recentStmt: Database.Statement<[number], PredictionRow>
  private readonly statsStmt: Database.Statement<[number, number], StatsRow>
  private readonly accuraciesStmt: Database.Statement<[number], { accuracy: number }>

  private constructor(readonly dataDir: string, db: Database.Database, databasePath: string, options: SqlitePredictionStoreOptions) {
    this.db = db
    this.databasePath = databasePath
    this.now = options.now ?? Date.now

    this.insertTickStmt = db.prepare<[number, number, number, number]>('INSERT INTO price_data (timestamp, price, bid, ask) VALUES (?, ?, ?, ?)')
    this.insertStmt = db.prepare<[string, number, number, number, string, number, string, number]>(`
      INSERT INTO predictions (id, timestamp, current_price, predicted_price, signal, confidence, method, target_time)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `)
    this.existsStmt = db.prepare<[string], { id: string }>('SELECT id FROM predictions WHERE id = ?')
    this.verifyStmt = db.prepare<[number, number, number, string]>(`
      UPDATE predictions SET actual_price = ?, accuracy = ?, verified_at = ?
      WHERE id = ? AND verified_at IS NULL
    `)
    this.byIdStmt = db.prepare<[string], PredictionRow>('SELECT * FROM predictions WHERE id = ?')
    this.pendingDueStmt = db.prepare<[number], PredictionRow>(`
      SELECT * FROM predictions
      WHERE verified_at IS NULL AND target_time <= ?
      ORDER BY timestamp ASC
    `)
    this.recentStmt = db.prepare<[number], PredictionRow>('SELECT * FROM predictions ORDER BY timestamp DESC, rowid DESC LIMIT ?')
    this.statsStmt = db.prepare<[number, number], StatsRow>(`
      SELECT
        COUNT(*) AS count,
        AVG(accuracy) AS avg_accuracy,
        COUNT(CASE WHEN accuracy > ? THEN 1 END) AS good
      FROM predictions
      WHERE verified_at IS NOT NULL AND timestamp >= ?
    `)
    this.accuraciesStmt = db.prepare<[number], { accuracy: number }>(`
      SELECT accuracy FROM predictions
      WHERE verified_at IS NOT NULL
      ORDER BY verified_at DESC, rowid DESC
      LIMIT ?
    `)
  }

  /**
   * Creates the data directory and schema if needed. Throws when the database
   * cannot be opened.
   */
  static open(dataDir: string, options: SqlitePredictionStoreOptions = {}): SqlitePredictionStore {
    fs.mkdirSync(dataDir, { recursive: true })
    const databasePath = path.join(dataDir, options.fileName ?? 'forecasts.db')

    const db = new Database(databasePath)
    try {
      db.pragma('journal_mode = WAL')
      db.pragma('synchronous = NORMAL')
      db.exec(SCHEMA)
      const store = new SqlitePredictionStore(dataDir, db, databasePath, options)
      console.log(`[Store] Opened ${databasePath}`)
      return store
    } catch (err) {
      db.close()
      throw err
    }
  }

  get latestPath(): string {
    return path.join(this.dataDir, 'latest_prediction.json')
  }

  async appendTick(sample: PriceSample): Promise<void> {
    this.assertOpen()
    this.insertTickStmt.run(sample.timestamp, sample.price, sample.bid, sample.ask)
  }

  async insert(record: ForecastRecord): Promise<void> {
    this.assertOpen()
    if (this.existsStmt.get(record.id)) {
      throw new Error(`Forecast ${record.id} already stored`)
    }
    if (record.status !== 'pending') {
      throw new Error(`Forecast ${record.id} must be stored as pending`)
    }

    this.insertStmt.run(
      record.id,
      record.createdAt,
      record.currentPrice,
      record.predictedPrice,
      record.signal,
      record.confidence,
      record.method,
      record.targetTime
    )
  }

  async markVerified(id: string, outcome: VerificationOutcome): Promise<ForecastRecord | null> {
    this.assertOpen()
    const result = this.verifyStmt.run(outcome.actualPrice, outcome.accuracy, outcome.verifiedAt, id)
    if (result.changes === 0) return null

    const row = this.byIdStmt.get(id)
    return row ? toRecord(row) : null
  }

  async pendingDue(now: number): Promise<ForecastRecord[]> {
    this.assertOpen()
    return toRecords(this.pendingDueStmt.all(now))
  }

  async recent(limit: number): Promise<ForecastRecord[]> {
    this.assertOpen()
    if (limit <= 0) return []
    return toRecords(this.recentStmt.all(limit))
  }

  async statsSince(since: number): Promise<PredictionStats> {
    this.assertOpen()
    const row = this.statsStmt.get(GOOD_PREDICTION_THRESHOLD, since)
    if (!row || row.count === 0 || row.avg_accuracy === null) {
      return { count: 0, avgAccuracy: 0, goodPredictionRate: 0 }
    }
    return { count: row.count, avgAccuracy: row.avg_accuracy, goodPredictionRate: row.good / row.count }
  }

  async statsLast24h(now: number = this.now()): Promise<PredictionStats> {
    return this.statsSince(now - DAY_MS)
  }

  // Oldest first among the `limit` most recently verified.
  async recentAccuracies(limit: number): Promise<number[]> {
    this.assertOpen()
    if (limit <= 0) return []
    return this.accuraciesStmt
      .all(limit)
      .map((r) => r.accuracy)
      .reverse()
  }

  async publishLatest(record: ForecastRecord): Promise<void> {
    this.assertOpen()
    const tmp = `${this.latestPath}.tmp`
    await fs.promises.writeFile(tmp, JSON.stringify(record, null, 2), 'utf8')
    await fs.promises.rename(tmp, this.latestPath)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.db.close()
    console.log('[Store] Closed')
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('Prediction store is closed')
  }
}
