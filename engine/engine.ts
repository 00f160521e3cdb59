import { EventEmitter } from 'events'
import { v4 as uuidv4 } from 'uuid'
import { DEFAULT_VERIFY_TOLERANCE_MS, computeAccuracy, findActualPrice, isGoodPrediction } from './accuracy'
import type { ConnectionManager, ConnectionStatus } from './connectionManager'
import { EnsembleCombiner } from './ensemble'
import type { PredictionStore } from './predictionStore'
import { PriceHistory } from './priceHistory'
import type { PredictorRegistry } from './predictors'
import { sleep } from './sleep'
import type { ForecastRecord, PredictionStats, PriceQuote, PriceSample } from './types'

const RECENT_ACCURACY_WINDOW = 10

export type EngineOptions = {
  horizonMs: number
  collectionIntervalMs: number
  minDataPoints: number
  historySize: number
  verifyIntervalMs: number
  verifyToleranceMs: number
  symbolRetryMs: number
  quoteRetryMs: number
  // how often the predictor loop checks whether a horizon has elapsed
  predictionCheckMs: number
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  horizonMs: 5 * 60 * 1000,
  collectionIntervalMs: 5000,
  minDataPoints: 20,
  historySize: 500,
  verifyIntervalMs: 60 * 1000,
  verifyToleranceMs: DEFAULT_VERIFY_TOLERANCE_MS,
  symbolRetryMs: 30 * 1000,
  quoteRetryMs: 2000,
  predictionCheckMs: 1000
}

export type EngineDeps = {
  connection: ConnectionManager
  store: PredictionStore
  predictors: PredictorRegistry
  combiner?: EnsembleCombiner
  now?: () => number
}

export type CollectResult =
  | { status: 'collected'; sample: PriceSample }
  | { status: 'no-symbol' }
  | { status: 'no-quote'; symbol: string }
  | { status: 'rejected'; reason: string }

export type PredictResult =
  | { status: 'created'; record: ForecastRecord }
  | { status: 'insufficient-data'; samples: number; required: number }
  | { status: 'abstained' }

export type VerifyResult = {
  due: number
  verified: ForecastRecord[]
  unresolved: number
}

export type EngineStats = PredictionStats & {
  recentAccuracy: number
  recentSamples: number
  historySize: number
  predictors: string[]
  unavailablePredictors: Record<string, string>
  running: boolean
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function toSample(quote: PriceQuote, timestamp: number): PriceSample | null {
  // markets without a last trade still quote a bid
  const price = quote.last > 0 ? quote.last : quote.bid
  if (!Number.isFinite(price) || price <= 0) return null
  return { timestamp, price, bid: quote.bid, ask: quote.ask }
}

/**
 * Runs the collector, predictor and verifier loops over shared state.
 *
 * Events: `started`, `stopped`, `sample` (PriceSample), `prediction`
 * (ForecastRecord), `verified` (ForecastRecord).
 */
export class ForecastEngine extends EventEmitter {
  readonly options: EngineOptions
  readonly history: PriceHistory
  private readonly connection: ConnectionManager
  private readonly store: PredictionStore
  private readonly predictors: PredictorRegistry
  private readonly combiner: EnsembleCombiner
  private readonly now: () => number

  private abort: AbortController | null = null
  private loops: Promise<void>[] = []
  private stopping: Promise<void> | null = null
  private latest: ForecastRecord | null = null
  private lastPredictionAt: number | null = null

  constructor(deps: EngineDeps, options: Partial<EngineOptions> = {}) {
    super()
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options }
    const { minDataPoints } = this.options
    if (!Number.isInteger(minDataPoints) || minDataPoints < 1) {
      throw new RangeError(`minDataPoints must be a positive integer, got ${minDataPoints}`)
    }
    this.history = new PriceHistory(this.options.historySize)
    this.connection = deps.connection
    this.store = deps.store
    this.predictors = deps.predictors
    this.combiner = deps.combiner ?? new EnsembleCombiner()
    this.now = deps.now ?? Date.now
  }

  start(): void {
    if (this.abort) {
      console.warn('[Engine] Already running')
      return
    }
    if (this.stopping) {
      console.warn('[Engine] Stopped engines cannot be restarted')
      return
    }

    const abort = new AbortController()
    this.abort = abort

    if (this.predictors.size === 0) {
      console.warn('[Engine] No predictors available, every forecast round will abstain')
    }

    console.log(
      `[Engine] Starting: horizon ${this.options.horizonMs / 60000}m, ` +
        `collect every ${this.options.collectionIntervalMs / 1000}s, ` +
        `min ${this.options.minDataPoints} samples, ${this.predictors.size} predictors`
    )

    this.loops = [
      this.runLoop('Collector', abort.signal, this.options.collectionIntervalMs, async () => {
        const result = await this.collectOnce()
        if (result.status === 'no-symbol') return this.options.symbolRetryMs
        if (result.status === 'no-quote') return this.options.quoteRetryMs
        return this.options.collectionIntervalMs
      }),
      this.runLoop('Predictor', abort.signal, this.options.predictionCheckMs, async () => {
        const last = this.lastPredictionAt
        if (last !== null && this.now() - last < this.options.horizonMs) {
          return this.options.predictionCheckMs
        }
        const result = await this.predictOnce()
        if (result.status !== 'insufficient-data') this.lastPredictionAt = this.now()
        return this.options.predictionCheckMs
      }),
      this.runLoop('Verifier', abort.signal, this.options.verifyIntervalMs, async () => {
        await this.verifyOnce()
        return this.options.verifyIntervalMs
      })
    ]

    this.emit('started')
  }

  /**
   * Signals every loop, waits for in-flight iterations to finish, then closes
   * the terminal connection and the store. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown()
    }
    return this.stopping
  }

  isRunning(): boolean {
    return this.abort !== null && !this.abort.signal.aborted
  }

  async collectOnce(): Promise<CollectResult> {
    const symbol = await this.connection.getSymbol()
    if (!symbol) {
      console.warn('[Collector] No gold symbol available, waiting...')
      return { status: 'no-symbol' }
    }

    const quote = await this.connection.getPrice(symbol, this.abort?.signal)
    if (!quote) {
      console.warn(`[Collector] Quote for ${symbol} unavailable, retrying shortly`)
      return { status: 'no-quote', symbol }
    }

    const sample = toSample(quote, this.now())
    if (!sample) {
      console.warn(`[Collector] Unusable quote for ${symbol}: bid=${quote.bid} last=${quote.last}`)
      return { status: 'rejected', reason: 'no usable price' }
    }

    if (!this.history.push(sample)) {
      console.warn('[Collector] Sample older than history head, dropped')
      return { status: 'rejected', reason: 'out of order' }
    }

    await this.store.appendTick(sample)
    this.emit('sample', sample)
    return { status: 'collected', sample }
  }

  async predictOnce(): Promise<PredictResult> {
    const required = this.options.minDataPoints
    if (this.history.length < required) {
      console.log(`[Predictor] Waiting for data: ${this.history.length}/${required}`)
      return { status: 'insufficient-data', samples: this.history.length, required }
    }

    const snapshot = this.history.snapshot()
    const current = snapshot[snapshot.length - 1]
    const outputs = await this.predictors.predictAll(snapshot)
    const forecast = this.combiner.combine(outputs, current.price)

    if (!forecast) {
      console.warn('[Predictor] No predictor produced a forecast, abstaining')
      return { status: 'abstained' }
    }

    const createdAt = this.now()
    const record: ForecastRecord = {
      id: uuidv4(),
      createdAt,
      currentPrice: current.price,
      predictedPrice: forecast.price,
      signal: forecast.signal,
      confidence: forecast.confidence,
      method: `ensemble:${forecast.contributors.join('+')}`,
      targetTime: createdAt + this.options.horizonMs,
      status: 'pending'
    }

    await this.store.insert(record)
    this.latest = record
    await this.publishLatest(record)

    console.log(
      `[Predictor] ${current.price.toFixed(2)} -> ${record.predictedPrice.toFixed(2)} ` +
        `${record.signal} (confidence ${(record.confidence * 100).toFixed(1)}%)`
    )
    this.emit('prediction', { ...record })
    return { status: 'created', record: { ...record } }
  }

  async verifyOnce(): Promise<VerifyResult> {
    const now = this.now()
    const due = await this.store.pendingDue(now)
    if (due.length === 0) return { due: 0, verified: [], unresolved: 0 }

    const samples = this.history.snapshot()
    const verified: ForecastRecord[] = []
    let unresolved = 0

    for (const record of due) {
      const actualPrice = findActualPrice(samples, record.targetTime, this.options.verifyToleranceMs)
      if (actualPrice === null) {
        unresolved++
        continue
      }

      const accuracy = computeAccuracy(record.predictedPrice, actualPrice, record.currentPrice)
      const updated = await this.store.markVerified(record.id, { actualPrice, accuracy, verifiedAt: now })
      if (!updated) continue

      verified.push(updated)
      console.log(
        `[Verifier] Forecast ${record.id}: accuracy ${(accuracy * 100).toFixed(1)}%` +
          (isGoodPrediction(accuracy) ? ' (good)' : '')
      )

      if (this.latest?.id === updated.id) {
        this.latest = updated
        await this.publishLatest(updated)
      }
      this.emit('verified', { ...updated })
    }

    if (unresolved > 0) {
      console.log(`[Verifier] ${unresolved} due forecast(s) have no sample within tolerance`)
    }
    return { due: due.length, verified, unresolved }
  }

  getLatestPrediction(): ForecastRecord | null {
    return this.latest ? { ...this.latest } : null
  }

  async getRecentPredictions(limit = 20): Promise<ForecastRecord[]> {
    try {
      return await this.store.recent(limit)
    } catch (err) {
      console.error('[Engine] Failed to read recent predictions:', errorMessage(err))
      return []
    }
  }

  async getStats(): Promise<EngineStats> {
    const base: EngineStats = {
      count: 0,
      avgAccuracy: 0,
      goodPredictionRate: 0,
      recentAccuracy: 0,
      recentSamples: 0,
      historySize: this.history.length,
      predictors: this.predictors.list().map((p) => p.name),
      unavailablePredictors: this.predictors.getUnavailable(),
      running: this.isRunning()
    }

    try {
      const stats = await this.store.statsLast24h(this.now())
      const recent = await this.store.recentAccuracies(RECENT_ACCURACY_WINDOW)
      const recentAccuracy = recent.length > 0 ? recent.reduce((a, b) => a + b, 0) / recent.length : 0
      return { ...base, ...stats, recentAccuracy, recentSamples: recent.length }
    } catch (err) {
      console.error('[Engine] Failed to compute stats:', errorMessage(err))
      return base
    }
  }

  getConnectionStatus(): ConnectionStatus {
    return this.connection.getConnectionStatus()
  }

  // A failed iteration is logged and followed by the loop's regular sleep.
  private async runLoop(
    name: string,
    signal: AbortSignal,
    intervalMs: number,
    iteration: () => Promise<number>
  ): Promise<void> {
    console.log(`[${name}] Loop started`)

    while (!signal.aborted) {
      let delay = intervalMs
      try {
        delay = await iteration()
      } catch (err) {
        console.error(`[${name}] Iteration failed:`, errorMessage(err))
      }
      await sleep(delay, signal)
    }

    console.log(`[${name}] Loop stopped`)
  }

  private async publishLatest(record: ForecastRecord): Promise<void> {
    try {
      await this.store.publishLatest(record)
    } catch (err) {
      console.error('[Engine] Failed to write latest prediction:', errorMessage(err))
    }
  }

  private async shutdown(): Promise<void> {
    console.log('[Engine] Stopping...')
    this.abort?.abort()
    await Promise.all(this.loops)
    this.loops = []

    await this.connection.close()
    try {
      await this.store.close()
    } catch (err) {
      console.error('[Engine] Failed to close store:', errorMessage(err))
    }

    console.log('[Engine] Stopped')
    this.emit('stopped')
  }
}
