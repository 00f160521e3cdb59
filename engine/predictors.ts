import { RSI, SMA, lastValue, pctReturns, stdDev } from './indicators'
import type { TierOutput } from './ensemble'
import type { PredictorOutput, PredictorTier, PriceSample } from './types'

/**
 * A forecasting component. Returning `null` means "abstain this round".
 */
export interface Predictor {
  readonly name: string
  readonly tier: PredictorTier
  predict(history: readonly PriceSample[]): PredictorOutput | null | Promise<PredictorOutput | null>
}

export type PredictorFactory = () => Predictor | Promise<Predictor>

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// Mean of the last `period` prices, or of all of them when there are fewer.
function trailingMean(prices: readonly number[], period: number): number {
  const n = Math.min(period, prices.length)
  return lastValue(new SMA(n), prices) ?? prices[prices.length - 1]
}

const MAX_TECHNICAL_CHANGE = 0.005   // ±0.5%

/**
 * Lightweight technical blend: moving-average trend, momentum, RSI, position in
 * the recent range and volatility.
 */
export class TechnicalPredictor implements Predictor {
  readonly name = 'technical'
  readonly tier: PredictorTier = 'lightweight'

  predict(history: readonly PriceSample[]): PredictorOutput | null {
    if (history.length < 2) return null

    const prices = history.map((s) => s.price)
    const current = prices[prices.length - 1]

    const ma5 = trailingMean(prices, 5)
    const ma10 = trailingMean(prices, 10)
    const ma20 = trailingMean(prices, 20)
    const shortTrend = ma10 !== 0 ? (ma5 - ma10) / ma10 : 0
    const longTrend = ma20 !== 0 ? (ma10 - ma20) / ma20 : 0

    let momentum5 = 0
    let momentum10 = 0
    if (prices.length >= 10) {
      const p5 = prices[prices.length - 5]
      const p10 = prices[prices.length - 10]
      momentum5 = (current - p5) / p5
      momentum10 = (current - p10) / p10
    }

    const volatility = stdDev(pctReturns(prices))

    const recent = prices.slice(-20)
    const high = Math.max(...recent)
    const low = Math.min(...recent)
    const position = high !== low ? (current - low) / (high - low) : 0.5

    const rsi = prices.length > 14 ? lastValue(new RSI(14), prices) ?? 50 : 50
    const rsiSignal = (50 - rsi) / 100

    const change = clamp(
      (shortTrend * 0.6 + longTrend * 0.4) * 0.3 +
        (momentum5 * 0.7 + momentum10 * 0.3) * 0.25 +
        rsiSignal * 0.2 +
        (0.5 - position) * 0.15 -
        volatility * 0.1,
      -MAX_TECHNICAL_CHANGE,
      MAX_TECHNICAL_CHANGE
    )

    const divergence = Math.abs(shortTrend - momentum5)
    const trendConsistency = divergence < 1 ? 1 - divergence : 0
    const rsiExtreme = Math.max(0, (Math.abs(rsi - 50) - 20) / 30)
    const positionFactor = 1 - Math.abs(position - 0.5) * 2
    const volatilityFactor = Math.max(0, 1 - volatility * 20)
    const confidence = clamp(
      trendConsistency * 0.3 + rsiExtreme * 0.25 + positionFactor * 0.25 + volatilityFactor * 0.2,
      0.3,
      0.9
    )

    return { price: current * (1 + change), confidence }
  }
}

export type TrendRegressionOptions = {
  horizonMs: number
  window?: number
  minSamples?: number
  maxChange?: number
}

/**
 * Least-squares line over the recent window, extrapolated one horizon past
 * the newest sample. Confidence follows the fit's R².
 */
export class TrendRegressionPredictor implements Predictor {
  readonly name = 'trend-regression'
  readonly tier: PredictorTier = 'statistical'
  private readonly horizonMs: number
  private readonly window: number
  private readonly minSamples: number
  private readonly maxChange: number

  constructor(options: TrendRegressionOptions) {
    if (!(options.horizonMs > 0)) {
      throw new RangeError(`Regression horizon must be positive, got ${options.horizonMs}`)
    }
    this.horizonMs = options.horizonMs
    this.window = options.window ?? 60
    this.minSamples = Math.max(3, options.minSamples ?? 10)
    this.maxChange = options.maxChange ?? 0.01
  }

  predict(history: readonly PriceSample[]): PredictorOutput | null {
    const points = history.slice(-this.window)
    if (points.length < this.minSamples) return null

    const t0 = points[0].timestamp
    const xs = points.map((s) => s.timestamp - t0)
    const ys = points.map((s) => s.price)
    const n = points.length

    const meanX = xs.reduce((a, b) => a + b, 0) / n
    const meanY = ys.reduce((a, b) => a + b, 0) / n

    let sxx = 0
    let sxy = 0
    let syy = 0
    for (let i = 0; i < n; i++) {
      const dx = xs[i] - meanX
      const dy = ys[i] - meanY
      sxx += dx * dx
      sxy += dx * dy
      syy += dy * dy
    }

    // every sample at the same instant: no slope to fit
    if (sxx === 0) return null

    const slope = sxy / sxx
    const intercept = meanY - slope * meanX
    const current = ys[n - 1]
    const projected = intercept + slope * (xs[n - 1] + this.horizonMs)

    const change = clamp((projected - current) / current, -this.maxChange, this.maxChange)
    const r2 = syy === 0 ? 1 : (sxy * sxy) / (sxx * syy)

    return { price: current * (1 + change), confidence: clamp(0.3 + 0.6 * r2, 0.3, 0.9) }
  }
}

/**
 * Predictors that could actually be constructed in this process. The ensemble
 * renormalizes over whichever tiers are present.
 */
export class PredictorRegistry {
  private readonly predictors: Predictor[] = []
  private readonly unavailable = new Map<string, string>()

  register(predictor: Predictor): void {
    if (this.predictors.some((p) => p.name === predictor.name)) {
      throw new Error(`Predictor ${predictor.name} already registered`)
    }
    this.predictors.push(predictor)
  }

  // Constructs the predictor; a factory that throws or rejects marks the tier unavailable.
  async tryRegister(name: string, factory: PredictorFactory): Promise<boolean> {
    try {
      const predictor = await factory()
      this.register(predictor)
      console.log(`[Predictors] ${predictor.name} (${predictor.tier}) available`)
      return true
    } catch (err) {
      const reason = errorMessage(err)
      this.unavailable.set(name, reason)
      console.warn(`[Predictors] ${name} unavailable: ${reason}`)
      return false
    }
  }

  list(): readonly Predictor[] {
    return this.predictors
  }

  getUnavailable(): Record<string, string> {
    return Object.fromEntries(this.unavailable)
  }

  get size() {
    return this.predictors.length
  }

  async predictAll(history: readonly PriceSample[]): Promise<TierOutput[]> {
    const results: TierOutput[] = []

    for (const predictor of this.predictors) {
      let output: PredictorOutput | null = null
      try {
        const raw = await predictor.predict(history)
        if (raw && Number.isFinite(raw.price) && raw.price > 0 && Number.isFinite(raw.confidence)) {
          output = { price: raw.price, confidence: clamp(raw.confidence, 0, 1) }
        } else if (raw) {
          console.warn(`[Predictors] ${predictor.name} returned an unusable value, abstaining`)
        }
      } catch (err) {
        console.error(`[Predictors] ${predictor.name} failed:`, errorMessage(err))
      }
      results.push({ tier: predictor.tier, name: predictor.name, output })
    }

    return results
  }
}
