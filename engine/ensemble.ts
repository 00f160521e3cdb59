import Decimal from 'decimal.js'
import type { PredictorOutput, PredictorTier, Signal } from './types'

// Prior weight per predictor tier. Renormalized over the tiers that answered.
export const DEFAULT_TIER_WEIGHTS: Readonly<Record<PredictorTier, number>> = {
  lightweight: 0.3,
  statistical: 0.4,
  deep: 0.3
}

export type SignalThresholds = {
  strong: number          // |pct change| above this is a strong call
  weak: number            // |pct change| at or below this is Flat
  strongBonus: number
  flatPenalty: number
  maxConfidence: number   // cap after the strong bonus
  minConfidence: number   // floor after the flat penalty
}

export const DEFAULT_SIGNAL_THRESHOLDS: Readonly<SignalThresholds> = {
  strong: 0.002,   // 0.2%
  weak: 0.0005,    // 0.05%
  strongBonus: 0.2,
  flatPenalty: 0.2,
  maxConfidence: 0.9,
  minConfidence: 0.3
}

export type TierOutput = {
  tier: PredictorTier
  name: string
  output: PredictorOutput | null
}

export type EnsembleEstimate = {
  price: number
  confidence: number
  contributors: string[]
}

export type SignalResult = {
  signal: Signal
  confidence: number
  priceChange: number
  priceChangePct: number
}

export type EnsembleForecast = EnsembleEstimate & SignalResult

export class EnsembleCombiner {
  private readonly weights: Readonly<Record<PredictorTier, number>>
  private readonly thresholds: Readonly<SignalThresholds>

  constructor(
    weights: Partial<Record<PredictorTier, number>> = {},
    thresholds: Partial<SignalThresholds> = {}
  ) {
    this.weights = { ...DEFAULT_TIER_WEIGHTS, ...weights }
    this.thresholds = { ...DEFAULT_SIGNAL_THRESHOLDS, ...thresholds }
  }

  /**
   * Weighted mean over the predictors that produced a usable output. Confidence
   * is the summed prior weight of the contributors, capped at 1. Returns `null`
   * when nobody contributed.
   */
  estimate(outputs: readonly TierOutput[]): EnsembleEstimate | null {
    let weighted = new Decimal(0)
    let total = new Decimal(0)
    const contributors: string[] = []

    for (const { tier, name, output } of outputs) {
      if (!output || !Number.isFinite(output.price)) continue
      const weight = this.weights[tier]
      if (!(weight > 0)) continue

      weighted = weighted.plus(new Decimal(output.price).times(weight))
      total = total.plus(weight)
      contributors.push(name)
    }

    if (total.isZero()) return null

    return {
      price: weighted.div(total).toNumber(),
      confidence: Decimal.min(total, 1).toNumber(),
      contributors
    }
  }

  deriveSignal(predictedPrice: number, currentPrice: number, confidence: number): SignalResult {
    const t = this.thresholds
    const change = new Decimal(predictedPrice).minus(currentPrice)
    const pct = change.div(currentPrice)

    let signal: Signal
    let adjusted = confidence

    if (pct.gt(t.strong)) {
      signal = 'StrongBullish'
      adjusted = Math.min(t.maxConfidence, confidence + t.strongBonus)
    } else if (pct.gt(t.weak)) {
      signal = 'Bullish'
    } else if (pct.lt(-t.strong)) {
      signal = 'StrongBearish'
      adjusted = Math.min(t.maxConfidence, confidence + t.strongBonus)
    } else if (pct.lt(-t.weak)) {
      signal = 'Bearish'
    } else {
      signal = 'Flat'
      adjusted = Math.max(t.minConfidence, confidence - t.flatPenalty)
    }

    return {
      signal,
      confidence: adjusted,
      priceChange: change.toNumber(),
      priceChangePct: pct.toNumber()
    }
  }

  combine(outputs: readonly TierOutput[], currentPrice: number): EnsembleForecast | null {
    if (!(currentPrice > 0)) return null
    const estimate = this.estimate(outputs)
    if (!estimate) return null
    return { ...estimate, ...this.deriveSignal(estimate.price, currentPrice, estimate.confidence) }
  }

  getWeights(): Record<PredictorTier, number> {
    return { ...this.weights }
  }
}
