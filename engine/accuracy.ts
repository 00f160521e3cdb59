import { closestSample } from './priceHistory'
import type { PriceSample } from './types'

export const DEFAULT_VERIFY_TOLERANCE_MS = 5 * 60 * 1000
export const GOOD_PREDICTION_THRESHOLD = 0.6

/**
 * Grades a forecast in [0, 1]. Direction dominates: a correct direction scores
 * at least 0.5, a wrong one at most 0.5. Within a direction, the closer the
 * predicted move is to the realized move, the further from 0.5 the score.
 */
export function computeAccuracy(predicted: number, actual: number, baseline: number): number {
  if (actual === baseline) return 0.5

  const predictedDir = Math.sign(predicted - baseline)
  const actualDir = Math.sign(actual - baseline)

  const predictedMove = Math.abs(predicted - baseline)
  const actualMove = Math.abs(actual - baseline)
  const priceAccuracy = 1 - Math.min(Math.abs(predictedMove - actualMove) / actualMove, 1)

  if (predictedDir === actualDir) {
    return 0.5 + 0.5 * priceAccuracy
  }
  return 0.5 * (1 - priceAccuracy)
}

/**
 * Price of the sample nearest to `targetTime`, or `null` when the nearest one
 * is `toleranceMs` or further away.
 */
export function findActualPrice(
  samples: readonly PriceSample[],
  targetTime: number,
  toleranceMs: number = DEFAULT_VERIFY_TOLERANCE_MS
): number | null {
  const closest = closestSample(samples, targetTime)
  if (!closest) return null
  return Math.abs(closest.timestamp - targetTime) < toleranceMs ? closest.price : null
}

export function isGoodPrediction(accuracy: number): boolean {
  return accuracy > GOOD_PREDICTION_THRESHOLD
}
