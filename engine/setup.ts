import { BridgeTerminal } from './bridgeTerminal'
import type { AppConfig } from './config'
import { PredictorRegistry, TechnicalPredictor, TrendRegressionPredictor } from './predictors'
import { loadSequencePredictor } from './sequencePredictor'
import { SimulatedTerminal } from './simulatedTerminal'
import type { MarketTerminal } from './terminal'

export function createTerminal(config: AppConfig): MarketTerminal {
  if (config.terminal === 'simulated') {
    return new SimulatedTerminal()
  }
  return new BridgeTerminal({
    url: config.terminalUrl,
    connectTimeoutMs: config.terminalTimeoutMs,
    requestTimeoutMs: config.terminalTimeoutMs
  })
}

/**
 * Attempts every predictor tier. Tiers whose construction fails (bad options,
 * optional library missing) are reported by `getUnavailable()` and skipped.
 */
export async function createPredictorRegistry(config: AppConfig): Promise<PredictorRegistry> {
  const registry = new PredictorRegistry()
  await registry.tryRegister('technical', () => new TechnicalPredictor())
  await registry.tryRegister('trend-regression', () =>
    new TrendRegressionPredictor({ horizonMs: config.horizonMinutes * 60 * 1000, minSamples: config.minDataPoints })
  )
  if (config.sequencePredictor) {
    await registry.tryRegister('lstm-sequence', () => loadSequencePredictor({ minSamples: config.minDataPoints }))
  }
  return registry
}
