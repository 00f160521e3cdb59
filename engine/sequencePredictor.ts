import type { Sequential } from '@tensorflow/tfjs'
import type { Predictor } from './predictors'
import type { PredictorOutput, PredictorTier, PriceSample } from './types'

type TensorFlow = typeof import('@tensorflow/tfjs')

// (window, next price) pairs needed before the first fit
const MIN_TRAINING_PAIRS = 20

export type SequencePredictorOptions = {
  sequenceLength?: number
  minSamples?: number
  // most recent samples used for the one-off fit
  trainingWindow?: number
  epochs?: number
  maxChange?: number
  confidence?: number
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

/**
 * LSTM over z-scored prices that predicts the next sample. Trained once, on
 * the first history long enough to give it `MIN_TRAINING_PAIRS` examples.
 */
export class SequencePredictor implements Predictor {
  readonly name = 'lstm-sequence'
  readonly tier: PredictorTier = 'deep'
  private readonly model: Sequential
  private readonly sequenceLength: number
  private readonly minSamples: number
  private readonly trainingWindow: number
  private readonly epochs: number
  private readonly maxChange: number
  private readonly confidence: number
  private trained = false

  constructor(private readonly tf: TensorFlow, options: SequencePredictorOptions = {}) {
    this.sequenceLength = options.sequenceLength ?? 10
    this.minSamples = Math.max(options.minSamples ?? 30, this.sequenceLength + 1)
    this.trainingWindow = options.trainingWindow ?? 200
    this.epochs = options.epochs ?? 50
    this.maxChange = options.maxChange ?? 0.01
    this.confidence = options.confidence ?? 0.7

    if (this.sequenceLength < 2) {
      throw new RangeError(`Sequence length must be at least 2, got ${this.sequenceLength}`)
    }

    const model = tf.sequential()
    model.add(tf.layers.lstm({ units: 32, inputShape: [this.sequenceLength, 1] }))
    model.add(tf.layers.dense({ units: 16, activation: 'relu' }))
    model.add(tf.layers.dropout({ rate: 0.2 }))
    model.add(tf.layers.dense({ units: 1 }))
    model.compile({ optimizer: tf.train.adam(0.001), loss: 'meanSquaredError' })
    this.model = model
  }

  get isTrained(): boolean {
    return this.trained
  }

  async predict(history: readonly PriceSample[]): Promise<PredictorOutput | null> {
    if (history.length < this.minSamples) return null

    const prices = history.map((s) => s.price)
    const mean = prices.reduce((a, b) => a + b, 0) / prices.length
    const std = Math.sqrt(prices.reduce((acc, p) => acc + (p - mean) ** 2, 0) / prices.length)
    if (!(std > 0)) return null

    const normalized = prices.map((p) => (p - mean) / std)

    if (!this.trained) {
      const trainingSet = normalized.slice(-this.trainingWindow)
      if (trainingSet.length - this.sequenceLength < MIN_TRAINING_PAIRS) return null
      await this.fit(trainingSet)
    }

    const input = normalized.slice(-this.sequenceLength).map((v) => [v])
    const output = this.tf.tidy(() => {
      const prediction = this.model.predict(this.tf.tensor3d([input], [1, this.sequenceLength, 1]))
      const tensor = Array.isArray(prediction) ? prediction[0] : prediction
      return tensor.dataSync()[0]
    })

    const predicted = output * std + mean
    if (!Number.isFinite(predicted)) return null

    const current = prices[prices.length - 1]
    const change = clamp((predicted - current) / current, -this.maxChange, this.maxChange)
    return { price: current * (1 + change), confidence: this.confidence }
  }

  dispose(): void {
    this.model.dispose()
  }

  private async fit(series: number[]): Promise<void> {
    const xs: number[][][] = []
    const ys: number[][] = []
    for (let i = 0; i + this.sequenceLength < series.length; i++) {
      xs.push(series.slice(i, i + this.sequenceLength).map((v) => [v]))
      ys.push([series[i + this.sequenceLength]])
    }

    const inputs = this.tf.tensor3d(xs, [xs.length, this.sequenceLength, 1])
    const targets = this.tf.tensor2d(ys, [ys.length, 1])
    try {
      const result = await this.model.fit(inputs, targets, {
        epochs: this.epochs,
        batchSize: 32,
        shuffle: false,
        verbose: 0
      })
      const loss = result.history.loss.at(-1)
      this.trained = true
      console.log(
        `[Predictors] ${this.name} trained on ${xs.length} sequences` +
          (typeof loss === 'number' ? `, loss ${loss.toFixed(6)}` : '')
      )
    } finally {
      inputs.dispose()
      targets.dispose()
    }
  }
}

/**
 * Loads TensorFlow.js on its pure-JS backend and builds the predictor. Throws
 * when the optional dependency is not installed.
 */
export async function loadSequencePredictor(options: SequencePredictorOptions = {}): Promise<SequencePredictor> {
  const tf = await import('@tensorflow/tfjs')
  if (!(await tf.setBackend('cpu'))) {
    throw new Error('TensorFlow.js cpu backend unavailable')
  }
  await tf.ready()
  return new SequencePredictor(tf, options)
}
