export type PriceSample = {
  readonly timestamp: number
  readonly price: number
  readonly bid: number
  readonly ask: number
}

export type PriceQuote = {
  symbol: string
  bid: number
  ask: number
  last: number
  time: number
  volume: number
}

export type Signal = 'StrongBullish' | 'Bullish' | 'Flat' | 'Bearish' | 'StrongBearish'

export type PredictorTier = 'lightweight' | 'statistical' | 'deep'

export type PredictorOutput = {
  price: number
  confidence: number
}

export type ForecastStatus = 'pending' | 'verified'

export type ForecastRecord = {
  id: string
  createdAt: number
  currentPrice: number
  predictedPrice: number
  signal: Signal
  confidence: number
  method: string
  targetTime: number
  status: ForecastStatus
  actualPrice?: number
  accuracy?: number
  verifiedAt?: number
}

export type VerificationOutcome = {
  actualPrice: number
  accuracy: number
  verifiedAt: number
}

export type PredictionStats = {
  count: number
  avgAccuracy: number
  goodPredictionRate: number
}
