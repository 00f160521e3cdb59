import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConnectionManager } from './connectionManager'
import { ForecastEngine } from './engine'
import { answerQuery, parseQuery } from './ipc'
import { SqlitePredictionStore } from './predictionStore'
import { PredictorRegistry } from './predictors'
import { SimulatedTerminal } from './simulatedTerminal'

describe('parseQuery', () => {
  it('accepts known query types', () => {
    expect(parseQuery({ type: 'getStats' })).toEqual({ type: 'getStats', limit: undefined })
    expect(parseQuery({ type: 'getRecentPredictions', limit: 5 })).toEqual({ type: 'getRecentPredictions', limit: 5 })
  })

  it('ignores anything else', () => {
    expect(parseQuery(null)).toBeNull()
    expect(parseQuery('getStats')).toBeNull()
    expect(parseQuery({ kind: 'getStats' })).toBeNull()
    expect(parseQuery({ type: 'shutdown' })).toBeNull()
    expect(parseQuery({ type: 'getRecentPredictions', limit: '5' })).toEqual({ type: 'getRecentPredictions', limit: undefined })
  })
})

describe('answerQuery', () => {
  let dir: string
  let store: SqlitePredictionStore
  let engine: ForecastEngine

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'forecast-ipc-'))
    store = SqlitePredictionStore.open(dir)
    engine = new ForecastEngine({
      connection: new ConnectionManager(new SimulatedTerminal()),
      store,
      predictors: new PredictorRegistry()
    })
  })

  afterEach(async () => {
    await store.close()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('replies with the matching message type', async () => {
    const sent: unknown[] = []
    const send = (message: unknown) => sent.push(message)

    await answerQuery(engine, { type: 'getLatestPrediction' }, send)
    await answerQuery(engine, { type: 'getRecentPredictions', limit: 3 }, send)
    await answerQuery(engine, { type: 'getConnectionStatus' }, send)

    expect(sent[0]).toEqual({ type: 'latestPrediction', data: null })
    expect(sent[1]).toEqual({ type: 'recentPredictions', data: [] })
    expect(sent[2]).toMatchObject({ type: 'connectionStatus', data: { state: 'DISCONNECTED', connected: false } })
  })

  it('reports zeroed stats before any verification', async () => {
    const sent: unknown[] = []
    await answerQuery(engine, { type: 'getStats' }, (message) => sent.push(message))

    expect(sent).toEqual([
      {
        type: 'stats',
        data: {
          count: 0,
          avgAccuracy: 0,
          goodPredictionRate: 0,
          recentAccuracy: 0,
          recentSamples: 0,
          historySize: 0,
          predictors: [],
          unavailablePredictors: {},
          running: false
        }
      }
    ])
  })
})
