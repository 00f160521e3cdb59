import { loadConfig } from './config'
import { ConnectionManager } from './connectionManager'
import { ForecastEngine } from './engine'
import { answerQuery, parseQuery } from './ipc'
import { SqlitePredictionStore } from './predictionStore'
import { createPredictorRegistry, createTerminal } from './setup'

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

async function main(): Promise<void> {
  const config = loadConfig()
  console.log(`[Engine] Data directory: ${config.dataDir}`)
  console.log(`[Engine] Terminal: ${config.terminal === 'bridge' ? config.terminalUrl : 'simulated'}`)
  if (config.fastMode) console.log('[Engine] Fast mode enabled')

  // the only fatal startup step
  const store = SqlitePredictionStore.open(config.dataDir)

  const connection = new ConnectionManager(createTerminal(config), {
    preferredSymbols: config.goldSymbols,
    symbolKeywords: config.symbolKeywords
  })
  connection.on('stateChange', ({ oldState, newState }) => {
    process.send?.({ type: 'connectionState', data: { oldState, newState } })
  })

  const predictors = await createPredictorRegistry(config)

  const engine = new ForecastEngine(
    { connection, store, predictors },
    {
      horizonMs: config.horizonMinutes * 60 * 1000,
      collectionIntervalMs: config.collectionIntervalMs,
      minDataPoints: config.minDataPoints,
      historySize: config.historySize,
      verifyIntervalMs: config.verifyIntervalMs,
      verifyToleranceMs: config.verifyToleranceMs,
      symbolRetryMs: config.symbolRetryMs
    }
  )

  engine.on('prediction', (record) => process.send?.({ type: 'prediction', data: record }))
  engine.on('verified', (record) => process.send?.({ type: 'verified', data: record }))

  process.on('message', (msg: unknown) => {
    const query = parseQuery(msg)
    if (!query) return
    answerQuery(engine, query, (message) => process.send?.(message)).catch((err) => {
      console.error(`[Engine] ${query.type} failed:`, errorMessage(err))
    })
  })

  let shuttingDown = false
  const shutdown = (code: number) => {
    if (shuttingDown) return
    shuttingDown = true
    void engine
      .stop()
      .catch((err) => console.error('[Engine] Shutdown error:', errorMessage(err)))
      .finally(() => process.exit(code))
  }

  process.on('disconnect', () => shutdown(0))
  process.on('SIGTERM', () => shutdown(0))
  process.on('SIGINT', () => shutdown(0))

  engine.start()
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    console.error('[Engine] Unhandled Rejection:', reason)
  })

  main().catch((err) => {
    console.error('[Engine] Startup failed:', errorMessage(err))
    process.exit(1)
  })
}
