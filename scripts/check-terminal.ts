import { loadConfig } from '../engine/config'
import { ConnectionManager } from '../engine/connectionManager'
import { createTerminal } from '../engine/setup'
import { sleep } from '../engine/sleep'

const config = loadConfig()
const connection = new ConnectionManager(createTerminal(config), {
  preferredSymbols: config.goldSymbols,
  symbolKeywords: config.symbolKeywords
})

async function check(): Promise<boolean> {
  console.log(`[Check] Terminal: ${config.terminal === 'bridge' ? config.terminalUrl : 'simulated'}`)

  if (!(await connection.ensureConnection())) {
    console.error('[Check] Could not connect')
    return false
  }
  console.log('[Check] Connected')

  const symbol = await connection.getSymbol()
  if (!symbol) {
    console.error('[Check] No gold symbol found')
    return false
  }
  console.log(`[Check] Symbol: ${symbol}`)

  for (let i = 1; i <= 5; i++) {
    const quote = await connection.getPrice(symbol)
    if (!quote) {
      console.error(`[Check] Quote ${i}/5 failed`)
      return false
    }
    const price = quote.last > 0 ? quote.last : quote.bid
    console.log(`[Check] ${i}/5 ${price.toFixed(2)} (bid ${quote.bid}, ask ${quote.ask})`)
    await sleep(1000)
  }

  console.log('[Check] Status:', connection.getConnectionStatus())
  return true
}

check()
  .then(async (ok) => {
    await connection.close()
    console.log(ok ? '[Check] Terminal OK' : '[Check] Terminal check failed')
    process.exit(ok ? 0 : 1)
  })
  .catch(async (err) => {
    console.error('[Check] Error:', err)
    await connection.close()
    process.exit(1)
  })
