import type { ForecastEngine } from './engine'

const QUERY_TYPES = ['getLatestPrediction', 'getStats', 'getConnectionStatus', 'getRecentPredictions'] as const

export type QueryMessage = {
  type: (typeof QUERY_TYPES)[number]
  limit?: number
}

function isQueryType(v: unknown): v is QueryMessage['type'] {
  return typeof v === 'string' && (QUERY_TYPES as readonly string[]).includes(v)
}

export function parseQuery(msg: unknown): QueryMessage | null {
  if (!msg || typeof msg !== 'object' || !('type' in msg)) return null
  if (!isQueryType(msg.type)) return null
  const limit = 'limit' in msg && typeof msg.limit === 'number' ? msg.limit : undefined
  return { type: msg.type, limit }
}

// Answers queries from a parent process over the IPC channel.
export async function answerQuery(
  engine: ForecastEngine,
  query: QueryMessage,
  send: (message: unknown) => void
): Promise<void> {
  switch (query.type) {
    case 'getLatestPrediction':
      send({ type: 'latestPrediction', data: engine.getLatestPrediction() })
      return
    case 'getStats':
      send({ type: 'stats', data: await engine.getStats() })
      return
    case 'getConnectionStatus':
      send({ type: 'connectionStatus', data: engine.getConnectionStatus() })
      return
    case 'getRecentPredictions':
      send({ type: 'recentPredictions', data: await engine.getRecentPredictions(query.limit) })
      return
  }
}
