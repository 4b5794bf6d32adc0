import { loadConfig } from '../lib/config'
import { errorMessage } from '../lib/errors'
import { createTradeWatchService, type TradeWatchService } from '../lib/service'

async function main(): Promise<void> {
  console.log('[Worker] Starting trade watcher process...')

  let service: TradeWatchService
  try {
    service = createTradeWatchService(loadConfig())
  } catch (error) {
    console.error(`[Worker] Startup failed: ${errorMessage(error)}`)
    process.exit(1)
  }

  const shutdown = async (signal: string) => {
    console.log(`[Worker] ${signal} received, shutting down...`)
    await service.stop()
    process.exit(0)
  }

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      console.error('[Worker] Shutdown error:', error)
      process.exit(1)
    })
  })
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      console.error('[Worker] Shutdown error:', error)
      process.exit(1)
    })
  })

  await service.start()
}

main().catch((error) => {
  console.error('[Worker] Fatal error:', error)
  process.exit(1)
})
