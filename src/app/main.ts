import { App } from './App.js'
import { logger } from '../utils/logger.js'

const app = new App()

function shutdown(signal: NodeJS.Signals): void {
  logger.info('Shutdown requested', { signal })
  app.stop().then(
    () => {
      process.exit(0)
    },
    (error: unknown) => {
      logger.error('Shutdown failed', { error })
      process.exit(1)
    },
  )
}

process.once('SIGINT', shutdown)
process.once('SIGTERM', shutdown)

app.start().catch((error) => {
  logger.error('Fatal error', { error })
  process.exitCode = 1
})
