import 'dotenv/config'
import { createApp } from './app.js'

const STATE_CLEANUP_INTERVAL_MS = 60_000

async function main() {
  const { server, dependencies } = createApp()
  const { config, logger, store } = dependencies

  const cleanupTimer = setInterval(() => store.cleanup(), STATE_CLEANUP_INTERVAL_MS)
  cleanupTimer.unref()
  server.addHook('onClose', async () => {
    clearInterval(cleanupTimer)
  })

  try {
    await server.listen({ port: config.port, host: '0.0.0.0' })
    logger.info({ event: 'server_started', port: config.port })
  } catch (err) {
    logger.error({ event: 'server_start_failed', error: err })
    process.exit(1)
  }
}

void main()
