import Fastify from 'fastify'
import type { Config } from './config.js'
import { ActivityError } from './errors.js'
import type { Logger } from './logger.js'
import type { ActivityHandler } from './activity/handler.js'

export function createServer(config: Config, logger: Logger, activityHandler: ActivityHandler) {
  const server = Fastify({
    logger: {
      level: config.logLevel,
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: () => `,"time":"${new Date().toISOString()}"`
    }
  })

  server.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() }
  })

  server.post('/api/messages', async (request, reply) => {
    try {
      const result = await activityHandler.handle(request.body)
      return { ok: true, ...result }
    } catch (err) {
      logger.error({ event: 'activity_error', error: err })
      if (err instanceof ActivityError) {
        return reply.status(400).send({ ok: false, error: err.message, field: err.field })
      }
      return reply.status(500).send({ ok: false, error: 'Processing failed' })
    }
  })

  return server
}
