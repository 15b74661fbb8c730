import { serve } from '@hono/node-server'
import { logger } from '@fir-workbench/config'
import { env } from './lib/env'
import { app } from './app'

const log = logger.child({ component: 'server' })

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  log.info('server.started', { port: info.port, env: env.NODE_ENV })
})

function shutdown(signal: string) {
  log.info('server.shutdown', { signal })

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
