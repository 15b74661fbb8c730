import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { env } from './lib/env'
import { handleError } from './lib/errors'
import { securityHeaders } from './lib/security-headers'
import { requestLogger } from './lib/request-logger'
import { designRoutes } from './routes/designs'
import { kaiserRoutes } from './routes/kaiser'
import { responseRoutes } from './routes/responses'
import { metricsRoutes } from './routes/metrics'
import { toleranceDesignRoutes } from './routes/tolerance-designs'
import { windowRoutes } from './routes/windows'

export const API_NAME = 'FIR Workbench API'
export const API_VERSION = '0.1.0'

const app = new Hono()

// ---------------------------------------------------------------------------
// Global error handling
// ---------------------------------------------------------------------------

app.onError(handleError)

app.notFound((c) => c.json({ error: 'Not found.' }, 404))

// ---------------------------------------------------------------------------
// Middleware stack (order matters)
// ---------------------------------------------------------------------------

// 1. Request logging (first so it captures total duration)
app.use('*', requestLogger())

// 2. CORS
app.use(
  '*',
  cors({
    origin: env.CORS_ORIGINS,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
    maxAge: 86400,
  }),
)

// 3. Security headers
app.use('*', securityHeaders())

// ---------------------------------------------------------------------------
// Health check
// ---------------------------------------------------------------------------

// Stateless service: no backing stores to probe.
app.get('/health', (c) => c.json({ status: 'healthy' }))

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

app.route('/designs', designRoutes)
app.route('/kaiser', kaiserRoutes)
app.route('/responses', responseRoutes)
app.route('/metrics', metricsRoutes)
app.route('/tolerance-designs', toleranceDesignRoutes)
app.route('/windows', windowRoutes)

app.get('/', (c) => c.json({ name: API_NAME, version: API_VERSION }))

export { app }
