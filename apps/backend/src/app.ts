// apps/backend/src/app.ts
import express, { type Request, type Response, type NextFunction } from 'express'
import cors from 'cors'
import morgan from 'morgan'
import compression from 'compression'

import { sessionsRouter, type SessionRouterDeps } from './routes/sessions.js'

export type AppOptions = SessionRouterDeps & {
  corsOrigins?: string[]
  /** morgan format; false disables request logging */
  requestLog?: string | false
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status
  }
  return 500
}

export function createApp(options: AppOptions) {
  const app = express()

  if (options.requestLog !== false) app.use(morgan(options.requestLog ?? 'dev'))
  app.use(
    cors({
      origin: options.corsOrigins ?? ['http://localhost:5173'],
      credentials: true,
    })
  )
  app.use(compression())
  app.use(express.json({ limit: '1mb' }))

  // Health (public)
  app.get('/api/health', (_req: Request, res: Response) =>
    res.json({ ok: true, ts: new Date().toISOString() })
  )

  app.use('/api', sessionsRouter(options))

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err)
    if (status >= 500) console.error('[ERROR]', err)
    const message = err instanceof Error && err.message ? err.message : 'INTERNAL_SERVER_ERROR'
    res.status(status).json({ error: message })
  })

  return app
}
