// apps/backend/src/routes/sessions.ts
import express, { Router, type Request, type Response, type NextFunction } from 'express'
import { z } from 'zod'
import { FillError } from '../lib/errors.js'
import { analyzePlaceholders } from '../lib/insights.js'
import { isDoneCommand, runTurn, type TurnSettings } from '../lib/mediator.js'
import type { ChatFn } from '../lib/openai.js'
import { generateDocument, summarizeSession, type SessionRegistry } from '../lib/session.js'

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document'

const MessageBody = z.object({
  message: z.string().refine((m) => m.trim().length > 0, 'message is required'),
})

export type SessionRouterDeps = {
  registry: SessionRegistry
  chat: ChatFn
  settings: TurnSettings
  uploadLimit?: string
}

function fileNameOf(req: Request): string | undefined {
  const raw = req.header('x-file-name')
  if (!raw) return undefined
  try {
    return decodeURIComponent(raw)
  } catch {
    return raw
  }
}

export function sessionsRouter(deps: SessionRouterDeps): Router {
  const { registry, chat, settings } = deps
  const router = Router()

  router.post(
    '/sessions',
    express.raw({ type: [DOCX_MIME, 'application/octet-stream'], limit: deps.uploadLimit ?? '10mb' }),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const body: unknown = req.body
        if (!Buffer.isBuffer(body) || body.length === 0) {
          throw new FillError(`Upload the .docx bytes as ${DOCX_MIME}`, 400)
        }
        const session = registry.create(body, { fileName: fileNameOf(req) })
        console.info('[sessions] created %s (%d placeholders)', session.id, session.placeholders.length)
        res.status(201).json(summarizeSession(session))
      } catch (err) {
        next(err)
      }
    },
  )

  router.get('/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(summarizeSession(registry.require(req.params.id)))
    } catch (err) {
      next(err)
    }
  })

  router.post('/sessions/:id/messages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = registry.require(req.params.id)
      const parsed = MessageBody.safeParse(req.body)
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid body' })
        return
      }
      const { message } = parsed.data
      const turn = await runTurn(session, message, chat, settings)
      res.json({
        reply: turn.reply,
        updated: turn.updated,
        parsed: turn.parsed,
        values: session.values.mapping(),
        missing: turn.missing,
        ready: turn.ready,
        generate: isDoneCommand(message),
      })
    } catch (err) {
      next(err)
    }
  })

  router.post('/sessions/:id/insights', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = registry.require(req.params.id)
      const insights = await analyzePlaceholders(session, chat, settings.model)
      res.json({ insights: Object.fromEntries(insights) })
    } catch (err) {
      next(err)
    }
  })

  router.post('/sessions/:id/document', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = registry.require(req.params.id)
      const rendered = generateDocument(session)
      res.setHeader('Content-Type', DOCX_MIME)
      res.setHeader('Content-Disposition', 'attachment; filename="filled_document.docx"')
      res.send(rendered.buffer)
    } catch (err) {
      next(err)
    }
  })

  router.get('/sessions/:id/preview', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = registry.require(req.params.id)
      const { preview, replaced } = generateDocument(session)
      res.json({ paragraphs: preview, replaced, ready: session.values.isComplete() })
    } catch (err) {
      next(err)
    }
  })

  router.delete('/sessions/:id', (req: Request, res: Response) => {
    const existed = registry.delete(req.params.id)
    res.status(existed ? 204 : 404).end()
  })

  return router
}
