// apps/backend/src/lib/session.ts
// One session per uploaded document: original bytes, scan result, value store,
// conversation log and advisory insights. Nothing here is shared across sessions.
import { randomUUID } from 'node:crypto'
import pLimit from 'p-limit'
import type { ConversationTurn, Insight } from '@docfill/prompts'
import { DocxDocument } from '../docx/document.js'
import { NoPlaceholdersError, SessionNotFoundError } from './errors.js'
import { scanPlaceholders, type ScanOptions } from './placeholders.js'
import { renderDocument, type RenderedDocument } from './substitute.js'
import { ValueStore } from './value-store.js'

export type FillSession = {
  id: string
  fileName: string
  createdAt: Date
  /** Pristine upload; every render starts from these bytes */
  source: Buffer
  placeholders: string[]
  contexts: Map<string, string>
  values: ValueStore
  turns: ConversationTurn[]
  insights: Map<string, Insight>
  /** Placeholders whose analysis call failed; their advisory text stays out of fill prompts */
  failedInsights: Set<string>
  /** One operation at a time: turns and analyses queue behind each other */
  queue: ReturnType<typeof pLimit>
}

export type CreateSessionOptions = ScanOptions & {
  fileName?: string
  id?: string
}

export function createSession(bytes: Uint8Array, options: CreateSessionOptions = {}): FillSession {
  const source = Buffer.from(bytes)
  const doc = DocxDocument.load(source)
  const { placeholders, contexts } = scanPlaceholders(doc, { radius: options.radius })
  if (!placeholders.length) throw new NoPlaceholdersError()

  return {
    id: options.id ?? randomUUID(),
    fileName: options.fileName ?? 'document.docx',
    createdAt: new Date(),
    source,
    placeholders,
    contexts,
    values: new ValueStore(placeholders),
    turns: [],
    insights: new Map(),
    failedInsights: new Set(),
    queue: pLimit(1),
  }
}

export function generateDocument(session: FillSession): RenderedDocument {
  return renderDocument(session.source, session.values.mapping())
}

export type SessionSummary = {
  id: string
  fileName: string
  createdAt: string
  placeholders: string[]
  contexts: Record<string, string>
  values: Record<string, string>
  missing: string[]
  progress: { filled: number; total: number }
  ready: boolean
  insights: Record<string, Insight>
  turns: ConversationTurn[]
}

export function summarizeSession(session: FillSession): SessionSummary {
  const missing = session.values.missing()
  return {
    id: session.id,
    fileName: session.fileName,
    createdAt: session.createdAt.toISOString(),
    placeholders: [...session.placeholders],
    contexts: Object.fromEntries(session.contexts),
    values: session.values.mapping(),
    missing,
    progress: { filled: session.values.size - missing.length, total: session.values.size },
    ready: missing.length === 0,
    insights: Object.fromEntries(session.insights),
    turns: session.turns.map((t) => ({ ...t })),
  }
}

/** In-memory session table; a session lives from upload until it is deleted. */
export class SessionRegistry {
  private readonly sessions = new Map<string, FillSession>()

  constructor(private readonly defaults: ScanOptions = {}) {}

  create(bytes: Uint8Array, options: CreateSessionOptions = {}): FillSession {
    const session = createSession(bytes, { ...this.defaults, ...options })
    this.sessions.set(session.id, session)
    return session
  }

  get(id: string): FillSession | undefined {
    return this.sessions.get(id)
  }

  require(id: string): FillSession {
    const session = this.sessions.get(id)
    if (!session) throw new SessionNotFoundError(id)
    return session
  }

  delete(id: string): boolean {
    return this.sessions.delete(id)
  }

  get size(): number {
    return this.sessions.size
  }
}
