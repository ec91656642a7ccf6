// apps/backend/src/lib/openai.ts
// Chat completions against any OpenAI-compatible endpoint (Groq by default).
import OpenAI from 'openai'
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import type { AppConfig } from './config.js'

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string }

export type ChatArgs = {
  model: string
  system?: string
  messages: ChatMessage[]
  temperature?: number
  max_output_tokens?: number
  meta?: Record<string, unknown>
}

/** Prompt in, free text out. Rejects on any transport or API failure. */
export type ChatFn = (args: ChatArgs) => Promise<string>

function toParam(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case 'system':
      return { role: 'system', content: m.content }
    case 'assistant':
      return { role: 'assistant', content: m.content }
    case 'user':
      return { role: 'user', content: m.content }
  }
}

type ContentPart = string | { text?: unknown; content?: unknown } | null | undefined

function flattenContent(raw: unknown): string {
  if (typeof raw === 'string') return raw
  if (!Array.isArray(raw)) return ''
  return raw
    .map((chunk: ContentPart) => {
      if (!chunk) return ''
      if (typeof chunk === 'string') return chunk
      if (typeof chunk.text === 'string') return chunk.text
      if (typeof chunk.content === 'string') return chunk.content
      return ''
    })
    .join('')
}

export function createChat(config: Pick<AppConfig, 'apiKey' | 'baseURL' | 'trace'>): ChatFn {
  const openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL })
  const TRACE = config.trace

  return async function chat(args: ChatArgs): Promise<string> {
    const { model, system, messages, temperature = 0.3, max_output_tokens = 800, meta = {} } = args

    const payload: ChatCompletionMessageParam[] = []
    if (system) payload.push({ role: 'system', content: system })
    payload.push(...messages.map(toParam))

    if (TRACE) {
      console.log('[chat] model=%s temp=%s max=%s messages=%d', model, temperature, max_output_tokens, payload.length)
    }

    const start = Date.now()
    console.info(JSON.stringify({
      type: 'llm.request',
      model,
      temperature,
      max_output_tokens,
      meta,
    }))

    try {
      const r = await openai.chat.completions.create({
        model,
        temperature,
        max_tokens: max_output_tokens,
        messages: payload,
      })
      const message = r.choices?.[0]?.message
      const out = flattenContent(message?.content)
      if (TRACE) {
        console.log('[chat] raw message', JSON.stringify(message ?? null))
        console.log('[chat] received %d chars', out.length)
      }
      console.info(JSON.stringify({
        type: 'llm.response',
        model,
        duration_ms: Date.now() - start,
        meta,
        usage: r.usage ?? null,
        choices: r.choices?.length ?? 0,
      }))
      return out.trim()
    } catch (err) {
      console.error(JSON.stringify({
        type: 'llm.error',
        model,
        duration_ms: Date.now() - start,
        meta,
        error: err instanceof Error ? err.message : String(err),
      }))
      // Surface the error so the caller decides what to do with the turn
      throw err
    }
  }
}
