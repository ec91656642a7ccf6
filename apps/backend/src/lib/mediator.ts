// apps/backend/src/lib/mediator.ts
// One conversational turn: prompt the model with the live mapping, recover the
// mapping block from its reply, fan keys out into the store, and close the reply
// with a locally computed status line.
import { fillerSystem, turnMessage, type ConversationTurn } from '@docfill/prompts'
import { GenerationError, errorMessage } from './errors.js'
import { parseMappingFragment } from './fragment.js'
import { resolveKey } from './key-resolver.js'
import type { ChatFn } from './openai.js'
import type { FillSession } from './session.js'

export type TurnSettings = {
  model: string
  temperature: number
  maxTokens: number
}

export type TurnResult = {
  reply: string
  /** Placeholders written this turn, in store order */
  updated: string[]
  /** Whether a mapping block was recovered from the reply */
  parsed: boolean
  missing: string[]
  ready: boolean
}

export const READY_LINE = 'All placeholders filled. You can now generate your final document.'

export function statusLine(missing: readonly string[]): string {
  return missing.length ? `Remaining placeholders: ${missing.join(', ')}` : READY_LINE
}

export function isDoneCommand(message: string): boolean {
  return message.trim().toLowerCase() === 'done'
}

function meaningsOf(session: FillSession): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [token, insight] of session.insights) {
    if (!session.failedInsights.has(token)) out[token] = insight.description
  }
  return out
}

async function processTurn(session: FillSession, userMessage: string, chat: ChatFn, settings: TurnSettings): Promise<TurnResult> {
  const missing = session.values.missing()
  const userTurn: ConversationTurn = { role: 'user', content: userMessage }

  const instruction = turnMessage({
    mapping: session.values.mapping(),
    missing,
    placeholders: session.placeholders,
    contexts: Object.fromEntries(session.contexts),
    meanings: meaningsOf(session),
    userMessage,
  })

  session.turns.push(userTurn)

  let raw: string
  try {
    raw = await chat({
      model: settings.model,
      system: fillerSystem,
      messages: [...session.turns, { role: 'user', content: instruction }],
      temperature: settings.temperature,
      max_output_tokens: settings.maxTokens,
      meta: { scope: 'fill.turn', sessionId: session.id },
    })
  } catch (err) {
    throw new GenerationError(`Generation failed: ${errorMessage(err)}`, err)
  }

  const fragment = parseMappingFragment(raw)
  const touched = new Set<string>()
  if (fragment.ok) {
    for (const [key, value] of fragment.pairs) {
      for (const placeholder of resolveKey(key, session.placeholders)) {
        session.values.set(placeholder, value)
        touched.add(placeholder)
      }
    }
  } else {
    console.warn('[mediator] no mapping recovered from reply (%s) session=%s', fragment.reason, session.id)
  }

  const missingAfter = session.values.missing()
  const reply = `${raw}\n\n${statusLine(missingAfter)}`
  session.turns.push({ role: 'assistant', content: reply })

  return {
    reply,
    updated: session.placeholders.filter((p) => touched.has(p)),
    parsed: fragment.ok,
    missing: missingAfter,
    ready: missingAfter.length === 0,
  }
}

/** Turns on the same session run strictly one after another. */
export function runTurn(session: FillSession, userMessage: string, chat: ChatFn, settings: TurnSettings): Promise<TurnResult> {
  return session.queue(() => processTurn(session, userMessage, chat, settings))
}
