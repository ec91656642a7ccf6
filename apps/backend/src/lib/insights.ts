// apps/backend/src/lib/insights.ts
// Optional per-placeholder analysis. Calls run one after another; a failed call
// degrades to an advisory string for that placeholder only.
import { InsightSchema, analystSystem, placeholderMessage, type Insight } from '@docfill/prompts'
import { errorMessage } from './errors.js'
import { findFragment } from './fragment.js'
import type { ChatFn } from './openai.js'
import type { FillSession } from './session.js'

export const INSIGHT_TEMPERATURE = 0.2
export const INSIGHT_MAX_TOKENS = 300

export function readInsight(reply: string): Insight {
  const fragment = findFragment(reply)
  if (fragment) {
    try {
      const parsed = InsightSchema.safeParse(JSON.parse(fragment))
      if (parsed.success) return parsed.data
    } catch {
      // not JSON; fall back to the raw reply below
    }
  }
  return { description: reply.trim() || 'No analysis returned.', example: '' }
}

async function analyzeAll(session: FillSession, chat: ChatFn, model: string): Promise<Map<string, Insight>> {
  for (const placeholder of session.placeholders) {
    let insight: Insight
    try {
      const reply = await chat({
        model,
        system: analystSystem,
        messages: [{ role: 'user', content: placeholderMessage(placeholder, session.contexts.get(placeholder) ?? '') }],
        temperature: INSIGHT_TEMPERATURE,
        max_output_tokens: INSIGHT_MAX_TOKENS,
        meta: { scope: 'fill.insight', sessionId: session.id, placeholder },
      })
      insight = readInsight(reply)
      session.failedInsights.delete(placeholder)
    } catch (err) {
      console.warn('[insights] analysis failed for %s: %s', placeholder, errorMessage(err))
      insight = { description: `Analysis unavailable: ${errorMessage(err)}`, example: '' }
      session.failedInsights.add(placeholder)
    }
    session.insights.set(placeholder, insight)
  }
  return session.insights
}

export function analyzePlaceholders(session: FillSession, chat: ChatFn, model: string): Promise<Map<string, Insight>> {
  return session.queue(() => analyzeAll(session, chat, model))
}
