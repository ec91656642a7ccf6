// apps/backend/src/lib/fragment.ts
// Best-effort recovery of the mapping block a model reply is asked to carry.
import { MappingValueSchema } from '@docfill/prompts'

export type FragmentResult =
  | { ok: true; pairs: Array<[string, string]> }
  | { ok: false; reason: 'no-fragment' | 'invalid-json' }

/**
 * Greedy: the span runs from the first "{" to the last "}" in the reply.
 * Two separate blocks, or stray braces in surrounding prose, end up in one span
 * and usually fail to decode.
 */
export function findFragment(reply: string): string | null {
  const match = /\{[\s\S]*\}/.exec(reply)
  return match ? match[0] : null
}

/** Never throws. Pairs whose value is not a scalar are dropped individually. */
export function parseMappingFragment(reply: string): FragmentResult {
  const fragment = findFragment(reply)
  if (fragment === null) return { ok: false, reason: 'no-fragment' }

  let decoded: unknown
  try {
    decoded = JSON.parse(fragment)
  } catch {
    return { ok: false, reason: 'invalid-json' }
  }
  // a braced span that decodes is always an object; this narrows the type
  if (typeof decoded !== 'object' || decoded === null) return { ok: false, reason: 'invalid-json' }

  const pairs: Array<[string, string]> = []
  for (const [key, raw] of Object.entries(decoded)) {
    const value = MappingValueSchema.safeParse(raw)
    if (value.success) pairs.push([key, value.data])
  }
  return { ok: true, pairs }
}
