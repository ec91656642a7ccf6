// apps/backend/src/lib/placeholders.ts
// Placeholder scanning: `$?[...]`-style tokens, with paragraph-window context.
import type { DocxDocument } from '../docx/document.js'

// body excludes brackets, so "[[a] [b]]" yields "[[a]" and "[b]]" rather than one span
export const PLACEHOLDER_PATTERN = /\$?\[+[^[\]]+\]+/g

export type ScanOptions = {
  /** Paragraphs on each side included in a context snippet */
  radius?: number
}

export type ScanResult = {
  placeholders: string[]
  /** Only tokens seen in paragraphs get a snippet */
  contexts: Map<string, string>
}

export const DEFAULT_CONTEXT_RADIUS = 1

export function matchPlaceholders(text: string): string[] {
  return text.match(PLACEHOLDER_PATTERN) ?? []
}

function pushUnique(seen: Set<string>, out: string[], tokens: Iterable<string>) {
  for (const token of tokens) {
    if (seen.has(token)) continue
    seen.add(token)
    out.push(token)
  }
}

function contextAround(paragraphs: readonly { text: string }[], index: number, radius: number): string {
  const parts: string[] = []
  for (let j = index - radius; j <= index + radius; j++) {
    if (j < 0 || j >= paragraphs.length) continue
    const text = paragraphs[j].text.trim()
    if (text) parts.push(text)
  }
  return parts.join(' ')
}

/**
 * Windowed scan. Paragraph tokens come first, in first-seen order, each with the
 * snippet of the paragraph it was (last) found in; tokens that only occur in
 * table cells follow, without context.
 */
export function scanPlaceholders(doc: DocxDocument, options: ScanOptions = {}): ScanResult {
  const radius = Math.max(0, Math.floor(options.radius ?? DEFAULT_CONTEXT_RADIUS))
  const paragraphs = doc.paragraphs
  const seen = new Set<string>()
  const placeholders: string[] = []
  const contexts = new Map<string, string>()

  paragraphs.forEach((p, i) => {
    const found = matchPlaceholders(p.text)
    if (!found.length) return
    const snippet = contextAround(paragraphs, i, radius)
    for (const token of found) contexts.set(token, snippet)
    pushUnique(seen, placeholders, found)
  })

  for (const cell of doc.cells()) pushUnique(seen, placeholders, matchPlaceholders(cell.text))

  return { placeholders, contexts }
}

/** Non-windowed variant: every distinct token in paragraphs, then table cells. */
export function findPlaceholders(doc: DocxDocument): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const p of doc.paragraphs) pushUnique(seen, out, matchPlaceholders(p.text))
  for (const cell of doc.cells()) pushUnique(seen, out, matchPlaceholders(cell.text))
  return out
}
