// apps/backend/src/lib/substitute.ts
// Literal, single-pass replacement of placeholder tokens across paragraphs and
// table cells. A touched paragraph/cell loses its run formatting and comes back
// as one plain run.
import { DocxDocument, type TextEdit } from '../docx/document.js'

export const PREVIEW_PARAGRAPHS = 30

type Entries = ReadonlyArray<readonly [string, string]>

/** Applies keys in mapping order; a value that contains another token is not revisited. */
export function replaceTokens(text: string, entries: Entries): string {
  let out = text
  for (const [key, value] of entries) {
    if (!key) continue
    // split/join keeps "$" in values literal
    out = out.split(key).join(value)
  }
  return out
}

function touches(text: string, entries: Entries): boolean {
  return entries.some(([key]) => key !== '' && text.includes(key))
}

/** Rewrites `doc` in place; returns how many paragraphs and cells changed. */
export function substitutePlaceholders(doc: DocxDocument, mapping: Record<string, string>): number {
  const entries = Object.entries(mapping)
  const edits: TextEdit[] = []
  for (const p of doc.paragraphs) {
    if (touches(p.text, entries)) edits.push({ target: p, text: replaceTokens(p.text, entries) })
  }
  for (const cell of doc.cells()) {
    if (touches(cell.text, entries)) edits.push({ target: cell, text: replaceTokens(cell.text, entries) })
  }
  doc.rewrite(edits)
  return edits.length
}

export type RenderedDocument = {
  buffer: Buffer
  /** Non-empty text among the first paragraphs of the result */
  preview: string[]
  replaced: number
}

/**
 * Loads a fresh copy from the original bytes every time, so repeated renders
 * never stack substitutions.
 */
export function renderDocument(source: Uint8Array, mapping: Record<string, string>): RenderedDocument {
  const doc = DocxDocument.load(source)
  const replaced = substitutePlaceholders(doc, mapping)
  const preview = doc.paragraphs
    .slice(0, PREVIEW_PARAGRAPHS)
    .map((p) => p.text)
    .filter((text) => text.trim())
  return { buffer: doc.toBuffer(), preview, replaced }
}
