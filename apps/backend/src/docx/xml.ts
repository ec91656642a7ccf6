// apps/backend/src/docx/xml.ts
// Minimal element walker over WordprocessingML. Offsets index into the raw
// document.xml string so edits can be spliced back without re-serialising.

export type XmlElement = {
  name: string
  start: number
  end: number
  innerStart: number
  innerEnd: number
  openTag: string
}

// comments, processing instructions and CDATA are matched so they can be skipped
const TAG_SOURCE =
  '<!--[\\s\\S]*?-->|<\\?[\\s\\S]*?\\?>|<!\\[CDATA\\[[\\s\\S]*?\\]\\]>' +
  '|<(\\/?)([A-Za-z_][\\w.:-]*)((?:[^>"\']|"[^"]*"|\'[^\']*\')*?)(\\/?)>'

/** Direct children of the range [from, to). */
export function childElements(xml: string, from: number, to: number): XmlElement[] {
  const tag = new RegExp(TAG_SOURCE, 'g')
  tag.lastIndex = from
  const out: XmlElement[] = []
  let depth = 0
  let open: Omit<XmlElement, 'end' | 'innerEnd'> | null = null
  let m: RegExpExecArray | null
  while ((m = tag.exec(xml)) !== null && m.index < to) {
    const name = m[2]
    if (name === undefined) continue
    const raw = m[0]
    const closing = m[1] === '/'
    const selfClosing = m[4] === '/'

    if (closing) {
      depth -= 1
      if (depth === 0 && open) {
        out.push({ ...open, innerEnd: m.index, end: m.index + raw.length })
        open = null
      }
      if (depth < 0) break
      continue
    }

    if (depth === 0) {
      const afterTag = m.index + raw.length
      if (selfClosing) {
        out.push({ name, start: m.index, end: afterTag, innerStart: afterTag, innerEnd: afterTag, openTag: raw })
        continue
      }
      open = { name, start: m.index, innerStart: afterTag, openTag: raw }
    }
    if (!selfClosing) depth += 1
  }
  return out
}

export function children(xml: string, parent: XmlElement): XmlElement[] {
  return childElements(xml, parent.innerStart, parent.innerEnd)
}

export function childrenNamed(xml: string, parent: XmlElement, name: string): XmlElement[] {
  return children(xml, parent).filter((el) => el.name === name)
}

/** Locates <w:body> and returns it as an element. */
export function findBody(xml: string): XmlElement | null {
  const open = /<w:body\b[^>]*>/.exec(xml)
  if (!open) return null
  const close = xml.lastIndexOf('</w:body>')
  if (close < open.index) return null
  return {
    name: 'w:body',
    start: open.index,
    end: close + '</w:body>'.length,
    innerStart: open.index + open[0].length,
    innerEnd: close,
    openTag: open[0],
  }
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
}

const MAX_CODE_POINT = 0x10ffff

function fromCodePoint(code: number, whole: string): string {
  return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : whole
}

export function decodeXmlText(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (whole, entity: string) => {
    if (entity.startsWith('#x')) return fromCodePoint(parseInt(entity.slice(2), 16), whole)
    if (entity.startsWith('#')) return fromCodePoint(parseInt(entity.slice(1), 10), whole)
    return NAMED_ENTITIES[entity] ?? whole
  })
}

export function escapeXmlText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}
