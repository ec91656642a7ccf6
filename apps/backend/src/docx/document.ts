// apps/backend/src/docx/document.ts
import PizZip from 'pizzip'
import {
  childElements,
  children,
  childrenNamed,
  decodeXmlText,
  escapeXmlText,
  findBody,
  type XmlElement,
} from './xml.js'
import { DocumentError } from '../lib/errors.js'

const DOCUMENT_PART = 'word/document.xml'

// elements whose runs still count towards paragraph text
const RUN_CONTAINERS = new Set(['w:hyperlink', 'w:ins', 'w:fldSimple', 'w:smartTag', 'w:customXml', 'w:sdt', 'w:sdtContent'])

// kept when a paragraph is collapsed to a single run
const PARAGRAPH_MARKERS = new Set(['w:pPr', 'w:bookmarkStart', 'w:bookmarkEnd'])

export type DocxParagraph = {
  kind: 'paragraph'
  index: number
  text: string
  /** Text of each direct run, in order */
  runs: string[]
  element: XmlElement
}

export type DocxTableCell = {
  kind: 'cell'
  row: number
  column: number
  /** Cell paragraphs joined by newlines */
  text: string
  element: XmlElement
}

export type DocxTable = {
  index: number
  rows: DocxTableCell[][]
}

export type TextEdit = {
  target: DocxParagraph | DocxTableCell
  text: string
}

function runText(xml: string, run: XmlElement): string {
  let out = ''
  for (const el of children(xml, run)) {
    switch (el.name) {
      case 'w:t':
        out += decodeXmlText(xml.slice(el.innerStart, el.innerEnd))
        break
      case 'w:tab':
        out += '\t'
        break
      case 'w:br':
      case 'w:cr':
        out += '\n'
        break
      case 'w:noBreakHyphen':
        out += '-'
        break
      default:
        break
    }
  }
  return out
}

function collectText(xml: string, parent: XmlElement): string {
  let out = ''
  for (const el of children(xml, parent)) {
    if (el.name === 'w:r') out += runText(xml, el)
    else if (RUN_CONTAINERS.has(el.name)) out += collectText(xml, el)
  }
  return out
}

/** A single plain run; tabs and newlines become their WordprocessingML elements. */
export function plainRunXml(text: string): string {
  const parts = text.split(/(\t|\n)/).map((part) => {
    if (part === '\t') return '<w:tab/>'
    if (part === '\n') return '<w:br/>'
    return part ? `<w:t xml:space="preserve">${escapeXmlText(part)}</w:t>` : ''
  })
  const body = parts.join('')
  return `<w:r>${body || '<w:t xml:space="preserve"></w:t>'}</w:r>`
}

/**
 * Read/rewrite view over the main body of a .docx file.
 * Only top-level body paragraphs and top-level tables are exposed.
 */
export class DocxDocument {
  private xml: string
  private parsedParagraphs: DocxParagraph[] = []
  private parsedTables: DocxTable[] = []

  private constructor(private readonly zip: PizZip, xml: string) {
    this.xml = xml
    this.parse()
  }

  static load(bytes: Uint8Array): DocxDocument {
    let zip: PizZip
    try {
      zip = new PizZip(bytes)
    } catch (err) {
      throw new DocumentError(`Not a readable .docx archive: ${err instanceof Error ? err.message : String(err)}`)
    }
    const part = zip.file(DOCUMENT_PART)
    if (!part) throw new DocumentError(`Missing ${DOCUMENT_PART} in archive`)
    return new DocxDocument(zip, part.asText())
  }

  get paragraphs(): readonly DocxParagraph[] {
    return this.parsedParagraphs
  }

  get tables(): readonly DocxTable[] {
    return this.parsedTables
  }

  /** Every cell of every table, row by row. */
  cells(): DocxTableCell[] {
    return this.parsedTables.flatMap((table) => table.rows.flat())
  }

  /**
   * Replaces each target's content with one plain run of `text`.
   * Paragraphs keep their properties; cells keep theirs and get one fresh paragraph.
   */
  rewrite(edits: readonly TextEdit[]): void {
    if (!edits.length) return
    const ordered = [...edits].sort((a, b) => b.target.element.start - a.target.element.start)
    let xml = this.xml
    for (const edit of ordered) {
      const el = edit.target.element
      const replacement = edit.target.kind === 'paragraph' ? this.paragraphXml(el, edit.text) : this.cellXml(el, edit.text)
      xml = xml.slice(0, el.start) + replacement + xml.slice(el.end)
    }
    this.xml = xml
    this.parse()
  }

  toBuffer(): Buffer {
    this.zip.file(DOCUMENT_PART, this.xml)
    const out: unknown = this.zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' })
    if (!Buffer.isBuffer(out)) throw new DocumentError('Archive generation did not return a buffer')
    return out
  }

  private paragraphXml(el: XmlElement, text: string): string {
    const kept = children(this.xml, el)
      .filter((child) => PARAGRAPH_MARKERS.has(child.name))
      .map((child) => this.xml.slice(child.start, child.end))
      .join('')
    return `${this.openTagOf(el)}${kept}${plainRunXml(text)}</w:p>`
  }

  private cellXml(el: XmlElement, text: string): string {
    const props = childrenNamed(this.xml, el, 'w:tcPr')
      .map((child) => this.xml.slice(child.start, child.end))
      .join('')
    return `${this.openTagOf(el)}${props}<w:p>${plainRunXml(text)}</w:p></w:tc>`
  }

  // self-closing elements (<w:p/>) get reopened so content can follow
  private openTagOf(el: XmlElement): string {
    return el.openTag.endsWith('/>') ? `${el.openTag.slice(0, -2).trimEnd()}>` : el.openTag
  }

  private parse(): void {
    const body = findBody(this.xml)
    if (!body) throw new DocumentError('Document part has no <w:body>')
    const top = childElements(this.xml, body.innerStart, body.innerEnd)

    this.parsedParagraphs = top
      .filter((el) => el.name === 'w:p')
      .map((el, index) => ({
        kind: 'paragraph' as const,
        index,
        text: collectText(this.xml, el),
        runs: childrenNamed(this.xml, el, 'w:r').map((run) => runText(this.xml, run)),
        element: el,
      }))

    this.parsedTables = top
      .filter((el) => el.name === 'w:tbl')
      .map((tbl, index) => ({
        index,
        rows: childrenNamed(this.xml, tbl, 'w:tr').map((tr, row) =>
          childrenNamed(this.xml, tr, 'w:tc').map((tc, column) => ({
            kind: 'cell' as const,
            row,
            column,
            text: childrenNamed(this.xml, tc, 'w:p')
              .map((p) => collectText(this.xml, p))
              .join('\n'),
            element: tc,
          })),
        ),
      }))
  }
}
