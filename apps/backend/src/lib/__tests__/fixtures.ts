// Test documents: raw WordprocessingML for exact structures, and the docx
// package for documents shaped like real uploads.
import PizZip from 'pizzip'
import { Document, Packer, Paragraph, Table, TableCell, TableRow, TextRun } from 'docx'

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main'
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships'

export function esc(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

/** One paragraph, one run per string */
export function p(...runs: string[]): string {
  return `<w:p>${runs.map((r) => `<w:r><w:t xml:space="preserve">${esc(r)}</w:t></w:r>`).join('')}</w:p>`
}

/** A table from rows of cell texts; each cell holds one paragraph */
export function tbl(rows: string[][]): string {
  const trs = rows.map((cells) => `<w:tr>${cells.map((c) => `<w:tc><w:tcPr><w:tcW w:w="2000" w:type="dxa"/></w:tcPr>${p(c)}</w:tc>`).join('')}</w:tr>`)
  return `<w:tbl><w:tblPr><w:tblW w:w="0" w:type="auto"/></w:tblPr>${trs.join('')}</w:tbl>`
}

export function documentXml(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<w:document xmlns:w="${W_NS}" xmlns:r="${R_NS}"><w:body>${body}<w:sectPr><w:pgSz w:w="12240" w:h="15840"/></w:sectPr></w:body></w:document>`
}

export function xmlDocx(body: string): Buffer {
  const zip = new PizZip()
  zip.file('word/document.xml', documentXml(body))
  const out: unknown = zip.generate({ type: 'nodebuffer' })
  if (!Buffer.isBuffer(out)) throw new Error('pizzip did not return a buffer')
  return out
}

export function readDocumentXml(bytes: Buffer): string {
  const part = new PizZip(bytes).file('word/document.xml')
  if (!part) throw new Error('word/document.xml missing')
  return part.asText()
}

export function paragraphsDocx(...texts: string[]): Buffer {
  return xmlDocx(texts.map((t) => p(t)).join(''))
}

export type DocxLayout = {
  /** A string[] becomes one paragraph of several runs, every other run bold */
  paragraphs: Array<string | string[]>
  table?: string[][]
}

export async function buildDocx(layout: DocxLayout): Promise<Buffer> {
  const children: Array<Paragraph | Table> = layout.paragraphs.map((entry) =>
    typeof entry === 'string'
      ? new Paragraph(entry)
      : new Paragraph({ children: entry.map((text, i) => new TextRun({ text, bold: i % 2 === 1 })) }),
  )
  if (layout.table) {
    children.push(
      new Table({
        rows: layout.table.map(
          (cells) => new TableRow({ children: cells.map((text) => new TableCell({ children: [new Paragraph(text)] })) }),
        ),
      }),
    )
  }
  const doc = new Document({ sections: [{ children }] })
  return Packer.toBuffer(doc)
}
