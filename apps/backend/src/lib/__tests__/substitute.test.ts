import { describe, it, expect } from 'vitest'
import { DocxDocument } from '../../docx/document.js'
import { findPlaceholders } from '../placeholders.js'
import { renderDocument, replaceTokens, substitutePlaceholders } from '../substitute.js'
import { buildDocx, p, paragraphsDocx, tbl, xmlDocx } from './fixtures.js'

const MAPPING = { '[Company Name]': 'Acme Corp', '[Effective Date]': 'Nov 1, 2025' }

describe('replaceTokens', () => {
  it('replaces every occurrence of every key', () => {
    expect(replaceTokens('[A], [B] and [A]', [['[A]', 'x'], ['[B]', 'y']])).toBe('x, y and x')
  })

  it('makes a single pass in mapping order', () => {
    expect(replaceTokens('[A] [B]', [['[B]', 'x'], ['[A]', '[B]']])).toBe('[B] x')
  })

  it('keeps dollar signs in values literal', () => {
    expect(replaceTokens('Pay $[Amount] now', [['$[Amount]', '$100,000 ($&)']])).toBe('Pay $100,000 ($&) now')
  })
})

describe('substitutePlaceholders', () => {
  it('rewrites a styled paragraph as one plain run', () => {
    const doc = DocxDocument.load(
      xmlDocx(p('This Agreement is made by ', '[Company Name]', ', effective [Effective Date].') + p('Untouched ', 'runs')),
    )
    const changed = substitutePlaceholders(doc, MAPPING)

    expect(changed).toBe(1)
    expect(doc.paragraphs[0].text).toBe('This Agreement is made by Acme Corp, effective Nov 1, 2025.')
    expect(doc.paragraphs[0].runs).toEqual(['This Agreement is made by Acme Corp, effective Nov 1, 2025.'])
    expect(doc.paragraphs[1].runs).toEqual(['Untouched ', 'runs'])
  })

  it('replaces inside table cells independently', () => {
    const doc = DocxDocument.load(xmlDocx(tbl([['Name: [Company Name]', 'Date'], ['[Effective Date]', '[Company Name]']])))
    substitutePlaceholders(doc, MAPPING)
    expect(doc.cells().map((c) => c.text)).toEqual(['Name: Acme Corp', 'Date', 'Nov 1, 2025', 'Acme Corp'])
  })

  it('deletes tokens whose value is still empty', () => {
    const doc = DocxDocument.load(paragraphsDocx('By [Company Name] on [Effective Date].'))
    substitutePlaceholders(doc, { '[Company Name]': 'Acme Corp', '[Effective Date]': '' })
    expect(doc.paragraphs[0].text).toBe('By Acme Corp on .')
  })

  it('leaves text unchanged when every value is its own key', () => {
    const texts = ['By [Company Name] on [Effective Date].', 'Plain.', '$[Amount] due']
    const doc = DocxDocument.load(paragraphsDocx(...texts))
    const identity = Object.fromEntries(findPlaceholders(doc).map((t) => [t, t]))
    substitutePlaceholders(doc, identity)
    expect(doc.paragraphs.map((x) => x.text)).toEqual(texts)
  })
})

describe('renderDocument', () => {
  it('starts from the original bytes on every render', async () => {
    const source = await buildDocx({
      paragraphs: ['Agreement', ['Made by ', '[Company Name]', '.'], '', 'Dated [Effective Date]'],
      table: [['Signed: [Company Name]']],
    })

    const first = renderDocument(source, { '[Company Name]': 'Acme Corp', '[Effective Date]': '' })
    const second = renderDocument(source, MAPPING)

    const firstDoc = DocxDocument.load(first.buffer)
    expect(firstDoc.paragraphs.map((x) => x.text)).toEqual(['Agreement', 'Made by Acme Corp.', '', 'Dated '])

    const secondDoc = DocxDocument.load(second.buffer)
    expect(secondDoc.paragraphs.map((x) => x.text)).toEqual(['Agreement', 'Made by Acme Corp.', '', 'Dated Nov 1, 2025'])
    expect(secondDoc.cells()[0].text).toBe('Signed: Acme Corp')
    expect(second.replaced).toBe(3)

    expect(findPlaceholders(DocxDocument.load(source))).toEqual(['[Company Name]', '[Effective Date]'])
  })

  it('previews the non-empty paragraphs among the first thirty', () => {
    const texts = Array.from({ length: 35 }, (_, i) => (i % 2 === 0 ? `Clause ${i} for [Company Name]` : ''))
    const { preview } = renderDocument(paragraphsDocx(...texts), MAPPING)
    expect(preview).toHaveLength(15)
    expect(preview[0]).toBe('Clause 0 for Acme Corp')
    expect(preview[14]).toBe('Clause 28 for Acme Corp')
  })
})
