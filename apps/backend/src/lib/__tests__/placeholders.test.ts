import { describe, it, expect } from 'vitest'
import { DocxDocument } from '../../docx/document.js'
import { findPlaceholders, matchPlaceholders, scanPlaceholders } from '../placeholders.js'
import { p, paragraphsDocx, tbl, xmlDocx } from './fixtures.js'

const AGREEMENT = [
  'Intro text.',
  '',
  'This Agreement is made by [Company Name], effective [Effective Date].',
  'Signed on [Effective Date] by $[Amount].',
  'Closing.',
]

describe('matchPlaceholders', () => {
  it('finds bracketed tokens with an optional currency marker', () => {
    expect(matchPlaceholders('Pay $[Amount] to [Investor Name] by [Date].')).toEqual(['$[Amount]', '[Investor Name]', '[Date]'])
  })

  it('does not span nested brackets', () => {
    expect(matchPlaceholders('[[Nested]] and [a [b] c]')).toEqual(['[[Nested]]', '[b]'])
  })

  it('returns nothing for text without brackets', () => {
    expect(matchPlaceholders('Plain clause.')).toEqual([])
  })
})

describe('scanPlaceholders', () => {
  it('deduplicates tokens in first-seen order', () => {
    const { placeholders } = scanPlaceholders(DocxDocument.load(paragraphsDocx(...AGREEMENT)))
    expect(placeholders).toEqual(['[Company Name]', '[Effective Date]', '$[Amount]'])
  })

  it('builds each snippet from non-empty neighbours within the radius', () => {
    const { contexts } = scanPlaceholders(DocxDocument.load(paragraphsDocx(...AGREEMENT)))
    expect(contexts.get('[Company Name]')).toBe(
      'This Agreement is made by [Company Name], effective [Effective Date]. Signed on [Effective Date] by $[Amount].',
    )
    // last paragraph that mentions the token wins
    expect(contexts.get('[Effective Date]')).toBe(
      'This Agreement is made by [Company Name], effective [Effective Date]. Signed on [Effective Date] by $[Amount]. Closing.',
    )
    expect(contexts.get('$[Amount]')).toBe(contexts.get('[Effective Date]'))
  })

  it('keeps blank paragraphs in the distance count', () => {
    const { contexts } = scanPlaceholders(DocxDocument.load(paragraphsDocx('A', '   ', '[X]', 'B')))
    expect(contexts.get('[X]')).toBe('[X] B')
  })

  it('honours a wider or zero radius', () => {
    const doc = DocxDocument.load(paragraphsDocx('A', 'B', '[X]', 'C', 'D'))
    expect(scanPlaceholders(doc, { radius: 0 }).contexts.get('[X]')).toBe('[X]')
    expect(scanPlaceholders(doc, { radius: 2 }).contexts.get('[X]')).toBe('A B [X] C D')
  })

  it('appends table-only tokens without context', () => {
    const doc = DocxDocument.load(xmlDocx(p('By [Company Name]') + tbl([['[Signatory]', '[Company Name]']])))
    const { placeholders, contexts } = scanPlaceholders(doc)
    expect(placeholders).toEqual(['[Company Name]', '[Signatory]'])
    expect(contexts.has('[Signatory]')).toBe(false)
    expect(contexts.get('[Company Name]')).toBe('By [Company Name]')
  })

  it('returns empty results for a document without placeholders', () => {
    const { placeholders, contexts } = scanPlaceholders(DocxDocument.load(paragraphsDocx('No fields here.', 'None.')))
    expect(placeholders).toEqual([])
    expect(contexts.size).toBe(0)
  })
})

describe('findPlaceholders', () => {
  it('scans paragraphs then table cells', () => {
    const doc = DocxDocument.load(xmlDocx(tbl([['[Title]']]) + p('[Name] and [Title]')))
    expect(findPlaceholders(doc)).toEqual(['[Name]', '[Title]'])
  })
})
