import * as cheerio from 'cheerio'
import type { Outcome } from '@shared/types'
import type { HeroLookup } from '@core/heroes'
import { fail, ok } from '@core/outcome'
import type { Extraction, MatchupExtractor, MatchupRecord, MatchupSection } from './types'

// @DEV-GUIDE: Parses a Dotabuff counters page into MatchupRecords.
// The page carries exactly two `table.sortable` elements. Their order is the contract:
// the first lists heroes that counter the subject, the second heroes it counters. Headings
// are never read, so each record is tagged with its positional `section`.
// Row layout: [portrait, hero name, advantage "2.35%", ...]. The first row of each table is
// the header. A data row with fewer than three cells means the layout changed, so the whole
// page fails with MarkupError instead of being partially read.

const SECTION_SELECTOR = 'table.sortable'
const SECTION_ORDER: readonly MatchupSection[] = ['counters', 'countered']
const MIN_CELLS = 3
const TEXT_NODE = 3

export function extractDotabuffMatchups(html: string, heroes: HeroLookup): Outcome<Extraction> {
  const $ = cheerio.load(html)
  const sections = $(SECTION_SELECTOR).toArray()

  if (sections.length !== SECTION_ORDER.length) {
    return fail(
      'MarkupError',
      `Expected ${SECTION_ORDER.length} "${SECTION_SELECTOR}" sections, found ${sections.length}`,
    )
  }

  const records: MatchupRecord[] = []
  const unresolved: string[] = []

  for (const [sectionIndex, sectionElement] of sections.entries()) {
    const section = SECTION_ORDER[sectionIndex]
    const rows = $(sectionElement).find('tr').toArray().slice(1)

    for (const [rowIndex, rowElement] of rows.entries()) {
      const cells = $(rowElement).children('td, th')
      if (cells.length < MIN_CELLS) {
        return fail(
          'MarkupError',
          `Row ${rowIndex + 1} of section ${sectionIndex + 1} has ${cells.length} cells, expected at least ${MIN_CELLS}`,
        )
      }

      const name = cells.eq(1).text().trim()
      const percentText = cells
        .eq(2)
        .contents()
        .filter((_index, node) => node.nodeType === TEXT_NODE)
        .first()
        .text()

      const score = parsePercentage(percentText)
      if (score === null) {
        return fail(
          'MarkupError',
          `Row ${rowIndex + 1} of section ${sectionIndex + 1} has no percentage (got "${percentText.trim()}")`,
        )
      }

      const opponentId = heroes.nameToId(name)
      if (opponentId === null) {
        unresolved.push(name)
        continue
      }

      records.push({ opponentId, sampleSize: null, score, section })
    }
  }

  return ok({ records, unresolved })
}

/** "62.5%" → 0.625. Returns null for anything that is not a number. */
export function parsePercentage(text: string): number | null {
  const trimmed = text.trim().replace(/%$/, '')
  if (trimmed === '') return null
  const value = Number(trimmed)
  return Number.isFinite(value) ? value / 100 : null
}

export const dotabuffExtractor: MatchupExtractor = {
  extract: extractDotabuffMatchups,
}
