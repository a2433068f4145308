import { createHeroLookup, type HeroLookup, type HeroTable } from '@core/heroes'

export const TEST_HERO_TABLE: HeroTable = {
  '1': { id: 1, localized_name: 'Anti-Mage' },
  '2': { id: 2, localized_name: 'Axe' },
  '5': { id: 5, localized_name: 'Crystal Maiden' },
  '14': { id: 14, localized_name: 'Pudge' },
  '53': { id: 53, localized_name: "Nature's Prophet" },
  '70': { id: 70, localized_name: 'Ursa' },
}

export function createTestHeroes(): HeroLookup {
  return createHeroLookup(TEST_HERO_TABLE)
}

export type PageRow = [name: string, percent: string]

/**
 * Builds a counters page in Dotabuff's layout: one `table.sortable` per section,
 * a header row, then [portrait, name, advantage, win rate] data rows.
 */
export function buildCountersPage(sections: PageRow[][]): string {
  const tables = sections.map((rows) => {
    const body = rows
      .map(
        ([name, percent]) =>
          `<tr><td class="cell-icon"><img src="/x.png"></td>` +
          `<td class="cell-xlarge"><a href="/heroes/x">${name}</a></td>` +
          `<td>${percent}<div class="bar"><div class="segment" style="width: 40%"></div></div></td>` +
          `<td>50.00%</td></tr>`,
      )
      .join('')
    return (
      `<section><article><table class="sortable">` +
      `<thead><tr><th>Hero</th><th>Hero</th><th>Disadvantage</th><th>Win Rate</th></tr></thead>` +
      `<tbody>${body}</tbody></table></article></section>`
    )
  })
  return `<html><body><div class="content-inner">${tables.join('')}</div></body></html>`
}

export function mockResponse(status: number, body: string, statusText = 'OK') {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(body),
  }
}
