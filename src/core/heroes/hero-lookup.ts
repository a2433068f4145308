import { readFileSync } from 'fs'
import { z } from 'zod'

// @DEV-GUIDE: Hero name <-> id lookup backed by a static heroes.json table.
// The table is keyed by string-encoded ids ({ "1": { "id": 1, "localized_name": "Anti-Mage" } })
// and is read once at startup; after that the lookup is read-only and can be shared freely.
// Names are matched case-insensitively. idToName returns the display casing from the table.
// Used by: extractors (resolve opponents), engine (resolve the subject hero), CLI (user input).

const heroEntrySchema = z.object({
  id: z.number().int(),
  localized_name: z.string().min(1),
})

const heroTableSchema = z.record(z.string(), heroEntrySchema)

export type HeroTable = z.infer<typeof heroTableSchema>

export interface HeroLookup {
  nameToId(name: string): number | null
  idToName(heroId: number): string | null
  /** Lower-case hero names in alphabetical order. */
  names(): string[]
}

export class HeroTableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HeroTableError'
  }
}

export function createHeroLookup(table: HeroTable): HeroLookup {
  const idToNameMap = new Map<number, string>()
  const nameToIdMap = new Map<string, number>()

  for (const entry of Object.values(table)) {
    idToNameMap.set(entry.id, entry.localized_name)
    nameToIdMap.set(entry.localized_name.toLowerCase(), entry.id)
  }

  const sortedNames = [...nameToIdMap.keys()].sort()

  return {
    nameToId(name) {
      return nameToIdMap.get(name.trim().toLowerCase()) ?? null
    },
    idToName(heroId) {
      return idToNameMap.get(heroId) ?? null
    },
    names() {
      return [...sortedNames]
    },
  }
}

/**
 * Read and validate the hero table. Throws HeroTableError when the file is
 * missing, is not JSON, or does not match the expected shape.
 */
export function loadHeroTable(filePath: string): HeroLookup {
  let raw: string
  try {
    raw = readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw new HeroTableError(`Unable to read hero table at ${filePath}`, { cause: err })
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new HeroTableError(`Hero table at ${filePath} is not valid JSON`, { cause: err })
  }

  const parsed = heroTableSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new HeroTableError(
      `Hero table at ${filePath} is malformed: ${issue.path.join('.')}: ${issue.message}`,
    )
  }

  return createHeroLookup(parsed.data)
}
