import { describe, it, expect, vi } from 'vitest'
import { Readable, Writable } from 'stream'
import { createCounterEngine } from '@core/counters/engine'
import type { CounterService } from '../../../../src/cli/services/counter-service'
import {
  handleCommand,
  runCommandLoop,
  type CommandContext,
} from '../../../../src/cli/prompt/command-loop'
import { formatModeList, runModeMenu } from '../../../../src/cli/prompt/mode-menu'
import { createTestHeroes } from '../../core/test-helpers'

const heroes = createTestHeroes()

function createContext(answers: string[] = []) {
  const engine = createCounterEngine({
    heroes,
    sources: { OD_API: null, DB_SCRAPE: null, OD_SCRAPE: null },
    initialVariant: 'OD_API',
  })
  const lookup = vi.fn<CounterService['lookup']>().mockResolvedValue(true)
  const lines: string[] = []
  const ask = vi.fn(async (_prompt: string): Promise<string | null> => answers.shift() ?? null)
  const ctx: CommandContext = {
    engine,
    heroes,
    counters: { lookup },
    output: (line) => lines.push(line),
    ask,
  }
  return { ctx, engine, lookup, lines, ask }
}

describe('handleCommand', () => {
  it('stops on x', async () => {
    const { ctx } = createContext()
    expect(await handleCommand('x', ctx)).toBe(false)
    expect(await handleCommand(' X ', ctx)).toBe(false)
  })

  it('ignores empty lines', async () => {
    const { ctx, lookup, lines } = createContext()
    expect(await handleCommand('   ', ctx)).toBe(true)
    expect(lookup).not.toHaveBeenCalled()
    expect(lines).toEqual([])
  })

  it('lists hero names', async () => {
    const { ctx, lines } = createContext()

    await handleCommand('names', ctx)

    expect(lines).toEqual([
      'Hero name list:',
      '\tanti-mage',
      '\taxe',
      '\tcrystal maiden',
      "\tnature's prophet",
      '\tpudge',
      '\tursa',
    ])
  })

  it('looks up anything else as a lower-cased hero name', async () => {
    const { ctx, lookup } = createContext()

    expect(await handleCommand('  Crystal Maiden ', ctx)).toBe(true)
    expect(lookup).toHaveBeenCalledWith('crystal maiden')
  })

  it('opens the mode menu', async () => {
    const { ctx, engine, ask } = createContext(['db_scrape'])

    await handleCommand('modes', ctx)

    expect(ask).toHaveBeenCalledWith('\nEnter mode key: ')
    expect(engine.selectedVariant()).toBe('DB_SCRAPE')
  })
})

function discardOutput(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback()
    },
  })
}

describe('runCommandLoop', () => {
  it('keeps piped lines that arrive while a lookup is pending', async () => {
    const { ctx, lookup, lines } = createContext()
    lookup.mockImplementation(
      () => new Promise<boolean>((resolve) => setTimeout(() => resolve(true), 20)),
    )
    const { ask: _ask, ...deps } = ctx

    await runCommandLoop(deps, Readable.from(['axe\nnames\nx\npudge\n']), discardOutput())

    expect(lookup).toHaveBeenCalledTimes(1)
    expect(lookup).toHaveBeenCalledWith('axe')
    expect(lines).toContain('Hero name list:')
    expect(lines.at(-1)).toBe('\tursa')
  })

  it('stops at the end of input without x', async () => {
    const { ctx, lookup, lines } = createContext()
    const { ask: _ask, ...deps } = ctx

    await runCommandLoop(deps, Readable.from(['axe\n', 'ursa\n']), discardOutput())

    expect(lookup.mock.calls).toEqual([['axe'], ['ursa']])
    expect(lines[0]).toBe('Welcome to the Dota 2 Matchups App!')
  })

  it('reads the mode key from the line after modes', async () => {
    const { ctx, engine } = createContext()
    const { ask: _ask, ...deps } = ctx

    await runCommandLoop(deps, Readable.from(['modes\ndb_scrape\nx\n']), discardOutput())

    expect(engine.selectedVariant()).toBe('DB_SCRAPE')
  })
})

describe('runModeMenu', () => {
  it('prints the current mode and every variant', async () => {
    const { ctx, lines } = createContext(['OD_API'])

    await runModeMenu(ctx)

    expect(lines.slice(0, 4)).toEqual([
      '',
      'Current Mode: OD_API',
      '',
      'Select one of the following modes for analyzing counters by entering the corresponding key:',
    ])
    expect(lines.slice(4, 7)).toEqual(formatModeList(ctx.engine))
    expect(lines[7]).toBe('Mode set to OD_API')
  })

  it('keeps the mode for an unknown key', async () => {
    const { ctx, engine, lines } = createContext(['stratz'])

    await runModeMenu(ctx)

    expect(engine.selectedVariant()).toBe('OD_API')
    expect(lines.at(-1)).toBe('Unable to recognize: stratz, please try again with a key from the list.')
  })

  it('leaves the mode unchanged when input ends', async () => {
    const { ctx, engine, lines } = createContext([])

    await runModeMenu(ctx)

    expect(engine.selectedVariant()).toBe('OD_API')
    expect(lines.at(-1)).toBe(
      '\t  OD_SCRAPE - Obtain matchups from the OpenDota website (not yet supported)',
    )
  })
})

describe('formatModeList', () => {
  it('marks the selected variant', () => {
    const { engine } = createContext()
    engine.selectVariant('DB_SCRAPE')

    expect(formatModeList(engine)).toEqual([
      '\t* DB_SCRAPE - Obtain advantage-scores in public matches from Dotabuff (with web-scraping techniques)',
      '\t  OD_API - Obtain raw winrates in professional matches from OpenDota (with the OpenDota API)',
      '\t  OD_SCRAPE - Obtain matchups from the OpenDota website (not yet supported)',
    ])
  })
})
