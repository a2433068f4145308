import { createInterface } from 'readline'
import type { CounterEngine } from '@core/counters'
import type { HeroLookup } from '@core/heroes'
import type { CounterService } from '../services/counter-service'
import { formatHeroNames } from '../format'
import { runModeMenu } from './mode-menu'

// @DEV-GUIDE: Line-oriented prompt. Each line is one command:
//   x       exit
//   names   list every hero name
//   modes   open the mode menu
//   other   treated as a hero name and looked up with the selected mode
// Commands run one at a time: the next line is only taken after the previous lookup
// has printed its result, so at most one provider request is ever in flight. Lines that
// arrive meanwhile (piped input) stay queued in the readline iterator. End of input
// answers null and ends the loop like `x`.

export interface CommandContext {
  engine: CounterEngine
  heroes: HeroLookup
  counters: CounterService
  output: (line: string) => void
  ask: (prompt: string) => Promise<string | null>
}

export const INSTRUCTIONS = [
  'Instructions:',
  '\tEnter a hero name to see their counters.',
  "\tEnter 'names' to see a list of all hero names.",
  "\tEnter 'modes' to see different ways of getting counter information (web-scraping vs. API usage).",
]

/** Runs one command. Returns false when the loop should stop. */
export async function handleCommand(line: string, ctx: CommandContext): Promise<boolean> {
  const command = line.trim().toLowerCase()

  switch (command) {
    case 'x':
      return false
    case '':
      return true
    case 'names':
      for (const name of formatHeroNames(ctx.heroes.names())) {
        ctx.output(name)
      }
      return true
    case 'modes':
      await runModeMenu(ctx)
      return true
    default:
      await ctx.counters.lookup(command)
      return true
  }
}

export async function runCommandLoop(
  deps: Omit<CommandContext, 'ask'>,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<void> {
  const rl = createInterface({ input, output })
  const lines = rl[Symbol.asyncIterator]()

  const ctx: CommandContext = {
    ...deps,
    ask: async (prompt) => {
      rl.setPrompt(prompt)
      rl.prompt()
      const next = await lines.next()
      return next.done ? null : next.value
    },
  }

  deps.output('Welcome to the Dota 2 Matchups App!')
  deps.output('')
  for (const line of INSTRUCTIONS) {
    deps.output(line)
  }

  try {
    let keepRunning = true
    while (keepRunning) {
      const line = await ctx.ask('\nEnter a command (x to exit): ')
      keepRunning = line !== null && (await handleCommand(line, ctx))
    }
  } finally {
    rl.close()
  }
}
