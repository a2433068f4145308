import log from 'electron-log/node'
import { Command, Option } from 'commander'
import { PROVIDER_VARIANTS, isProviderVariant, type ProviderVariant } from '@shared/types'
import { APP_NAME } from '@shared/constants/defaults'
import { createCounterEngine, createVariantRegistry, type CounterEngine } from '@core/counters'
import { loadHeroTable, type HeroLookup } from '@core/heroes'
import { loadAppConfig } from './services/config'
import { initLogging } from './services/logging'
import { createCounterService, type CounterService } from './services/counter-service'
import { runCommandLoop } from './prompt/command-loop'
import { formatModeList } from './prompt/mode-menu'
import { formatHeroNames } from './format'

const logger = log.scope('cli')

const output = (line: string): void => {
  console.log(line)
}

interface AppContext {
  heroes: HeroLookup
  engine: CounterEngine
  counters: CounterService
}

function createAppContext(mode?: ProviderVariant): AppContext {
  const config = loadAppConfig()
  initLogging(config)

  const heroes = loadHeroTable(config.heroesFile)
  logger.debug(`Loaded ${heroes.names().length} heroes from ${config.heroesFile}`)

  const sources = createVariantRegistry({
    timeoutMs: config.fetchTimeoutMs,
    retries: config.fetchRetries,
    onRetry: (message, attempt, delayMs) => {
      logger.warn(`Retry ${attempt} in ${delayMs}ms: ${message}`)
    },
    openDota: { baseUrl: config.openDotaBaseUrl },
    dotabuff: { baseUrl: config.dotabuffBaseUrl, userAgent: config.dotabuffUserAgent },
  })

  const engine = createCounterEngine({
    heroes,
    sources,
    initialVariant: mode ?? config.defaultMode,
    onProgress: (message) => logger.info(message),
  })

  return { heroes, engine, counters: createCounterService({ engine, heroes, output }) }
}

function withContext(
  mode: string | undefined,
  run: (ctx: AppContext) => Promise<void> | void,
): Promise<void> {
  const variant = mode && isProviderVariant(mode) ? mode : undefined

  let ctx: AppContext
  try {
    ctx = createAppContext(variant)
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error('Startup failed', { message })
    output(`System Error: ${message}`)
    process.exitCode = 1
    return Promise.resolve()
  }
  return Promise.resolve(run(ctx))
}

const modeOption = (): Option =>
  new Option('-m, --mode <variant>', 'data source to use').choices(PROVIDER_VARIANTS)

/** Builds the commander program; parsing is left to the caller. */
export function createProgram(): Command {
  const program = new Command()

  program
    .name(APP_NAME)
    .description('Find which Dota 2 heroes counter a hero, and which heroes it counters')
    .version('1.0.0')
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .addOption(modeOption())
    .action((options: { mode?: string }) =>
      withContext(options.mode, (ctx) => runCommandLoop({ ...ctx, output })),
    )

  program
    .command('counters')
    .description('Show counters for one hero')
    .argument('<hero...>', 'hero name, e.g. "crystal maiden"')
    .addOption(modeOption())
    .action((heroWords: string[], options: { mode?: string }) =>
      withContext(options.mode, async (ctx) => {
        const found = await ctx.counters.lookup(heroWords.join(' '))
        if (!found) process.exitCode = 1
      }),
    )

  program
    .command('names')
    .description('List every hero name')
    .action(() =>
      withContext(undefined, (ctx) => {
        formatHeroNames(ctx.heroes.names()).forEach(output)
      }),
    )

  program
    .command('modes')
    .description('List the available data sources')
    .addOption(modeOption())
    .action((options: { mode?: string }) =>
      withContext(options.mode, (ctx) => {
        formatModeList(ctx.engine).forEach(output)
      }),
    )

  return program
}
