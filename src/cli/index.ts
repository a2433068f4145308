import 'dotenv/config'
import log from 'electron-log/node'
import { createProgram } from './program'

// @DEV-GUIDE: Command line entry point (bin/dota-counters.mjs loads this through tsx).
// Startup sequence: .env -> config (zod) -> logging -> hero table -> variant registry ->
// engine -> counter service -> commander dispatch. A bad config or unreadable hero table
// is fatal: it is logged and the process exits with code 1. Provider failures never are.
//
//   dota-counters                      interactive prompt
//   dota-counters counters <hero...>   one lookup, exit code 1 on failure
//   dota-counters names | modes        list heroes / provider variants

const logger = log.scope('cli')

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { message: error.message, stack: error.stack })
  process.exit(1)
})

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason))
  logger.error('Unhandled rejection', { message: error.message, stack: error.stack })
  process.exitCode = 1
})

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  logger.error('Command failed', { message })
  process.exitCode = 1
})
