import log from 'electron-log/node'
import type { AppConfig } from './config'

// Console transport always on; the file transport only when LOG_FILE is configured.
export function initLogging(config: Pick<AppConfig, 'logLevel' | 'logFile'>): void {
  log.transports.console.level = config.logLevel

  const { logFile } = config
  if (logFile) {
    log.transports.file.level = config.logLevel
    log.transports.file.maxSize = 10 * 1024 * 1024 // 10MB
    log.transports.file.resolvePathFn = () => logFile
  } else {
    log.transports.file.level = false
  }
}
