// Shared logger (electron-log, Node.js entry)

import log from 'electron-log/node'

export type LogLevelOption = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly' | false

export interface LoggingOptions {
  consoleLevel?: LogLevelOption
  filePath?: string
  fileLevel?: LogLevelOption
}

// Library default: warnings and errors on the console, no log file
log.transports.console.level = 'warn'
log.transports.file.level = false

/**
 * Adjust log transports. Used by the command line and the workflow runner.
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.consoleLevel !== undefined) {
    log.transports.console.level = options.consoleLevel
  }
  if (options.filePath) {
    const filePath = options.filePath
    log.transports.file.resolvePathFn = () => filePath
    log.transports.file.level = options.fileLevel ?? 'info'
  } else if (options.fileLevel !== undefined) {
    log.transports.file.level = options.fileLevel
  }
}

export default log
