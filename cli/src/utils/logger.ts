/**
 * Logger Utility
 *
 * Structured logging for pipeline steps with debug, info, warn, error levels.
 * Signature per level: (data: unknown, msg?: string) => void
 *
 * Lines go to stderr; stdout is reserved for command results.
 */

export type LoggerFn = (data: unknown, msg?: string) => void

export interface Logger {
  debug: LoggerFn
  info: LoggerFn
  warn: LoggerFn
  error: LoggerFn
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface LoggerOptions {
  level?: LogLevel
  /** Defaults to process.stderr */
  write?: (line: string) => void
}

function formatData(data: unknown): string {
  if (data instanceof Error) return data.stack ?? data.message
  return typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data)
}

/**
 * Create a logger instance for a pipeline component
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.level ?? 'info']
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'))

  const createLogMethod = (level: Exclude<LogLevel, 'silent'>): LoggerFn => {
    if (LEVEL_RANK[level] < minRank) return () => {}

    return (data: unknown, msg?: string) => {
      const timestamp = new Date().toISOString()
      const prefix = `[${timestamp}] [${scope}:${level}]`

      if (msg) {
        write(`${prefix} ${msg} ${formatData(data)}`)
      } else {
        write(`${prefix} ${formatData(data)}`)
      }
    }
  }

  return {
    debug: createLogMethod('debug'),
    info: createLogMethod('info'),
    warn: createLogMethod('warn'),
    error: createLogMethod('error'),
  }
}

/**
 * No-op logger for when logging is disabled
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
