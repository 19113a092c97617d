export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

function isLogLevel(value: string): value is LogLevel {
  return Object.keys(LEVEL_ORDER).includes(value)
}

let threshold: LogLevel = resolveLevel(process.env.KEEPSAKE_LOG_LEVEL)

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase()
  return isLogLevel(normalized) ? normalized : 'info'
}

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

/**
 * Console logger that prefixes every line with a component tag, e.g.
 * `[dedup] candidate dropped`.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`
  const emit = (level: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return
    const line = `${prefix} ${message}`
    if (level === 'error') console.error(line, ...details)
    else if (level === 'warn') console.warn(line, ...details)
    else console.log(line, ...details)
  }

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details)
  }
}
