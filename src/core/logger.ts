import type { Logger, LogLevel } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

type Sink = (line: string) => void

function consoleSink(line: string): void {
  // eslint-disable-next-line no-console
  console.log(line)
}

/** Returns true when the value names a known log level. */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value)
}

/**
 * Creates a JSON-lines logger that drops records below `level`.
 */
export function createLogger(level: LogLevel = 'info', sink: Sink = consoleSink): Logger {
  const threshold = LEVEL_ORDER[level]

  function emit(recordLevel: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[recordLevel] < threshold) return
    const payload = {
      ts: new Date().toISOString(),
      level: recordLevel.toUpperCase(),
      event,
      ...(data ?? {})
    }
    sink(JSON.stringify(payload))
  }

  return {
    debug(event, data) {
      emit('debug', event, data)
    },
    info(event, data) {
      emit('info', event, data)
    },
    warn(event, data) {
      emit('warn', event, data)
    },
    error(event, data) {
      emit('error', event, data)
    }
  }
}

const envLevel = process.env.TIERGATE_LOG_LEVEL?.toLowerCase()

/** Process-wide JSON logger used by the runtime entry point. */
export const logger: Logger = createLogger(isLogLevel(envLevel) ? envLevel : 'info')
