/**
 * Structured logging.
 *
 * Emits one JSON line per record: { ...bindings, ...fields, ts, level, msg }.
 * Records below the configured level are dropped before serialisation.
 * Fields never replace the record's own ts, level or msg.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = typeof LOG_LEVELS[number]

export type LogFields = Record<string, string | number | boolean | null>

export interface Logger {
  readonly level: LogLevel
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export interface LoggerOptions {
  level?: LogLevel
  /** Receives each serialised line, newline included. Defaults to stdout. */
  sink?: (line: string) => void
  /** Fields added to every record */
  bindings?: LogFields
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
}

function stdoutSink(line: string): void {
  process.stdout.write(line)
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const sink = options.sink ?? stdoutSink
  const bindings = options.bindings ?? {}
  const threshold = SEVERITY[level]

  const emit = (recordLevel: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (SEVERITY[recordLevel] < threshold) return
    const entry = {
      ...bindings,
      ...fields,
      ts: new Date().toISOString(),
      level: recordLevel,
      msg,
    }
    sink(JSON.stringify(entry) + '\n')
  }

  return {
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}
