/**
 * Structured logging.
 *
 * One JSON line per entry: timestamp, level, scope, message and any extra
 * fields. debug/info go to stdout, warn/error to stderr, so log aggregators
 * reading either stream get machine-parseable records.
 */

import type { LogLevel } from './settings'
import { settings } from './settings'

export type EntryLevel = Exclude<LogLevel, 'silent'>

export interface LogEntry {
  readonly ts: string
  readonly level: EntryLevel
  readonly scope: string
  readonly msg: string
  readonly [field: string]: unknown
}

export type LogSink = (entry: LogEntry) => void

export type LogFields = Readonly<Record<string, unknown>>

export interface Logger {
  readonly scope: string
  readonly level: LogLevel
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  now?: () => Date
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/** Default sink: stdout for debug/info, stderr for warn/error. */
export const stdioSink: LogSink = (entry) => {
  const line = JSON.stringify(entry) + '\n'
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(line)
  } else {
    process.stdout.write(line)
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? settings.logLevel
  const sink = options.sink ?? stdioSink
  const now = options.now ?? (() => new Date())

  const emit = (entryLevel: EntryLevel, msg: string, fields: LogFields = {}): void => {
    if (SEVERITY[entryLevel] < SEVERITY[level]) return
    sink({ ...fields, ts: now().toISOString(), level: entryLevel, scope, msg })
  }

  return {
    scope,
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink, now }),
  }
}
