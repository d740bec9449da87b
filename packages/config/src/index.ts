// Shared configuration: environment settings and structured logging.

export {
  settings,
  loadSettings,
  DEFAULT_SETTINGS,
  VALIDATION_MODES,
  LOG_LEVELS,
  type Settings,
  type Environment,
  type ValidationMode,
  type LogLevel,
  type AxisIndex,
} from './settings'

export {
  createLogger,
  stdioSink,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogSink,
  type LogFields,
  type EntryLevel,
} from './logger'
