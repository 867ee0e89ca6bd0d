export { ConsoleSink, type ConsoleStream, createConsoleSink } from "./adapters/console/console-sink"
export { FileSink, openFileSink } from "./adapters/file/file-sink"
export { MultiSink } from "./adapters/multi/multi-sink"
export { type ConfigIssue, loggerConfigSchema, parseLoggerConfig } from "./core/config/logger-config.schema"
export {
  type CreateLoggerResult,
  createLogger,
  DEFAULT_FORMAT,
  safeCreateLogger,
} from "./core/create-logger"
export {
  ConfigError,
  type ErrorContext,
  FilesystemError,
  type FilesystemOperation,
  isLoggerError,
  LoggerError,
  type LoggerErrorCode,
  type SerializedError,
  serializeError,
} from "./core/errors/logger-error"
export { type BuildPrefixOptions, buildPrefix } from "./core/prefix/build-prefix"
export { formatTimestamp } from "./core/prefix/format-timestamp"
export { resolveCallSite } from "./core/prefix/resolve-call-site"
export { SystemClock } from "./core/time/system-clock"
export type { CallSite } from "./ports/call-site"
export {
  ALL_FORMAT_FLAGS,
  type FormatFlagName,
  FormatFlags,
  type FormatOptions,
  formatFlagNames,
} from "./ports/format-options"
export type { LineSink } from "./ports/line-sink"
export { type SeverityKey, type SeverityLevel, severityLevels } from "./ports/log-level"
export type { LevelWriter, Logger } from "./ports/logger"
export type { LoggerConfig, LoggerDeps, PrefixMode } from "./ports/logger-config"
export type { TimeSource } from "./ports/time-source"
