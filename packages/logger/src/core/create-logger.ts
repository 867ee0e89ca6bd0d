import * as path from "node:path"
import { createConsoleSink } from "../adapters/console/console-sink"
import { openFileSink } from "../adapters/file/file-sink"
import { MultiSink } from "../adapters/multi/multi-sink"
import { FormatFlags, type FormatOptions, needsCallSite } from "../ports/format-options"
import type { LineSink } from "../ports/line-sink"
import type { SeverityLevel } from "../ports/log-level"
import type { Logger } from "../ports/logger"
import type { LoggerConfig, LoggerDeps } from "../ports/logger-config"
import type { TimeSource } from "../ports/time-source"
import { ConfigError, isLoggerError, type LoggerError } from "./errors/logger-error"
import { buildPrefix } from "./prefix/build-prefix"
import { resolveCallSite } from "./prefix/resolve-call-site"
import { SystemClock } from "./time/system-clock"
import { type PrefixSource, PrefixedLevelWriter } from "./writer/level-writer"

/** Prefix of the console-only logger built without a config. */
export const DEFAULT_FORMAT: FormatOptions =
  FormatFlags.DateTime | FormatFlags.LogLevel | FormatFlags.ShortFileName

/**
 * Frames between `assembleLogger` and the code that asked for a logger:
 * `assembleLogger` (0), `createLogger` / `safeCreateLogger` (1), the caller (2).
 */
const CONSTRUCTION_CALLER_DEPTH = 2

export type CreateLoggerResult =
  | { success: true; logger: Logger }
  | { success: false; error: LoggerError }

function bindLogger(sink: LineSink, sourceFor: (level: SeverityLevel) => PrefixSource): Logger {
  return Object.freeze({
    debug: new PrefixedLevelWriter(sink, "DEBUG", sourceFor("DEBUG")),
    info: new PrefixedLevelWriter(sink, "INFO", sourceFor("INFO")),
    warn: new PrefixedLevelWriter(sink, "WARN", sourceFor("WARN")),
    error: new PrefixedLevelWriter(sink, "ERROR", sourceFor("ERROR")),
    trace: new PrefixedLevelWriter(sink, "TRACE", sourceFor("TRACE")),
  })
}

function perLine(include: FormatOptions, clock: TimeSource): () => PrefixSource {
  return () => ({ kind: "per-line", include, clock })
}

// Must be called directly from the exported factories, see CONSTRUCTION_CALLER_DEPTH.
function assembleLogger(config: LoggerConfig | null, deps: LoggerDeps): Logger {
  const clock = deps.clock ?? new SystemClock()
  const consoleSink = deps.console ?? createConsoleSink()

  if (!config) {
    return bindLogger(new MultiSink(consoleSink), perLine(DEFAULT_FORMAT, clock))
  }

  if (config.filename === "") {
    throw new ConfigError("filename is required", { context: { field: "filename" } })
  }

  const filePath = path.join(deps.cwd ?? process.cwd(), config.directory ?? "", config.filename)
  const file = openFileSink(filePath)
  const sink = config.stdout ? new MultiSink(consoleSink, file) : new MultiSink(file)
  const include = config.include ?? 0

  if (config.prefixMode === "per-line") {
    return bindLogger(sink, perLine(include, clock))
  }

  const callSite = needsCallSite(include)
    ? resolveCallSite(CONSTRUCTION_CALLER_DEPTH)
    : undefined

  return bindLogger(sink, (level) => ({
    kind: "static",
    prefix: buildPrefix(include, level, { clock, callSite }),
  }))
}

/**
 * Builds the five level writers.
 *
 * Without a config every writer goes to the console with {@link DEFAULT_FORMAT}.
 * With one, lines are appended to `cwd/directory/filename` and, when `stdout`
 * is set, duplicated to the console.
 *
 * @throws {ConfigError} when `filename` is empty.
 * @throws {FilesystemError} when the directory or the file cannot be opened.
 *
 * @example
 * ```ts
 * const logger = createLogger({
 *   directory: "logs",
 *   filename: "app.log",
 *   stdout: true,
 *   include: FormatFlags.LogLevel,
 * })
 *
 * logger.info.println("started") // "INFO started\n"
 * ```
 */
export function createLogger(config?: LoggerConfig | null, deps: LoggerDeps = {}): Logger {
  return assembleLogger(config ?? null, deps)
}

/**
 * {@link createLogger} returning construction failures instead of throwing.
 * Errors other than `LoggerError` still propagate.
 */
export function safeCreateLogger(
  config?: LoggerConfig | null,
  deps: LoggerDeps = {},
): CreateLoggerResult {
  try {
    return { success: true, logger: assembleLogger(config ?? null, deps) }
  } catch (err) {
    if (isLoggerError(err)) return { success: false, error: err }
    throw err
  }
}
