import type { FormatOptions } from "./format-options"
import type { LineSink } from "./line-sink"
import type { TimeSource } from "./time-source"

/**
 * When a writer's prefix is computed.
 *
 * - `static`: once, while the logger is built. Timestamp and call site are
 *   those of the `createLogger` call and stay frozen for every line.
 * - `per-line`: on every write, so each line carries its own time and the
 *   location of the log call.
 */
export type PrefixMode = "static" | "per-line"

export type LoggerConfig = {
  /**
   * Directory of the log file, relative to the working directory.
   * @default ""
   */
  directory?: string

  /** Log file name. Must not be empty. */
  filename: string

  /**
   * Also write every line to the console.
   * @default false
   */
  stdout?: boolean

  /**
   * Prefix segments, see `FormatFlags`.
   * @default 0
   */
  include?: FormatOptions

  /** @default "static" */
  prefixMode?: PrefixMode
}

export type LoggerDeps = {
  /**
   * Base directory the log file path is resolved against.
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Console destination.
   * @default a sink writing to `process.stdout`
   */
  console?: LineSink

  clock?: TimeSource
}
