import type { SeverityKey, SeverityLevel } from "./log-level"

/**
 * A writer bound to one severity label and one sink.
 *
 * Every call produces exactly one line: prefix, message and a trailing newline.
 */
export interface LevelWriter {
  readonly level: SeverityLevel

  /**
   * The prefix computed when the logger was built, or `undefined` when the
   * prefix is recomputed for each line.
   */
  readonly prefix: string | undefined

  /**
   * printf-style write (`%s`, `%d`, `%i`, `%f`, `%j`, `%o`, `%O`, `%%`).
   * A newline is appended unless the message already ends with one.
   */
  printf(format: string, ...args: unknown[]): void

  /** Operands separated by single spaces, always followed by a newline. */
  println(...args: unknown[]): void

  /**
   * Operands concatenated; a space goes between two operands only when
   * neither is a string. A newline is appended unless already present.
   */
  print(...args: unknown[]): void
}

export type Logger = {
  readonly [K in SeverityKey]: LevelWriter
}
