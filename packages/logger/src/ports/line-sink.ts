/**
 * A destination for fully formatted lines.
 *
 * @remarks
 * `line` already carries its prefix and trailing newline. Sinks write it
 * as-is, synchronously, in one call.
 */
export interface LineSink {
  write(line: string): void
}
