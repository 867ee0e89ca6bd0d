import { type FormatOptions, needsCallSite } from "../../ports/format-options"
import type { LineSink } from "../../ports/line-sink"
import type { SeverityLevel } from "../../ports/log-level"
import type { LevelWriter } from "../../ports/logger"
import type { TimeSource } from "../../ports/time-source"
import { buildPrefix } from "../prefix/build-prefix"
import { resolveCallSite } from "../prefix/resolve-call-site"
import { formatPrint, formatPrintf, formatPrintln } from "./format-message"

/**
 * Frames between `emit` and the user's log call: `emit` (0), the public
 * write method (1), the caller (2).
 */
export const WRITER_CALLER_DEPTH = 2

export type PrefixSource =
  | { kind: "static"; prefix: string }
  | { kind: "per-line"; include: FormatOptions; clock: TimeSource }

export class PrefixedLevelWriter implements LevelWriter {
  constructor(
    private readonly sink: LineSink,
    readonly level: SeverityLevel,
    private readonly source: PrefixSource,
  ) {}

  get prefix(): string | undefined {
    return this.source.kind === "static" ? this.source.prefix : undefined
  }

  printf(format: string, ...args: unknown[]): void {
    this.emit(formatPrintf(format, args))
  }

  println(...args: unknown[]): void {
    this.emit(formatPrintln(args))
  }

  print(...args: unknown[]): void {
    this.emit(formatPrint(args))
  }

  // Must be called directly from the public write methods, see WRITER_CALLER_DEPTH.
  private emit(message: string): void {
    if (this.source.kind === "static") {
      this.sink.write(`${this.source.prefix}${message}`)
      return
    }

    const { include, clock } = this.source
    const callSite = needsCallSite(include) ? resolveCallSite(WRITER_CALLER_DEPTH) : undefined

    this.sink.write(`${buildPrefix(include, this.level, { clock, callSite })}${message}`)
  }
}
