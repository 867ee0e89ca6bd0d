import * as path from "node:path"
import type { CallSite } from "../../ports/call-site"
import { FormatFlags, type FormatOptions, hasFlag, needsCallSite } from "../../ports/format-options"
import type { SeverityLevel } from "../../ports/log-level"
import type { TimeSource } from "../../ports/time-source"
import { SystemClock } from "../time/system-clock"
import { formatTimestamp } from "./format-timestamp"
import { resolveCallSite } from "./resolve-call-site"

export type BuildPrefixOptions = {
  /**
   * Frames to walk back from the function calling `buildPrefix` to reach the
   * reported call site (`0` is that function).
   * @default 0
   */
  callerDepth?: number

  /**
   * Location to report instead of walking the stack. When the key is present,
   * even as `undefined`, the stack is never inspected and `undefined` drops
   * the file segment.
   */
  callSite?: CallSite

  /** @default the system clock */
  clock?: TimeSource
}

const systemClock = new SystemClock()

/**
 * Builds the literal prefix of a log line: timestamp, level label, then
 * `file:line`, each followed by one space and each present only when its
 * flag is set.
 *
 * @example
 * ```ts
 * buildPrefix(FormatFlags.DateTime | FormatFlags.LogLevel, "WARN")
 * // "2024-01-15 10:30:05 WARN "
 * ```
 */
export function buildPrefix(
  options: FormatOptions,
  level: SeverityLevel,
  opts: BuildPrefixOptions = {},
): string {
  let prefix = ""

  if (hasFlag(options, FormatFlags.DateTime)) {
    prefix += `${formatTimestamp((opts.clock ?? systemClock).now())} `
  }

  if (hasFlag(options, FormatFlags.LogLevel)) {
    prefix += `${level} `
  }

  if (needsCallSite(options)) {
    const site =
      "callSite" in opts ? opts.callSite : resolveCallSite((opts.callerDepth ?? 0) + 1)

    if (site) {
      const file = hasFlag(options, FormatFlags.ShortFileName)
        ? path.basename(site.file)
        : site.file

      prefix += `${file}:${site.line} `
    }
  }

  return prefix
}
