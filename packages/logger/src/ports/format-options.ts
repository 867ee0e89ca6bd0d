/**
 * Independent flags controlling which segments a line prefix carries.
 *
 * @remarks
 * Combine with bitwise OR. When both file flags are set the short form wins.
 */
export const FormatFlags = {
  /** Local date and time as `YYYY-MM-DD HH:MM:SS`. */
  DateTime: 1 << 0,
  /** Severity label, e.g. `INFO`. */
  LogLevel: 1 << 1,
  /** Basename of the calling file and the line number. */
  ShortFileName: 1 << 2,
  /** Full path of the calling file and the line number. */
  LongFileName: 1 << 3,
} as const

export type FormatFlagName = keyof typeof FormatFlags

export const formatFlagNames = [
  "DateTime",
  "LogLevel",
  "ShortFileName",
  "LongFileName",
] as const satisfies readonly FormatFlagName[]

/** Bitwise OR of {@link FormatFlags}; `0` means no prefix at all. */
export type FormatOptions = number

export const ALL_FORMAT_FLAGS: FormatOptions =
  FormatFlags.DateTime |
  FormatFlags.LogLevel |
  FormatFlags.ShortFileName |
  FormatFlags.LongFileName

export function hasFlag(options: FormatOptions, flags: FormatOptions): boolean {
  return (options & flags) !== 0
}

export function needsCallSite(options: FormatOptions): boolean {
  return hasFlag(options, FormatFlags.ShortFileName | FormatFlags.LongFileName)
}
