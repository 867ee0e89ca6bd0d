export const severityLevels = ["DEBUG", "INFO", "WARN", "ERROR", "TRACE"] as const

/**
 * Display label of a level writer.
 *
 * These carry no ordering: every level always emits.
 */
export type SeverityLevel = (typeof severityLevels)[number]

export type SeverityKey = Lowercase<SeverityLevel>
