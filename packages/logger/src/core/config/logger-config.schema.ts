import { z } from "zod"
import { ALL_FORMAT_FLAGS, FormatFlags, formatFlagNames } from "../../ports/format-options"
import type { LoggerConfig } from "../../ports/logger-config"
import { ConfigError } from "../errors/logger-error"

const includeSchema = z.union([
  z.number().int().min(0).max(ALL_FORMAT_FLAGS),
  z
    .array(z.enum(formatFlagNames))
    .transform((names) => names.reduce((mask, name) => mask | FormatFlags[name], 0)),
])

/**
 * Shape of a logger configuration read from an untyped source such as a
 * parsed JSON file. `include` takes either the bitmask or a list of flag names.
 */
export const loggerConfigSchema = z.object({
  directory: z.string().optional(),
  filename: z.string().min(1, "filename is required"),
  stdout: z.boolean().optional(),
  include: includeSchema.optional(),
  prefixMode: z.enum(["static", "per-line"]).optional(),
})

export type ConfigIssue = { path: string; message: string }

export function parseLoggerConfig(raw: unknown): LoggerConfig {
  const result = loggerConfigSchema.safeParse(raw)

  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw new ConfigError(
      `Logger configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { issues } },
    )
  }

  return result.data
}
