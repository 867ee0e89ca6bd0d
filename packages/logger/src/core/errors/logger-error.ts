export type LoggerErrorCode = "config_error" | "filesystem_error"

/**
 * Structured metadata attached to errors, kept out of the message string.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type LoggerErrorOptions<C extends LoggerErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * JSON-safe form of an error and its cause chain.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp?: string
  cause?: SerializedError
}>

export class LoggerError<C extends LoggerErrorCode = LoggerErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp: Date

  constructor(message: string, options: LoggerErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/** A logger configuration was rejected before anything touched the disk. */
export class ConfigError extends LoggerError<"config_error"> {
  constructor(message: string, options: Omit<LoggerErrorOptions<"config_error">, "code"> = {}) {
    super(message, { ...options, code: "config_error" })
  }
}

export type FilesystemOperation = "mkdir" | "open"

export type FilesystemErrorOptions = Readonly<{
  path: string
  operation: FilesystemOperation
  cause: unknown
}>

/**
 * Creating the log directory or opening the log file failed.
 * `cause` holds the error raised by `fs`.
 */
export class FilesystemError extends LoggerError<"filesystem_error"> {
  readonly path: string
  readonly operation: FilesystemOperation

  constructor(message: string, options: FilesystemErrorOptions) {
    super(message, {
      code: "filesystem_error",
      context: { path: options.path, operation: options.operation },
      cause: options.cause,
    })

    this.path = options.path
    this.operation = options.operation
  }
}

export function isLoggerError(value: unknown): value is LoggerError {
  return value instanceof LoggerError
}

/**
 * Serialize a LoggerError, an Error (including `fs` errors with their errno
 * code) or any other thrown value.
 */
export function serializeError(err: unknown): SerializedError {
  if (err instanceof LoggerError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "code" in err && typeof err.code === "string" ? err.code : "unknown",
      message: err.message,
      context: {},
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
  }
}
