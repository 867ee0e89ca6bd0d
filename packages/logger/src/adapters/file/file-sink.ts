import * as fs from "node:fs"
import * as path from "node:path"
import pino, { type DestinationStream } from "pino"
import { FilesystemError } from "../../core/errors/logger-error"
import type { LineSink } from "../../ports/line-sink"

export const LOG_DIRECTORY_MODE = 0o755
export const LOG_FILE_MODE = 0o644

// A failed write is dropped; log calls never throw once the file is open.
const dropWriteError = (): void => undefined

/**
 * Appends lines to an open log file through a synchronous pino destination,
 * one `write(2)` per line.
 *
 * The descriptor stays open for the life of the process. A line the kernel
 * refuses (a full disk, a revoked descriptor) is lost without an error.
 */
export class FileSink implements LineSink {
  constructor(
    readonly path: string,
    private readonly destination: DestinationStream,
  ) {}

  write(line: string): void {
    this.destination.write(line)
  }
}

/**
 * Creates the parent directory if needed and opens `filePath` for
 * append-only writing, creating it when missing. Existing content is kept.
 *
 * @throws {FilesystemError} when the directory cannot be created or the file
 * cannot be opened.
 */
export function openFileSink(filePath: string): FileSink {
  const directory = path.dirname(filePath)

  try {
    fs.mkdirSync(directory, { recursive: true, mode: LOG_DIRECTORY_MODE })
  } catch (err) {
    throw new FilesystemError(`Failed to create log directory ${directory}`, {
      path: directory,
      operation: "mkdir",
      cause: err,
    })
  }

  let fd: number

  try {
    fd = fs.openSync(filePath, "a", LOG_FILE_MODE)
  } catch (err) {
    throw new FilesystemError(`Failed to open log file ${filePath}`, {
      path: filePath,
      operation: "open",
      cause: err,
    })
  }

  const destination = pino.destination({ fd, sync: true })
  destination.on("error", dropWriteError)

  return new FileSink(filePath, destination)
}
