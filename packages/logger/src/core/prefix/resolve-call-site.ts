import { fileURLToPath } from "node:url"
import type { CallSite } from "../../ports/call-site"

type StackHolder = { stack?: unknown }

function isFrameList(value: unknown): value is NodeJS.CallSite[] {
  return (
    Array.isArray(value) &&
    value.every((frame: unknown) => {
      return (
        typeof frame === "object" &&
        frame !== null &&
        "getFileName" in frame &&
        typeof frame.getFileName === "function"
      )
    })
  )
}

function toFilePath(fileName: string): string {
  return fileName.startsWith("file://") ? fileURLToPath(fileName) : fileName
}

/**
 * Structured V8 frames starting at the caller of `above`.
 *
 * `Error.prepareStackTrace` is swapped only for the duration of the capture;
 * the stack is read inside the swap because V8 formats it lazily.
 */
function captureFrames(above: (...args: never[]) => unknown): NodeJS.CallSite[] {
  const original = Error.prepareStackTrace
  const holder: StackHolder = {}

  try {
    Error.prepareStackTrace = (_err, frames) => frames
    Error.captureStackTrace(holder, above)

    const frames = holder.stack

    return isFrameList(frames) ? frames : []
  } finally {
    Error.prepareStackTrace = original
  }
}

/**
 * Resolves the source location `depth` frames above the function calling
 * `resolveCallSite` (`0` is that function itself).
 *
 * Returns `undefined` when the stack is not that deep or the frame has no
 * file or line (native and eval frames).
 */
export function resolveCallSite(depth: number = 0): CallSite | undefined {
  const frame = captureFrames(resolveCallSite)[depth]
  if (!frame) return undefined

  const fileName = frame.getFileName()
  const line = frame.getLineNumber()

  if (!fileName || typeof line !== "number") return undefined

  return { file: toFilePath(fileName), line }
}
