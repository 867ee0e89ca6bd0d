import type { TimeSource } from "../../ports/time-source"

export class SystemClock implements TimeSource {
  now(): Date {
    return new Date()
  }
}
