import type { LineSink } from "../../ports/line-sink"

/**
 * Duplicates every line to each of its sinks, in the order given.
 *
 * @remarks
 * A sink that throws stops delivery to the sinks after it and the error
 * reaches the caller.
 */
export class MultiSink implements LineSink {
  private readonly sinks: readonly LineSink[]

  constructor(...sinks: LineSink[]) {
    this.sinks = Object.freeze([...sinks])
  }

  get size(): number {
    return this.sinks.length
  }

  write(line: string): void {
    for (const sink of this.sinks) {
      sink.write(line)
    }
  }
}
