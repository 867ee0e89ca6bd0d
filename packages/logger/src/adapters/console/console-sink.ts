import type { LineSink } from "../../ports/line-sink"

/** Anything `process.stdout` can stand in for. */
export type ConsoleStream = {
  write(chunk: string): unknown
}

export class ConsoleSink implements LineSink {
  private readonly stream: ConsoleStream

  constructor(stream?: ConsoleStream) {
    this.stream = stream ?? process.stdout
  }

  write(line: string): void {
    this.stream.write(line)
  }
}

export function createConsoleSink(stream?: ConsoleStream): LineSink {
  return new ConsoleSink(stream)
}
