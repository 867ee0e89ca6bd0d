import { ConsoleSink, createConsoleSink } from "../console-sink"

describe("ConsoleSink behavior", () => {
  it("writes to process.stdout when no stream is provided", () => {
    const writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true)

    new ConsoleSink().write("to stdout\n")

    expect(writeSpy).toHaveBeenCalledOnce()
    expect(writeSpy).toHaveBeenCalledWith("to stdout\n")
  })

  it("passes each line to the injected stream in a single call", () => {
    const write = vi.fn()

    const sink = createConsoleSink({ write })
    sink.write("WARN disk almost full\n")

    expect(write).toHaveBeenCalledOnce()
    expect(write).toHaveBeenCalledWith("WARN disk almost full\n")
  })
})
