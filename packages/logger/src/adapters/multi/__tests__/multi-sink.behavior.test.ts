import type { LineSink } from "../../../ports/line-sink"
import { MultiSink } from "../multi-sink"

describe("MultiSink behavior", () => {
  it("writes the same string to every sink in order", () => {
    const calls: string[] = []

    const a: LineSink = { write: (line) => calls.push(`a:${line}`) }
    const b: LineSink = { write: (line) => calls.push(`b:${line}`) }

    new MultiSink(a, b).write("ERROR boom\n")

    expect(calls).toEqual(["a:ERROR boom\n", "b:ERROR boom\n"])
  })

  it("calls each sink exactly once per write", () => {
    const a = { write: vi.fn() }
    const b = { write: vi.fn() }

    const sink = new MultiSink(a, b)
    sink.write("x\n")

    expect(a.write).toHaveBeenCalledOnce()
    expect(b.write).toHaveBeenCalledOnce()
  })

  it("accepts no sinks and drops writes", () => {
    const sink = new MultiSink()

    expect(sink.size).toBe(0)
    expect(() => sink.write("nowhere\n")).not.toThrow()
  })

  it("is unaffected by later changes to the array it was built from", () => {
    const a = { write: vi.fn() }
    const b = { write: vi.fn() }
    const sinks: LineSink[] = [a]

    const multi = new MultiSink(...sinks)
    sinks.push(b)
    multi.write("x\n")

    expect(multi.size).toBe(1)
    expect(b.write).not.toHaveBeenCalled()
  })

  it("propagates a sink failure and skips the sinks after it", () => {
    const failing: LineSink = {
      write: () => {
        throw new Error("EIO")
      },
    }
    const after = { write: vi.fn() }

    expect(() => new MultiSink(failing, after).write("x\n")).toThrow("EIO")
    expect(after.write).not.toHaveBeenCalled()
  })
})
