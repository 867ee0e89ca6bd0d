import type { LineSinkHarness } from "./line-sink-harness"

export function describeLineSinkContract(h: LineSinkHarness) {
  describe(`LineSink contract: ${h.name}`, () => {
    it("delivers a line verbatim", () => {
      const { sink, read } = h.make()

      sink.write("INFO started\n")

      expect(read()).toBe("INFO started\n")
    })

    it("preserves write order", () => {
      const { sink, read } = h.make()

      sink.write("first\n")
      sink.write("second\n")
      sink.write("third\n")

      expect(read()).toBe("first\nsecond\nthird\n")
    })

    it("neither adds nor strips newlines", () => {
      const { sink, read } = h.make()

      sink.write("no newline")
      sink.write("\n\n")

      expect(read()).toBe("no newline\n\n")
    })

    it("is visible to the reader as soon as write() returns", () => {
      const { sink, read } = h.make()

      expect(read()).toBe("")

      sink.write("now\n")

      expect(read()).toBe("now\n")
    })
  })
}
