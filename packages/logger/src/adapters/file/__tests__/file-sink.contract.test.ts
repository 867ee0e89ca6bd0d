import * as fs from "node:fs"
import * as os from "node:os"
import * as path from "node:path"
import { describeLineSinkContract } from "../../../ports/__tests__/line-sink.contract"
import { openFileSink } from "../file-sink"

const tempDirs: string[] = []

afterAll(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
})

describeLineSinkContract({
  name: "FileSink",
  make: () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "linefan-contract-"))
    tempDirs.push(dir)

    const filePath = path.join(dir, "contract.log")
    const sink = openFileSink(filePath)

    return { sink, read: () => fs.readFileSync(filePath, "utf8") }
  },
})
