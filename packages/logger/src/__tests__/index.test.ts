import * as fs from "node:fs"
import * as os from "node:os"
import * as path from "node:path"
import {
  ConfigError,
  createLogger,
  DEFAULT_FORMAT,
  FormatFlags,
  MultiSink,
  parseLoggerConfig,
  severityLevels,
} from "../index"

describe("package entry", () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "linefan-entry-"))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it("builds a logger from a parsed JSON config", () => {
    const raw: unknown = JSON.parse(
      '{"directory":"logs","filename":"app.log","include":["LogLevel"]}',
    )

    const logger = createLogger(parseLoggerConfig(raw), { cwd: tempDir })
    logger.error.printf("exit code %d", 2)

    expect(fs.readFileSync(path.join(tempDir, "logs", "app.log"), "utf8")).toBe(
      "ERROR exit code 2\n",
    )
  })

  it("fans a logger out to custom sinks through MultiSink", () => {
    const a: string[] = []
    const b: string[] = []
    const fanOut = new MultiSink({ write: (l) => a.push(l) }, { write: (l) => b.push(l) })

    createLogger(null, { console: fanOut }).info.println("twice")

    expect(a).toHaveLength(1)
    expect(b).toEqual(a)
  })

  it("exports the default format and the level list", () => {
    expect(DEFAULT_FORMAT).toBe(
      FormatFlags.DateTime | FormatFlags.LogLevel | FormatFlags.ShortFileName,
    )
    expect(severityLevels).toEqual(["DEBUG", "INFO", "WARN", "ERROR", "TRACE"])
  })

  it("rejects an empty filename", () => {
    expect(() => createLogger({ filename: "" }, { cwd: tempDir })).toThrow(ConfigError)
  })
})
