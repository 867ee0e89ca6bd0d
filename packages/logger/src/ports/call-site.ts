export type CallSite = {
  /** Absolute path of the source file. */
  file: string
  line: number
}
