import { format, inspect } from "node:util"

function operandText(value: unknown): string {
  return typeof value === "string" ? value : inspect(value)
}

export function ensureNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`
}

export function formatPrintf(template: string, args: unknown[]): string {
  return ensureNewline(format(template, ...args))
}

export function formatPrintln(args: unknown[]): string {
  return `${args.map(operandText).join(" ")}\n`
}

export function formatPrint(args: unknown[]): string {
  let text = ""

  for (let i = 0; i < args.length; i++) {
    const value = args[i]

    if (i > 0 && typeof value !== "string" && typeof args[i - 1] !== "string") {
      text += " "
    }

    text += operandText(value)
  }

  return ensureNewline(text)
}
