import type { VariableMap } from "../../ports/variables"
import { ParseError } from "../errors/parse-error"
import { expandInFile } from "../expansion/expand-variables"

export type ParseEnvFileOptions = {
  /**
   * Expand `${NAME}` against variables defined earlier in the same file.
   *
   * @default true
   */
  expand?: boolean
}

type Quote = '"' | "'"

const KEY_PATTERN = /^[\p{L}\p{N}_]+$/u

const ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  '"': '"',
  "'": "'",
}

/**
 * Parses env-file text into an ordered mapping.
 *
 * @example
 * ```typescript
 * parseEnvFile('HOST=localhost\nURL="http://${HOST}:8080"')
 * // Map { "HOST" => "localhost", "URL" => "http://localhost:8080" }
 * ```
 *
 * @throws {ParseError} on a malformed assignment or an unterminated quote
 */
export function parseEnvFile(content: string, options: ParseEnvFileOptions = {}): VariableMap {
  const expand = options.expand ?? true
  const lines = content.split(/\r?\n/)
  const variables: VariableMap = new Map()

  let index = 0
  while (index < lines.length) {
    const lineNumber = index + 1
    const line = lines[index] ?? ""
    const trimmed = line.trim()

    if (trimmed === "" || trimmed.startsWith("#")) {
      index++
      continue
    }

    const eq = findAssignment(line)
    if (eq === -1) throw ParseError.invalidFormat(lineNumber, trimmed)

    const key = line.slice(0, eq).trim()
    if (!KEY_PATTERN.test(key)) throw ParseError.invalidFormat(lineNumber, trimmed)

    const { value, next } = readValue(line.slice(eq + 1), lines, index)
    variables.set(key, expand ? expandInFile(value, variables) : value)
    index = next
  }

  return variables
}

/**
 * Index of the first `=` outside quotes, or -1.
 */
function findAssignment(line: string): number {
  let quote: Quote | undefined

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i)

    if (quote === '"' && ch === "\\") {
      i++
    } else if (quote !== undefined) {
      if (ch === quote) quote = undefined
    } else if (ch === '"' || ch === "'") {
      quote = ch
    } else if (ch === "=") {
      return i
    }
  }

  return -1
}

function readValue(
  rest: string,
  lines: readonly string[],
  index: number,
): { value: string; next: number } {
  const body = rest.trimStart()
  const first = body.charAt(0)

  if (first === '"' || first === "'") {
    const { raw, next } = readQuoted(body.slice(1), first, lines, index)
    return { value: first === '"' ? decodeEscapes(raw) : raw, next }
  }

  return { value: stripInlineComment(rest), next: index + 1 }
}

/**
 * Collects quoted content up to the closing quote, continuing onto following
 * lines when needed. Text after the closing quote is ignored.
 */
function readQuoted(
  opening: string,
  quote: Quote,
  lines: readonly string[],
  index: number,
): { raw: string; next: number } {
  const parts: string[] = []
  let chunk = opening
  let current = index

  for (;;) {
    const end = findClosingQuote(chunk, quote)
    if (end !== -1) {
      parts.push(chunk.slice(0, end))
      return { raw: parts.join("\n"), next: current + 1 }
    }

    parts.push(chunk)
    current++

    const following = lines[current]
    if (following === undefined) throw ParseError.unterminatedQuote(index + 1)
    chunk = following
  }
}

function findClosingQuote(chunk: string, quote: Quote): number {
  if (quote === "'") return chunk.indexOf("'")

  for (let i = 0; i < chunk.length; i++) {
    const ch = chunk.charAt(i)

    if (ch === "\\") i++
    else if (ch === '"') return i
  }

  return -1
}

function decodeEscapes(raw: string): string {
  let out = ""

  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i)

    if (ch !== "\\" || i === raw.length - 1) {
      out += ch
      continue
    }

    const next = raw.charAt(i + 1)
    out += ESCAPES[next] ?? `\\${next}`
    i++
  }

  return out
}

function stripInlineComment(value: string): string {
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i)

    if (ch === "\\") i++
    else if (ch === "#") return value.slice(0, i).trimEnd()
  }

  return value
}
