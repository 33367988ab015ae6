export const PLACEHOLDER_OPEN = "${"
export const PLACEHOLDER_CLOSE = "}"

/**
 * Replaces every `${NAME}` in `value` with `replace(NAME)`.
 *
 * Scans left to right and continues after each replacement, so substituted
 * text is never scanned again. An unterminated `${` ends the scan and the
 * remainder is kept verbatim.
 */
export function substitutePlaceholders(value: string, replace: (name: string) => string): string {
  let out = ""
  let cursor = 0

  for (;;) {
    const start = value.indexOf(PLACEHOLDER_OPEN, cursor)
    if (start === -1) break

    const end = value.indexOf(PLACEHOLDER_CLOSE, start + PLACEHOLDER_OPEN.length)
    if (end === -1) break

    out += value.slice(cursor, start)
    out += replace(value.slice(start + PLACEHOLDER_OPEN.length, end))
    cursor = end + PLACEHOLDER_CLOSE.length
  }

  return out + value.slice(cursor)
}

export function placeholder(name: string): string {
  return `${PLACEHOLDER_OPEN}${name}${PLACEHOLDER_CLOSE}`
}
