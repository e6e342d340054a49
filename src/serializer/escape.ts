import { isHighSurrogate, isLowSurrogate } from "../parser/unicode"

const HEX_DIGITS = "0123456789ABCDEF"

/**
 * Escapes a string body for output between double quotes.
 *
 * Quote, backslash and the named control characters always get their short escapes,
 * the remaining code units below 0x20 become `\u00XX`, and `/` is escaped only when
 * `escapeSolidus` is set. A surrogate that is not half of a pair becomes `\uXXXX`.
 * Everything else, non-ASCII included, is copied as is.
 */
export function escapeString(input: string, escapeSolidus: boolean): string {
  let out = ""
  let runStart = 0

  for (let i = 0; i < input.length; i++) {
    const code = input.charCodeAt(i)

    if (isHighSurrogate(code) && isLowSurrogate(input.charCodeAt(i + 1))) {
      i++
      continue
    }

    const escaped = escapeCodeUnit(code, escapeSolidus)
    if (escaped === undefined) continue

    out += input.slice(runStart, i) + escaped
    runStart = i + 1
  }

  return runStart === 0 ? input : out + input.slice(runStart)
}

function escapeCodeUnit(code: number, escapeSolidus: boolean): string | undefined {
  switch (code) {
    case 0x22:
      return '\\"'
    case 0x5c:
      return "\\\\"
    case 0x08:
      return "\\b"
    case 0x0c:
      return "\\f"
    case 0x0a:
      return "\\n"
    case 0x0d:
      return "\\r"
    case 0x09:
      return "\\t"
    case 0x2f:
      return escapeSolidus ? "\\/" : undefined
    default:
      if (code < 0x20) {
        return `\\u00${HEX_DIGITS[code >> 4]}${HEX_DIGITS[code & 0xf]}`
      }
      if (isHighSurrogate(code) || isLowSurrogate(code)) {
        return `\\u${code.toString(16).toUpperCase()}`
      }
      return undefined
  }
}
