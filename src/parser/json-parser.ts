import { JsonParseError, type JsonErrorKind } from "../errors"
import type { ResolvedParseOptions } from "../options"
import type { JsonInput } from "./types"
import { combineSurrogates, hexValue, isHighSurrogate, isLowSurrogate, utf8Length } from "./unicode"
import { JsonValue } from "../value/json-value"

const END = -1

const TAB = 0x09
const LF = 0x0a
const CR = 0x0d
const SPACE = 0x20
const QUOTE = 0x22
const PLUS = 0x2b
const COMMA = 0x2c
const MINUS = 0x2d
const DOT = 0x2e
const ZERO = 0x30
const NINE = 0x39
const COLON = 0x3a
const UPPER_E = 0x45
const OPEN_BRACKET = 0x5b
const BACKSLASH = 0x5c
const CLOSE_BRACKET = 0x5d
const LOWER_E = 0x65
const LOWER_F = 0x66
const LOWER_N = 0x6e
const LOWER_T = 0x74
const LOWER_U = 0x75
const OPEN_BRACE = 0x7b
const CLOSE_BRACE = 0x7d

const SIMPLE_ESCAPES: ReadonlyMap<number, string> = new Map([
  [QUOTE, '"'],
  [BACKSLASH, "\\"],
  [0x2f, "/"],
  [0x62, "\b"],
  [LOWER_F, "\f"],
  [LOWER_N, "\n"],
  [0x72, "\r"],
  [LOWER_T, "\t"],
])

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const isDigit = (byte: number): boolean => byte >= ZERO && byte <= NINE

const isWhitespace = (byte: number): boolean => byte === SPACE || byte === TAB || byte === LF || byte === CR

/**
 * Single-use recursive-descent reader over the UTF-8 bytes of one JSON text.
 *
 * Every failure throws a `JsonParseError` carrying the byte offset where it was
 * detected; nothing is retried or recovered.
 */
export class JsonParser {
  readonly #input: Uint8Array
  readonly #maxDepth: number
  #pos: number = 0
  #depth: number = 0

  constructor(input: JsonInput, options: ResolvedParseOptions) {
    this.#input = typeof input === "string" ? encoder.encode(input) : input
    this.#maxDepth = options.maxDepth
  }

  /**
   * Reads exactly one value; only whitespace may surround it
   */
  parse(): JsonValue {
    this.#skipWhitespace()
    const value = this.#parseValue()
    this.#skipWhitespace()

    if (this.#pos !== this.#input.length) {
      this.#fail("structural", "Trailing characters after JSON value")
    }

    return value
  }

  #fail(kind: JsonErrorKind, message: string, position: number = this.#pos): never {
    throw new JsonParseError({ position, message, kind })
  }

  #peek(): number {
    return this.#pos < this.#input.length ? (this.#input[this.#pos] ?? END) : END
  }

  #consume(expected: number): boolean {
    if (this.#peek() !== expected) return false
    this.#pos++
    return true
  }

  #skipWhitespace(): void {
    while (isWhitespace(this.#peek())) {
      this.#pos++
    }
  }

  #decode(start: number, end: number): string {
    try {
      return decoder.decode(this.#input.subarray(start, end))
    } catch (error) {
      if (error instanceof TypeError) this.#fail("unicode", "Invalid UTF-8 in string", start)
      throw error
    }
  }

  #parseValue(): JsonValue {
    const byte = this.#peek()

    switch (byte) {
      case LOWER_N:
        return this.#parseLiteral("null", new JsonValue(null))
      case LOWER_T:
        return this.#parseLiteral("true", new JsonValue(true))
      case LOWER_F:
        return this.#parseLiteral("false", new JsonValue(false))
      case QUOTE:
        return new JsonValue(this.#parseString())
      case OPEN_BRACE:
        return this.#parseObject()
      case OPEN_BRACKET:
        return this.#parseArray()
      case END:
        return this.#fail("structural", "Unexpected end of input")
      default:
        if (byte === MINUS || isDigit(byte)) return this.#parseNumber()
        return this.#fail("structural", "Unexpected character while parsing value")
    }
  }

  #parseLiteral(literal: string, value: JsonValue): JsonValue {
    for (let i = 0; i < literal.length; i++) {
      if (this.#input[this.#pos + i] !== literal.charCodeAt(i)) {
        this.#fail("lexical", "Invalid literal")
      }
    }

    this.#pos += literal.length
    return value
  }

  #readHex4(): number {
    if (this.#pos + 4 > this.#input.length) {
      this.#fail("unicode", "Incomplete unicode escape")
    }

    let unit = 0
    for (let i = 0; i < 4; i++) {
      const digit = hexValue(this.#input[this.#pos + i] ?? END)
      if (digit < 0) this.#fail("unicode", "Invalid hex in unicode escape")
      unit = (unit << 4) | digit
    }

    this.#pos += 4
    return unit
  }

  /**
   * Decodes the part of a `\uXXXX` escape after the `u`, pulling in the low half of
   * a surrogate pair when the first unit is a high surrogate
   */
  #parseUnicodeEscape(): string {
    const unit = this.#readHex4()

    if (!isHighSurrogate(unit)) {
      // a lone low surrogate is kept as the code unit it names
      return String.fromCharCode(unit)
    }

    if (this.#input[this.#pos] !== BACKSLASH || this.#input[this.#pos + 1] !== LOWER_U) {
      this.#fail("unicode", "Missing low surrogate for unicode escape")
    }
    this.#pos += 2

    const low = this.#readHex4()
    if (!isLowSurrogate(low)) {
      this.#fail("unicode", "Invalid low surrogate in unicode escape")
    }

    const codePoint = combineSurrogates(unit, low)
    if (utf8Length(codePoint) === 0) {
      this.#fail("unicode", "Invalid unicode codepoint")
    }

    return String.fromCodePoint(codePoint)
  }

  #parseString(): string {
    if (!this.#consume(QUOTE)) {
      this.#fail("structural", "Expected opening quote for string")
    }

    let out = ""
    let runStart = this.#pos

    while (this.#pos < this.#input.length) {
      const byte = this.#input[this.#pos++] ?? END

      if (byte === QUOTE) {
        return out + this.#decode(runStart, this.#pos - 1)
      }

      if (byte < SPACE) {
        this.#fail("lexical", "Control character in string")
      }

      if (byte !== BACKSLASH) continue

      out += this.#decode(runStart, this.#pos - 1)

      if (this.#pos >= this.#input.length) {
        this.#fail("lexical", "Unterminated escape sequence")
      }

      const escape = this.#input[this.#pos++] ?? END
      const simple = SIMPLE_ESCAPES.get(escape)

      if (simple !== undefined) {
        out += simple
      } else if (escape === LOWER_U) {
        out += this.#parseUnicodeEscape()
      } else {
        this.#fail("lexical", "Invalid escape sequence in string")
      }

      runStart = this.#pos
    }

    return this.#fail("lexical", "Unterminated string literal")
  }

  #skipDigits(): void {
    while (isDigit(this.#peek())) {
      this.#pos++
    }
  }

  #parseNumber(): JsonValue {
    const start = this.#pos
    this.#consume(MINUS)

    if (this.#peek() === ZERO) {
      this.#pos++
    } else if (isDigit(this.#peek())) {
      this.#skipDigits()
    } else {
      this.#fail("lexical", "Invalid number format")
    }

    if (this.#consume(DOT)) {
      if (!isDigit(this.#peek())) this.#fail("lexical", "Invalid fraction in number")
      this.#skipDigits()
    }

    if (this.#consume(LOWER_E) || this.#consume(UPPER_E)) {
      if (!this.#consume(PLUS)) this.#consume(MINUS)
      if (!isDigit(this.#peek())) this.#fail("lexical", "Invalid exponent in number")
      this.#skipDigits()
    }

    return JsonValue.number(this.#decode(start, this.#pos))
  }

  #enter(): void {
    if (this.#depth >= this.#maxDepth) {
      this.#fail("structural", "Maximum nesting depth exceeded")
    }
    this.#depth++
  }

  #parseArray(): JsonValue {
    this.#enter()
    this.#pos++

    const node = JsonValue.array()
    const elements = node.asArray()
    this.#skipWhitespace()

    if (!this.#consume(CLOSE_BRACKET)) {
      while (true) {
        this.#skipWhitespace()
        elements.push(this.#parseValue())
        this.#skipWhitespace()

        if (this.#consume(CLOSE_BRACKET)) break
        if (!this.#consume(COMMA)) this.#fail("structural", "Expected ',' between array elements")
      }
    }

    this.#depth--
    return node
  }

  #parseObject(): JsonValue {
    this.#enter()
    this.#pos++

    const node = JsonValue.object()
    const members = node.asObject()
    this.#skipWhitespace()

    if (!this.#consume(CLOSE_BRACE)) {
      while (true) {
        this.#skipWhitespace()
        const key = this.#parseString()

        this.#skipWhitespace()
        if (!this.#consume(COLON)) this.#fail("structural", "Expected ':' after object key")
        this.#skipWhitespace()

        members.push([key, this.#parseValue()])
        this.#skipWhitespace()

        if (this.#consume(CLOSE_BRACE)) break
        if (!this.#consume(COMMA)) this.#fail("structural", "Expected ',' between object members")
      }
    }

    this.#depth--
    return node
  }
}
