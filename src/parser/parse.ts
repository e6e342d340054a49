import { JsonParseError } from "../errors"
import { resolveParseOptions, type ParseOptions } from "../options"
import { JsonParser } from "./json-parser"
import type { JsonInput, ParseResult } from "./types"
import type { JsonValue } from "../value/json-value"

/**
 * Parses text that must hold exactly one JSON value. Malformed input is reported in
 * the result, never thrown.
 *
 * @example
 * ```ts
 * const result = parse('{"bad":}')
 * if (!result.success) {
 *   result.error // { position: 7, message: "Unexpected character while parsing value", kind: "structural" }
 * }
 * ```
 */
export function parse(text: JsonInput, options?: ParseOptions): ParseResult {
  const parser = new JsonParser(text, resolveParseOptions(options))

  try {
    return { success: true, value: parser.parse() }
  } catch (error) {
    if (error instanceof JsonParseError) return { success: false, error: error.error }
    throw error
  }
}

/**
 * Like `parse`, but throws a `JsonParseError` ("JSON parse error at position N: ...")
 */
export function parseOrThrow(text: JsonInput, options?: ParseOptions): JsonValue {
  return new JsonParser(text, resolveParseOptions(options)).parse()
}

/**
 * Whether `text` is exactly one JSON value
 */
export function validate(text: JsonInput, options?: ParseOptions): boolean {
  return parse(text, options).success
}
