import type { JsonError } from "../errors"
import type { JsonValue } from "../value/json-value"

/**
 * Outcome of `parse`: the whole input was one JSON value, or it failed at `error.position`
 */
export type ParseResult = { success: true; value: JsonValue } | { success: false; error: JsonError }

/**
 * Text to parse. Strings are read as their UTF-8 encoding so error positions are byte offsets.
 */
export type JsonInput = string | Uint8Array
