/**
 * strict-json-tree
 *
 * A strict JSON library built around an ordered value tree: parse text, read and edit
 * the tree through typed accessors, and write it back out compact or pretty. Numbers
 * keep the exact text they were written with, so a document round-trips unchanged.
 *
 * @example
 * ```ts
 * import { JsonValue, parseOrThrow, stringify } from 'strict-json-tree'
 *
 * const doc = parseOrThrow('{"price": 1.50, "tags": []}')
 * doc.at("tags").pushBack(new JsonValue("sale"))
 *
 * stringify(doc) // {"price":1.50,"tags":["sale"]}
 * doc.find("price")?.asNumber().toDouble() // 1.5
 * ```
 */

// Value model
export * from "./value"

// Parser
export * from "./parser"

// Serializer
export * from "./serializer"

// Errors and options
export { JsonParseError, JsonTypeError, JsonOptionsError } from "./errors"
export type { JsonError, JsonErrorKind, JsonOptionsIssue } from "./errors"
export {
  DEFAULT_MAX_DEPTH,
  ParseOptionsSchema,
  StringifyOptionsSchema,
  type ParseOptions,
  type StringifyOptions,
  type ResolvedParseOptions,
  type ResolvedStringifyOptions,
} from "./options"

// Utilities
export { fromNative, toNative, type NativeJson } from "./utils"
