export { parse, parseOrThrow, validate } from "./parse"
export { JsonParser } from "./json-parser"

export type { JsonInput, ParseResult } from "./types"
