import type { JsonType } from "./value/types"

/**
 * Category of a parse failure.
 * - `structural`: brackets, separators, trailing content, nesting depth
 * - `lexical`: literals, numbers, string bodies and escapes
 * - `unicode`: `\u` escapes, surrogate pairing and UTF-8 decoding
 */
export type JsonErrorKind = "structural" | "lexical" | "unicode"

/**
 * Where and why parsing stopped. `position` is a byte offset into the UTF-8 input.
 */
export interface JsonError {
  position: number
  message: string
  kind: JsonErrorKind
}

/**
 * Thrown by `parseOrThrow` when the input is not exactly one JSON value.
 */
export class JsonParseError extends Error {
  override name = "JsonParseError" as const

  /** The failure record, as returned by `parse` */
  public readonly error: JsonError

  constructor(error: JsonError) {
    super(`JSON parse error at position ${error.position}: ${error.message}`)
    this.error = error

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, JsonParseError)
    }
  }

  get position(): number {
    return this.error.position
  }

  get kind(): JsonErrorKind {
    return this.error.kind
  }
}

/**
 * Thrown when a typed accessor or mutator is used on a value of another kind.
 * This is a programming error, not a data error.
 */
export class JsonTypeError extends Error {
  override name = "JsonTypeError" as const

  public readonly expected: JsonType
  public readonly actual: JsonType | undefined

  constructor(message: string, expected: JsonType, actual?: JsonType) {
    super(message)
    this.expected = expected
    this.actual = actual

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, JsonTypeError)
    }
  }
}

/**
 * One problem found while validating options
 */
export interface JsonOptionsIssue {
  path: string
  message: string
}

/**
 * Thrown when parse or stringify options fail validation.
 */
export class JsonOptionsError extends Error {
  override name = "JsonOptionsError" as const

  public readonly issues: readonly JsonOptionsIssue[]

  constructor(issues: readonly JsonOptionsIssue[]) {
    super(`Invalid options: ${issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`).join("; ")}`)
    this.issues = issues

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, JsonOptionsError)
    }
  }
}
