import * as z from "zod"
import { JsonOptionsError } from "./errors"

export const DEFAULT_MAX_DEPTH = 512

export const ParseOptionsSchema = z.object({
  /** Deepest array/object nesting accepted before parsing fails */
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
})

export const StringifyOptionsSchema = z.object({
  /** Insert newlines and indentation */
  pretty: z.boolean().default(false),
  /** Spaces per nesting level when `pretty` is set */
  indent: z.number().int().min(0).default(2),
  /** Write `/` as `\/` inside strings */
  escapeSolidus: z.boolean().default(false),
})

export type ParseOptions = z.input<typeof ParseOptionsSchema>
export type ResolvedParseOptions = z.output<typeof ParseOptionsSchema>

export type StringifyOptions = z.input<typeof StringifyOptionsSchema>
export type ResolvedStringifyOptions = z.output<typeof StringifyOptionsSchema>

const warnUnknownKeys = (shape: object, options: object, label: string): void => {
  for (const key of Object.keys(options)) {
    if (!(key in shape)) {
      console.warn(`[json] Ignoring unknown ${label} option`, key)
    }
  }
}

const toOptionsError = (error: z.ZodError): JsonOptionsError =>
  new JsonOptionsError(
    error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    })),
  )

/**
 * Apply defaults to parse options and validate them
 */
export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  warnUnknownKeys(ParseOptionsSchema.shape, options, "parse")

  const result = ParseOptionsSchema.safeParse(options)
  if (!result.success) throw toOptionsError(result.error)

  return result.data
}

/**
 * Apply defaults to stringify options and validate them
 */
export function resolveStringifyOptions(options: StringifyOptions = {}): ResolvedStringifyOptions {
  warnUnknownKeys(StringifyOptionsSchema.shape, options, "stringify")

  const result = StringifyOptionsSchema.safeParse(options)
  if (!result.success) throw toOptionsError(result.error)

  return result.data
}
