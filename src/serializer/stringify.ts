import { resolveStringifyOptions, type ResolvedStringifyOptions, type StringifyOptions } from "../options"
import { escapeString } from "./escape"
import type { JsonValue } from "../value/json-value"

/**
 * Writes a value tree as JSON text.
 *
 * Numbers are written with the exact text they hold. With `pretty`, every element of
 * a non-empty container goes on its own line, indented `indent` spaces per level, and
 * object keys are followed by `": "`. Empty containers are always `[]` and `{}`.
 *
 * @example
 * ```ts
 * const doc = JsonValue.object([["a", JsonValue.number("1")]])
 *
 * stringify(doc) // {"a":1}
 * stringify(doc, { pretty: true }) // {\n  "a": 1\n}
 * ```
 */
export function stringify(value: JsonValue, options?: StringifyOptions): string {
  const resolved = resolveStringifyOptions(options)
  const out: string[] = []
  write(value, resolved, out, 0)
  return out.join("")
}

function write(node: JsonValue, options: ResolvedStringifyOptions, out: string[], depth: number): void {
  switch (node.type()) {
    case "null":
      out.push("null")
      return
    case "bool":
      out.push(node.asBool() ? "true" : "false")
      return
    case "number":
      out.push(node.asNumber().repr)
      return
    case "string":
      out.push('"', escapeString(node.asString(), options.escapeSolidus), '"')
      return
    case "array":
      writeContainer("[", "]", node.asArray(), options, out, depth, (element) => {
        write(element, options, out, depth + 1)
      })
      return
    case "object":
      writeContainer("{", "}", node.asObject(), options, out, depth, ([key, value]) => {
        out.push('"', escapeString(key, options.escapeSolidus), options.pretty ? '": ' : '":')
        write(value, options, out, depth + 1)
      })
      return
  }
}

function writeContainer<T>(
  open: string,
  close: string,
  items: readonly T[],
  options: ResolvedStringifyOptions,
  out: string[],
  depth: number,
  writeItem: (item: T) => void,
): void {
  out.push(open)

  if (items.length === 0) {
    out.push(close)
    return
  }

  const separator = options.pretty ? ",\n" : ","
  const innerIndent = options.pretty ? " ".repeat((depth + 1) * options.indent) : ""

  if (options.pretty) out.push("\n")

  items.forEach((item, i) => {
    if (i > 0) out.push(separator)
    out.push(innerIndent)
    writeItem(item)
  })

  if (options.pretty) out.push("\n", " ".repeat(depth * options.indent))

  out.push(close)
}
