import { JsonTypeError } from "../errors"
import { JsonValue } from "../value/json-value"
import type { JsonMember } from "../value/types"

/**
 * Plain JS data that maps onto JSON
 */
export type NativeJson = null | boolean | number | string | NativeJson[] | { [key: string]: NativeJson }

const isPlainObject = (data: object): data is Record<string, unknown> => {
  const proto: unknown = Object.getPrototypeOf(data)
  return proto === Object.prototype || proto === null
}

/**
 * Builds a value tree from plain JS data.
 * Numbers keep their shortest round-trip text and bigints their exact decimal text.
 */
export function fromNative(data: unknown): JsonValue {
  if (data === null || typeof data === "boolean" || typeof data === "string") {
    return new JsonValue(data)
  }

  if (typeof data === "number") {
    if (!Number.isFinite(data)) {
      throw new JsonTypeError(`Cannot represent ${data} as a JSON number`, "number")
    }
    return JsonValue.number(Object.is(data, -0) ? "-0" : String(data))
  }

  if (typeof data === "bigint") {
    return JsonValue.number(data.toString())
  }

  if (Array.isArray(data)) {
    const node = JsonValue.array()
    node.asArray().push(...data.map((element: unknown) => fromNative(element)))
    return node
  }

  if (typeof data === "object" && isPlainObject(data)) {
    const node = JsonValue.object()
    node.asObject().push(...Object.entries(data).map(([key, value]): JsonMember => [key, fromNative(value)]))
    return node
  }

  throw new JsonTypeError(`Cannot convert ${typeof data} to JSON`, "object")
}

/**
 * Converts a value tree back to plain JS data. Numbers go through `toDouble`;
 * for duplicate keys the first member wins, as with `find`.
 */
export function toNative(value: JsonValue): NativeJson {
  switch (value.type()) {
    case "null":
      return null
    case "bool":
      return value.asBool()
    case "number":
      return value.asNumber().toDouble()
    case "string":
      return value.asString()
    case "array":
      return value.asArray().map(toNative)
    case "object": {
      const result: { [key: string]: NativeJson } = {}
      for (const [key, member] of value.asObject()) {
        if (Object.hasOwn(result, key)) continue
        // a "__proto__" key must stay an own property
        Object.defineProperty(result, key, { value: toNative(member), enumerable: true, writable: true, configurable: true })
      }
      return result
    }
  }
}
