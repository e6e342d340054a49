import { JsonTypeError } from "../errors"
import type { StringifyOptions } from "../options"
import { stringify } from "../serializer/stringify"
import { formatDouble } from "./format-double"
import { JsonNumber } from "./json-number"
import type { JsonArray, JsonMember, JsonObject, JsonType } from "./types"

type JsonData =
  | { type: "null" }
  | { type: "bool"; value: boolean }
  | { type: "number"; value: JsonNumber }
  | { type: "string"; value: string }
  | { type: "array"; value: JsonArray }
  | { type: "object"; value: JsonObject }

/**
 * A node of a JSON document.
 *
 * The active kind decides which accessor works: `asString()` on a number throws a
 * `JsonTypeError` instead of converting. Arrays and objects own their children:
 * values handed to `array`, `object`, `pushBack` and `set` are copied in, so no
 * subtree is shared and no cycle can form. Objects keep members in insertion order
 * with duplicate keys allowed (lookups return the first match).
 *
 * @example
 * ```ts
 * const doc = JsonValue.object([["name", new JsonValue("demo")]])
 * doc.at("tags").assign(JsonValue.array())
 * doc.at("tags").pushBack(new JsonValue(1.5))
 *
 * doc.toString() // {"name":"demo","tags":[1.5]}
 * ```
 */
export class JsonValue {
  #data: JsonData

  /**
   * Wraps a scalar. A JS number is formatted with 15 significant digits; use
   * `JsonValue.number` to keep exact text.
   */
  constructor(value: null | boolean | number | string | JsonNumber = null) {
    this.#data = JsonValue.#dataOf(value)
  }

  static #dataOf(value: null | boolean | number | string | JsonNumber): JsonData {
    if (value === null) return { type: "null" }
    if (typeof value === "boolean") return { type: "bool", value }
    if (typeof value === "string") return { type: "string", value }
    if (typeof value === "number") return { type: "number", value: new JsonNumber(formatDouble(value)) }
    return { type: "number", value }
  }

  static #from(data: JsonData): JsonValue {
    const node = new JsonValue()
    node.#data = data
    return node
  }

  /**
   * Builds an array node holding copies of `values`
   */
  static array(values: Iterable<JsonValue> = []): JsonValue {
    return JsonValue.#from({ type: "array", value: Array.from(values, (value) => value.clone()) })
  }

  /**
   * Builds an object node from `[key, value]` pairs, keeping their order and any
   * duplicate keys. The values are copied.
   */
  static object(members: Iterable<JsonMember> = []): JsonValue {
    return JsonValue.#from({
      type: "object",
      value: Array.from(members, ([key, value]): JsonMember => [key, value.clone()]),
    })
  }

  /**
   * Builds a number node from literal text. The text is not checked; it is written
   * out exactly as given.
   */
  static number(repr: string): JsonValue {
    return JsonValue.#from({ type: "number", value: new JsonNumber(repr) })
  }

  type(): JsonType {
    return this.#data.type
  }

  isNull(): boolean {
    return this.#data.type === "null"
  }

  isBool(): boolean {
    return this.#data.type === "bool"
  }

  isNumber(): boolean {
    return this.#data.type === "number"
  }

  isString(): boolean {
    return this.#data.type === "string"
  }

  isArray(): boolean {
    return this.#data.type === "array"
  }

  isObject(): boolean {
    return this.#data.type === "object"
  }

  /**
   * The boolean payload, or `fallback` for any other kind
   */
  asBool(fallback: boolean = false): boolean {
    const data = this.#data
    return data.type === "bool" ? data.value : fallback
  }

  asNumber(): JsonNumber {
    const data = this.#data
    if (data.type !== "number") throw new JsonTypeError("Not a number", "number", data.type)
    return data.value
  }

  asString(): string {
    const data = this.#data
    if (data.type !== "string") throw new JsonTypeError("Not a string", "string", data.type)
    return data.value
  }

  /**
   * The live element list; changes to it change this node
   */
  asArray(): JsonArray {
    const data = this.#data
    if (data.type !== "array") throw new JsonTypeError("Not an array", "array", data.type)
    return data.value
  }

  /**
   * The live member list; changes to it change this node
   */
  asObject(): JsonObject {
    const data = this.#data
    if (data.type !== "object") throw new JsonTypeError("Not an object", "object", data.type)
    return data.value
  }

  /**
   * Appends a copy of `value` to an array and returns the stored copy
   */
  pushBack(value: JsonValue): JsonValue {
    const elements = this.asArray()
    const element = value.clone()
    elements.push(element)
    return element
  }

  /**
   * The value stored under `key`, inserting a `null` member at the end when the key
   * is missing. Throws on anything but an object.
   */
  at(key: string): JsonValue {
    const members = this.asObject()
    const member = members.find(([name]) => name === key)
    if (member) return member[1]

    const value = new JsonValue()
    members.push([key, value])
    return value
  }

  /**
   * Stores a copy of `value` under `key`, replacing the first member with that key or
   * appending a new one. Returns the stored copy.
   */
  set(key: string, value: JsonValue): JsonValue {
    const members = this.asObject()
    const index = members.findIndex(([name]) => name === key)
    const stored = value.clone()

    if (index === -1) {
      members.push([key, stored])
    } else {
      members[index] = [key, stored]
    }

    return stored
  }

  /**
   * The first value stored under `key`, or `undefined` when there is none or this
   * is not an object
   */
  find(key: string): JsonValue | undefined {
    const data = this.#data
    if (data.type !== "object") return undefined
    return data.value.find(([name]) => name === key)?.[1]
  }

  /**
   * Turns this node into a deep copy of `other`, whatever kind either had before
   */
  assign(other: JsonValue): this {
    this.#data = other.clone().#data
    return this
  }

  clone(): JsonValue {
    const data = this.#data
    switch (data.type) {
      case "array":
        return JsonValue.#from({ type: "array", value: data.value.map((element) => element.clone()) })
      case "object":
        return JsonValue.#from({
          type: "object",
          value: data.value.map(([key, value]): JsonMember => [key, value.clone()]),
        })
      case "number":
        return JsonValue.number(data.value.repr)
      default:
        return JsonValue.#from({ ...data })
    }
  }

  /**
   * Structural equality. Numbers compare by their text, objects member by member in order.
   */
  equals(other: JsonValue): boolean {
    const a = this.#data
    const b = other.#data

    switch (a.type) {
      case "null":
        return b.type === "null"
      case "bool":
        return b.type === "bool" && a.value === b.value
      case "number":
        return b.type === "number" && a.value.repr === b.value.repr
      case "string":
        return b.type === "string" && a.value === b.value
      case "array":
        return (
          b.type === "array" &&
          a.value.length === b.value.length &&
          a.value.every((element, i) => {
            const counterpart = b.value[i]
            return counterpart !== undefined && element.equals(counterpart)
          })
        )
      case "object":
        return (
          b.type === "object" &&
          a.value.length === b.value.length &&
          a.value.every(([key, value], i) => {
            const counterpart = b.value[i]
            return counterpart !== undefined && counterpart[0] === key && value.equals(counterpart[1])
          })
        )
    }
  }

  stringify(options?: StringifyOptions): string {
    return stringify(this, options)
  }

  toString(): string {
    return stringify(this)
  }
}
