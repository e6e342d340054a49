import type { JsonValue } from "./json-value"

/**
 * The six kinds a JSON value can hold
 */
export type JsonType = "null" | "bool" | "number" | "string" | "array" | "object"

/**
 * One `"key": value` pair of an object. Objects are ordered lists of members so that
 * insertion order and duplicate keys survive a round trip.
 */
export type JsonMember = [key: string, value: JsonValue]

export type JsonArray = JsonValue[]
export type JsonObject = JsonMember[]
