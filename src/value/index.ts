export { JsonValue } from "./json-value"
export { JsonNumber } from "./json-number"
export { formatDouble } from "./format-double"

export type { JsonArray, JsonMember, JsonObject, JsonType } from "./types"
