export { stringify } from "./stringify"
export { escapeString } from "./escape"
