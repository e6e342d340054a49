export { fromNative, toNative, type NativeJson } from "./native"
