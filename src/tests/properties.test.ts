import { describe, it, expect } from "vitest"
import { JsonValue, parse, parseOrThrow, stringify, validate } from "@/index"

const documents = [
  "null",
  "true",
  "0",
  "-0.0",
  "1.5e10",
  "123456789012345678901234567890",
  '""',
  '"tab\\tquote\\"slash/ctrl\\u0001"',
  '"é ♥ 𝄞"',
  '"\\uDC00"',
  '"lone \\uDFFF low"',
  "[]",
  "{}",
  '[1,"two",[3,[4]],{"five":5}]',
  '{"a":{"b":{"c":[true,false,null]}},"a":"duplicate","":0}',
  '{"price":1.50,"qty":3,"ratio":2E-3}',
]

const built = () =>
  JsonValue.object([
    ["name", new JsonValue("widget/1")],
    ["sizes", JsonValue.array([new JsonValue(0.5), new JsonValue(12), JsonValue.number("1e3")])],
    ["meta", JsonValue.object([["ok", new JsonValue(true)], ["none", new JsonValue()]])],
    ["empty", JsonValue.array()],
  ])

describe("round trips", () => {
  it("should rebuild an equal tree from compact and pretty output", () => {
    const trees = [...documents.map((text) => parseOrThrow(text)), built()]

    for (const tree of trees) {
      for (const options of [{}, { pretty: true }, { pretty: true, indent: 3, escapeSolidus: true }]) {
        const reparsed = parseOrThrow(stringify(tree, options))
        expect(reparsed.equals(tree)).toBe(true)
      }
    }
  })

  it("should reproduce compact documents byte for byte", () => {
    for (const text of documents) {
      expect(stringify(parseOrThrow(text))).toBe(text)
    }
  })

  it("should be idempotent in compact mode", () => {
    const once = stringify(built())
    const twice = stringify(parseOrThrow(once))

    expect(twice).toBe(once)
    expect(once).toBe('{"name":"widget/1","sizes":[0.5,12,1e3],"meta":{"ok":true,"none":null},"empty":[]}')
  })

  it("should reformat pretty input to compact and back", () => {
    const pretty = stringify(built(), { pretty: true })
    expect(stringify(parseOrThrow(pretty), { pretty: true })).toBe(pretty)
  })
})

describe("validate", () => {
  it("should agree with parse", () => {
    const inputs = [...documents, "", " ", "[1,]", '{"a"}', "nul", '"\\uD800"', "1 2", "[[[]]]", "-", '{"a":1} extra']

    for (const text of inputs) {
      expect(validate(text)).toBe(parse(text).success)
    }
  })
})
