import { afterEach, describe, it, expect, vi } from "vitest"
import { JsonOptionsError, JsonValue, escapeString, parseOrThrow, stringify } from "@/index"

const num = (repr: string) => JsonValue.number(repr)

describe("stringify", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe("scalars", () => {
    it("should write literals", () => {
      expect(stringify(new JsonValue())).toBe("null")
      expect(stringify(new JsonValue(true))).toBe("true")
      expect(stringify(new JsonValue(false))).toBe("false")
    })

    it("should write number text verbatim", () => {
      expect(stringify(num("1.50"))).toBe("1.50")
      expect(stringify(num("-2E+3"))).toBe("-2E+3")
      expect(stringify(parseOrThrow("1.5e10"))).toBe("1.5e10")
    })

    it("should write doubles with 15 significant digits", () => {
      expect(stringify(new JsonValue(2.5))).toBe("2.5")
      expect(stringify(new JsonValue(1 / 3))).toBe("0.333333333333333")
    })
  })

  describe("strings", () => {
    it("should escape quote, backslash and named control characters", () => {
      expect(stringify(new JsonValue('a"b\\c\b\f\n\r\t'))).toBe('"a\\"b\\\\c\\b\\f\\n\\r\\t"')
    })

    it("should write other control characters as \\u00XX", () => {
      expect(stringify(new JsonValue("\u0001\u001f\u0000"))).toBe('"\\u0001\\u001F\\u0000"')
    })

    it("should leave non-ASCII text alone", () => {
      expect(stringify(new JsonValue("é ♥ 𝄞"))).toBe('"é ♥ 𝄞"')
      expect(stringify(new JsonValue("\u007f"))).toBe('"\u007f"')
    })

    it("should write unpaired surrogates as \\uXXXX", () => {
      expect(stringify(new JsonValue("\uDC00"))).toBe('"\\uDC00"')
      expect(stringify(new JsonValue("a\uD834b"))).toBe('"a\\uD834b"')
      expect(stringify(new JsonValue("\uDD1E\uD834"))).toBe('"\\uDD1E\\uD834"')
      expect(escapeString("x\uD800", false)).toBe("x\\uD800")
    })

    it("should keep surrogate pairs as they are", () => {
      expect(escapeString("\uD834\uDD1E", false)).toBe("\uD834\uDD1E")
      expect(stringify(new JsonValue("\uD800\uD834\uDD1E"))).toBe('"\\uD800𝄞"')
    })

    it("should write a lone high surrogate that the parser reports as unpaired", () => {
      expect(() => parseOrThrow(stringify(new JsonValue("\uD800")))).toThrow(
        "JSON parse error at position 7: Missing low surrogate for unicode escape",
      )
    })

    it("should escape the solidus only when asked", () => {
      const value = new JsonValue("a/b")

      expect(stringify(value, { escapeSolidus: false })).toBe('"a/b"')
      expect(stringify(value, { escapeSolidus: true })).toBe('"a\\/b"')
    })

    it("should escape object keys too", () => {
      const obj = JsonValue.object([['a/"b', new JsonValue()]])
      expect(stringify(obj, { escapeSolidus: true })).toBe('{"a\\/\\"b":null}')
    })

    it("should return the input when nothing needs escaping", () => {
      expect(escapeString("plain text", true)).toBe("plain text")
      expect(escapeString("", false)).toBe("")
      expect(escapeString("end\n", false)).toBe("end\\n")
    })
  })

  describe("containers", () => {
    const doc = () =>
      JsonValue.object([
        ["a", JsonValue.array([num("1"), JsonValue.object()])],
        ["b", JsonValue.array()],
      ])

    it("should write compact output without whitespace", () => {
      expect(stringify(JsonValue.object([["a", num("1")]]), { pretty: false })).toBe('{"a":1}')
      expect(stringify(doc())).toBe('{"a":[1,{}],"b":[]}')
    })

    it("should indent pretty output by two spaces by default", () => {
      const out = stringify(JsonValue.object([["a", num("1")]]), { pretty: true })

      expect(out).toBe('{\n  "a": 1\n}')
      expect(out).toContain('\n  "a"')
    })

    it("should honour the indent width", () => {
      expect(stringify(doc(), { pretty: true, indent: 4 })).toBe(
        '{\n    "a": [\n        1,\n        {}\n    ],\n    "b": []\n}',
      )
    })

    it("should still break lines with an indent of zero", () => {
      expect(stringify(JsonValue.array([num("1"), num("2")]), { pretty: true, indent: 0 })).toBe("[\n1,\n2\n]")
    })

    it("should write empty containers the same way in both modes", () => {
      expect(stringify(JsonValue.array(), { pretty: true })).toBe("[]")
      expect(stringify(JsonValue.object(), { pretty: true })).toBe("{}")
      expect(stringify(JsonValue.array([JsonValue.array()]), { pretty: true })).toBe("[\n  []\n]")
    })

    it("should keep duplicate keys and their order", () => {
      const obj = JsonValue.object([
        ["z", num("1")],
        ["a", num("2")],
        ["z", num("3")],
      ])
      expect(stringify(obj)).toBe('{"z":1,"a":2,"z":3}')
    })
  })

  describe("options", () => {
    it("should be available on the value", () => {
      const value = JsonValue.array([new JsonValue("x/y")])

      expect(value.stringify({ escapeSolidus: true })).toBe('["x\\/y"]')
      expect(value.toString()).toBe('["x/y"]')
    })

    it("should reject a negative indent", () => {
      let caught: unknown
      try {
        stringify(JsonValue.array(), { indent: -1 })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(JsonOptionsError)
      if (caught instanceof JsonOptionsError) {
        expect(caught.issues).toHaveLength(1)
        expect(caught.issues[0]?.path).toBe("indent")
      }
    })

    it("should warn about unknown option keys and ignore them", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
      const options = { pretty: false, escape_solidus: true }

      expect(stringify(new JsonValue("a/b"), options)).toBe('"a/b"')
      expect(warn).toHaveBeenCalledWith("[json] Ignoring unknown stringify option", "escape_solidus")
    })
  })
})
