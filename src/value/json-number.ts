const FLOAT_LITERAL = /^[\t\n\v\f\r ]*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/
const INTEGER_LITERAL = /^-?\d+$/

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

/**
 * A JSON number kept as the literal text it was written with.
 *
 * Nothing is evaluated until a conversion is asked for, so `1.50`, `1.5e10` and
 * integers beyond 2^53 come back out exactly as they went in.
 */
export class JsonNumber {
  readonly repr: string

  constructor(repr: string) {
    this.repr = repr
  }

  /**
   * The value as a double, or `fallback` when the text is not a decimal float literal
   * or does not fit in a finite double.
   */
  toDouble(fallback: number = 0): number {
    if (!FLOAT_LITERAL.test(this.repr)) return fallback

    const value = Number(this.repr)
    return Number.isFinite(value) ? value : fallback
  }

  /**
   * The value as a signed 64-bit integer, or `fallback` when the text is not a base-10
   * integer or lies outside the int64 range.
   */
  toInt64(fallback: bigint = 0n): bigint {
    if (!INTEGER_LITERAL.test(this.repr)) return fallback

    const value = BigInt(this.repr)
    if (value < INT64_MIN || value > INT64_MAX) return fallback

    return value
  }

  /**
   * Whether the whole text is a base-10 integer (optional `-`, digits only).
   * The range is not checked; see `toInt64`.
   */
  isIntegral(): boolean {
    return INTEGER_LITERAL.test(this.repr)
  }

  toString(): string {
    return this.repr
  }
}
