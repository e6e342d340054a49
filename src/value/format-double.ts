const SIGNIFICANT_DIGITS = 15

const stripTrailingZeros = (digits: string): string => digits.replace(/0+$/, "")

const MANTISSA_BITS = 52n
const EXPONENT_BIAS = 1075n

/**
 * Splits a positive finite double into `mantissa * 2 ** exponent`, both exact
 */
function decompose(value: number): { mantissa: bigint; exponent: bigint } {
  const view = new DataView(new ArrayBuffer(8))
  view.setFloat64(0, value)
  const bits = view.getBigUint64(0)
  const fraction = bits & ((1n << MANTISSA_BITS) - 1n)
  const biased = (bits >> MANTISSA_BITS) & 0x7ffn

  if (biased === 0n) return { mantissa: fraction, exponent: 1n - EXPONENT_BIAS }
  return { mantissa: fraction | (1n << MANTISSA_BITS), exponent: biased - EXPONENT_BIAS }
}

/**
 * Whether `value` lies exactly halfway between `digits - 1` and `digits` units of
 * `10 ** scale`. `toExponential` rounds such ties up; printf rounds them to even.
 */
function isLowerTie(value: number, digits: bigint, scale: number): boolean {
  const { mantissa, exponent } = decompose(value)
  const power = BigInt(scale)

  // 2 * value == (2 * digits - 1) * 10 ** scale, with both sides scaled to integers
  const left = 2n * mantissa * 2n ** (exponent > 0n ? exponent : 0n) * 10n ** (power < 0n ? -power : 0n)
  const right = (2n * digits - 1n) * 2n ** (exponent < 0n ? -exponent : 0n) * 10n ** (power > 0n ? power : 0n)
  return left === right
}

/**
 * The 15 significant digits of a positive double and the decimal exponent of the
 * first one, rounded half to even
 */
function significantDigits(value: number): { digits: string; exponent: number } {
  const [mantissa = "", exponentText = "0"] = value.toExponential(SIGNIFICANT_DIGITS - 1).split("e")
  const exponent = Number(exponentText)
  const digits = mantissa.replace(".", "")
  const scaled = BigInt(digits)

  if (scaled % 2n === 1n && isLowerTie(value, scaled, exponent - SIGNIFICANT_DIGITS + 1)) {
    return { digits: String(scaled - 1n), exponent }
  }

  return { digits, exponent }
}

/**
 * Formats a finite double the way printf's `%.15g` does: 15 significant digits,
 * scientific notation only for exponents below -4 or from 15 up, trailing zeros dropped.
 * Exact halfway cases round to the even digit.
 */
export function formatDouble(value: number): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot represent ${value} as a JSON number`)
  }

  if (value === 0) return Object.is(value, -0) ? "-0" : "0"

  const sign = value < 0 ? "-" : ""
  const { digits, exponent } = significantDigits(Math.abs(value))

  if (exponent < -4 || exponent >= SIGNIFICANT_DIGITS) {
    const fraction = stripTrailingZeros(digits.slice(1))
    const magnitude = String(Math.abs(exponent)).padStart(2, "0")
    return `${sign}${digits[0]}${fraction ? `.${fraction}` : ""}e${exponent < 0 ? "-" : "+"}${magnitude}`
  }

  if (exponent >= 0) {
    const integer = digits.slice(0, exponent + 1)
    const fraction = stripTrailingZeros(digits.slice(exponent + 1))
    return `${sign}${integer}${fraction ? `.${fraction}` : ""}`
  }

  const fraction = stripTrailingZeros("0".repeat(-exponent - 1) + digits)
  return `${sign}0.${fraction}`
}
