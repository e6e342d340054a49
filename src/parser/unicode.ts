export const HIGH_SURROGATE_MIN = 0xd800
export const HIGH_SURROGATE_MAX = 0xdbff
export const LOW_SURROGATE_MIN = 0xdc00
export const LOW_SURROGATE_MAX = 0xdfff
export const MAX_CODE_POINT = 0x10ffff

/**
 * Value of an ASCII hex digit byte, or -1
 */
export function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10
  return -1
}

export const isHighSurrogate = (unit: number): boolean => unit >= HIGH_SURROGATE_MIN && unit <= HIGH_SURROGATE_MAX

export const isLowSurrogate = (unit: number): boolean => unit >= LOW_SURROGATE_MIN && unit <= LOW_SURROGATE_MAX

export const combineSurrogates = (high: number, low: number): number =>
  0x10000 + ((high - HIGH_SURROGATE_MIN) << 10) + (low - LOW_SURROGATE_MIN)

/**
 * Number of bytes the UTF-8 encoding of a code point takes, or 0 past U+10FFFF
 */
export function utf8Length(codePoint: number): number {
  if (codePoint < 0) return 0
  if (codePoint <= 0x7f) return 1
  if (codePoint <= 0x7ff) return 2
  if (codePoint <= 0xffff) return 3
  if (codePoint <= MAX_CODE_POINT) return 4
  return 0
}
