/**
 * Fixed-width bit fields over a 64-bit word. Field `dim` occupies bits
 * `[dim * fieldBits, (dim + 1) * fieldBits)`.
 *
 * @internal
 */

import type { EncodingLayout } from "../Config.js"

const shiftOf = (layout: EncodingLayout, dim: number): bigint => BigInt(dim * layout.fieldBits)

export const isDimension = (layout: EncodingLayout, dim: number): boolean =>
  Number.isInteger(dim) && dim >= 0 && dim < layout.maxDims

export const getField = (layout: EncodingLayout, word: bigint, dim: number): number =>
  Number((word >> shiftOf(layout, dim)) & layout.fieldMask)

/**
 * Places the low field bits of `value` at `dim`; every other bit is zero, so
 * callers combine fields with `|`.
 */
export const putField = (layout: EncodingLayout, value: number | bigint, dim: number): bigint =>
  (BigInt(value) & layout.fieldMask) << shiftOf(layout, dim)

export const clearAndSet = (
  layout: EncodingLayout,
  word: bigint,
  dim: number,
  value: number | bigint,
): bigint => (word & ~(layout.fieldMask << shiftOf(layout, dim))) | putField(layout, value, dim)

export const mapFields = (layout: EncodingLayout, f: (dim: number) => number): bigint => {
  let result = 0n
  for (let dim = 0; dim < layout.maxDims; dim++) {
    result |= putField(layout, f(dim), dim)
  }
  return result
}

export const fields = (layout: EncodingLayout, word: bigint): ReadonlyArray<number> => {
  const result: Array<number> = []
  for (let dim = 0; dim < layout.maxDims; dim++) {
    result.push(getField(layout, word, dim))
  }
  return result
}
