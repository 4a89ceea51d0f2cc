/**
 * Unit selector vectors: one small selector per dimension, meaningful only
 * where the matching exponent field is non-zero.
 *
 * @internal
 */

import { Either } from "effect"
import type { EncodingLayout } from "../Config.js"
import { UnificationFailureError, UnitMismatchError } from "../Errors.js"
import { clearAndSet, getField, mapFields, putField } from "./bits.js"

export const dimExp = (layout: EncodingLayout, dim: number): bigint => putField(layout, 1, dim)

export const setUnit = (layout: EncodingLayout, units: bigint, dim: number, unit: number): bigint =>
  clearAndSet(layout, units, dim, unit)

export const mkUnit = (layout: EncodingLayout, dim: number, unit: number): bigint =>
  setUnit(layout, 0n, dim, unit)

/**
 * Units of a product or quotient of `(e, u)` and `(f, v)`. A dimension absent
 * from one side takes the other side's unit; present on both, the units must
 * agree.
 */
export const unifyUnits = (
  layout: EncodingLayout,
  e: bigint,
  f: bigint,
  u: bigint,
  v: bigint,
): Either.Either<bigint, UnificationFailureError> => {
  let result = 0n
  for (let dim = 0; dim < layout.maxDims; dim++) {
    const left = getField(layout, e, dim)
    const right = getField(layout, f, dim)
    const leftUnit = getField(layout, u, dim)
    const rightUnit = getField(layout, v, dim)

    let unified: number
    if (left === 0) {
      unified = right === 0 ? 0 : rightUnit
    } else if (right === 0) {
      unified = leftUnit
    } else if (leftUnit === rightUnit) {
      unified = leftUnit
    } else {
      return Either.left(new UnificationFailureError({ dimension: dim, left: leftUnit, right: rightUnit }))
    }
    result |= putField(layout, unified, dim)
  }
  return Either.right(result)
}

const firstUnitClash = (layout: EncodingLayout, e: bigint, u: bigint, v: bigint): number => {
  for (let dim = 0; dim < layout.maxDims; dim++) {
    if (getField(layout, e, dim) !== 0 && getField(layout, u, dim) !== getField(layout, v, dim)) {
      return dim
    }
  }
  return -1
}

export const unitsOK = (layout: EncodingLayout, e: bigint, u: bigint, v: bigint): boolean =>
  firstUnitClash(layout, e, u, v) < 0

export const checkUnits = (
  layout: EncodingLayout,
  e: bigint,
  u: bigint,
  v: bigint,
): Either.Either<void, UnitMismatchError> => {
  const dim = firstUnitClash(layout, e, u, v)
  return dim < 0
    ? Either.right(undefined)
    : Either.left(
        new UnitMismatchError({
          dimension: dim,
          left: getField(layout, u, dim),
          right: getField(layout, v, dim),
        }),
      )
}

/** Zeroes the selectors of every dimension whose exponent is zero. */
export const cleanUpUnits = (layout: EncodingLayout, e: bigint, u: bigint): bigint =>
  mapFields(layout, (dim) => (getField(layout, e, dim) !== 0 ? getField(layout, u, dim) : 0))
