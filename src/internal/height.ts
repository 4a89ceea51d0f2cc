/**
 * Recovering `(numer, denom)` from a residue.
 *
 * Candidates are walked in order of height `|numer| + denom`: height-major,
 * denominator-minor, positive numerator before negative. The first match is
 * the decoding. The walk stops at the largest height for which no two
 * reduced rationals share a residue, found once per modulus by the same walk.
 *
 * @internal
 */

import { Either } from "effect"
import { DecodeExhaustedError } from "../Errors.js"
import { gcd, smallInverses, type Fraction } from "./modular.js"

const maxHeights = new Map<number, number>()

const searchMaxHeight = (modulus: number): number => {
  const inverses = smallInverses(modulus, modulus - 1)
  const taken = new Array<boolean>(modulus).fill(false)

  for (let height = 2; height < modulus; height++) {
    for (let denom = 1; denom < height; denom++) {
      const numer = height - denom
      if (gcd(numer, denom) !== 1) {
        continue
      }
      const inverse = inverses[denom] ?? 0
      const positive = (numer * inverse) % modulus
      const negative = ((modulus - numer) * inverse) % modulus
      if (taken[positive] || taken[negative]) {
        return height - 1
      }
      taken[positive] = true
      taken[negative] = true
    }
  }
  return modulus - 1
}

export const findMaxHeight = (modulus: number): number => {
  const cached = maxHeights.get(modulus)
  if (cached !== undefined) {
    return cached
  }
  const height = searchMaxHeight(modulus)
  maxHeights.set(modulus, height)
  return height
}

export const getNumerAndDenom = (
  modulus: number,
  maxHeight: number,
  residue: number,
): Either.Either<Fraction, DecodeExhaustedError> => {
  if (residue === 0) {
    return Either.right([0, 1])
  }
  const inverses = smallInverses(modulus, Math.min(maxHeight, modulus - 1))
  for (let height = 2; height <= maxHeight; height++) {
    for (let denom = 1; denom < height; denom++) {
      const numer = height - denom
      if (gcd(numer, denom) !== 1) {
        continue
      }
      const inverse = inverses[denom] ?? 0
      if ((numer * inverse) % modulus === residue) {
        return Either.right([numer, denom])
      }
      if (((modulus - numer) * inverse) % modulus === residue) {
        return Either.right([-numer, denom])
      }
    }
  }
  return Either.left(new DecodeExhaustedError({ residue, modulus, maxHeight }))
}
