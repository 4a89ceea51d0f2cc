/**
 * Rationals as residues modulo the layout's prime.
 *
 * Adding packed exponents models multiplying quantities, subtracting models
 * division, and scaling one exponent by an integer (or by the inverse of one)
 * models integer powers and roots. None of it materialises a rational.
 *
 * @internal
 */

import { Either } from "effect"
import type { EncodingLayout } from "../Config.js"
import { InvalidFractionError, UninvertibleModulusError } from "../Errors.js"
import { getField, mapFields } from "./bits.js"

export type Fraction = readonly [numer: number, denom: number]

/** Residue of any signed integer in `[0, modulus - 1]`. */
export const normalise = (modulus: number, x: number): number => ((x % modulus) + modulus) % modulus

export const gcd = (m: number, n: number): number => {
  let p = Math.abs(m)
  let q = Math.abs(n)
  while (p !== 0) {
    const r = q % p
    q = p
    p = r
  }
  return q
}

/** Lowest terms with a positive denominator. */
export const reduceFraction = (
  numer: number,
  denom: number,
): Either.Either<Fraction, InvalidFractionError> => {
  if (!Number.isInteger(numer) || !Number.isInteger(denom)) {
    return Either.left(new InvalidFractionError({ numer, denom, reason: "terms must be integers" }))
  }
  if (denom === 0) {
    return Either.left(new InvalidFractionError({ numer, denom, reason: "zero denominator" }))
  }
  if (numer === 0) {
    return Either.right([0, 1])
  }
  const divisor = gcd(numer, denom)
  const signed = denom > 0 ? numer : -numer
  return Either.right([signed / divisor, Math.abs(denom) / divisor])
}

// Extended Euclid; `n` must not be a multiple of `modulus`.
const unitInverse = (modulus: number, n: number): number => {
  let x = normalise(modulus, n)
  let y = modulus
  let a = 1
  let c = 0
  while (x !== 0) {
    const q = Math.floor(y / x)
    const r = y % x
    y = x
    x = r
    const next = c - q * a
    c = a
    a = next
  }
  return normalise(modulus, c)
}

export const inverseModP = (
  modulus: number,
  n: number,
): Either.Either<number, UninvertibleModulusError> =>
  normalise(modulus, n) === 0
    ? Either.left(new UninvertibleModulusError({ value: n, modulus }))
    : Either.right(unitInverse(modulus, n))

/**
 * Inverses of `1 .. limit`, for searches that only ever divide by small
 * positive integers below the modulus.
 */
export const smallInverses = (modulus: number, limit: number): ReadonlyArray<number> => {
  const table: Array<number> = [0]
  for (let n = 1; n <= limit; n++) {
    table.push(unitInverse(modulus, n))
  }
  return table
}

export const encodeRational = (
  modulus: number,
  numer: number,
  denom: number,
): Either.Either<number, InvalidFractionError | UninvertibleModulusError> => {
  if (!Number.isInteger(numer) || !Number.isInteger(denom)) {
    return Either.left(new InvalidFractionError({ numer, denom, reason: "terms must be integers" }))
  }
  if (denom === 0) {
    return Either.left(new InvalidFractionError({ numer, denom, reason: "zero denominator" }))
  }
  return Either.map(inverseModP(modulus, denom), (inverse) =>
    (normalise(modulus, numer) * inverse) % modulus
  )
}

export const addExp = (layout: EncodingLayout, e: bigint, f: bigint): bigint => {
  if (e === 0n) {
    return f
  }
  if (f === 0n) {
    return e
  }
  const p = layout.modulus
  return mapFields(layout, (dim) => (getField(layout, e, dim) + getField(layout, f, dim)) % p)
}

export const subExp = (layout: EncodingLayout, e: bigint, f: bigint): bigint => {
  if (f === 0n) {
    return e
  }
  const p = layout.modulus
  return mapFields(layout, (dim) => (p + getField(layout, e, dim) - getField(layout, f, dim)) % p)
}

export const multExp = (layout: EncodingLayout, e: bigint, m: number): bigint => {
  if (m === 1) {
    return e
  }
  const p = layout.modulus
  const factor = normalise(p, m)
  return mapFields(layout, (dim) => (getField(layout, e, dim) * factor) % p)
}

export const divExp = (
  layout: EncodingLayout,
  e: bigint,
  n: number,
): Either.Either<bigint, InvalidFractionError | UninvertibleModulusError> => {
  if (n === 0) {
    return Either.left(new InvalidFractionError({ numer: 1, denom: 0, reason: "zero root degree" }))
  }
  if (n === 1) {
    return Either.right(e)
  }
  const p = layout.modulus
  return Either.map(inverseModP(p, n), (inverse) =>
    mapFields(layout, (dim) => (getField(layout, e, dim) * inverse) % p)
  )
}
