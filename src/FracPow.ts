/**
 * Rational powers reduced to integer powers and square or cube roots.
 *
 * Unit conversion factors are raised to the exponent a dimension carries,
 * which is usually a small fraction such as 1/2, 1/3, 2/3 or 3/2. Denominators
 * built only from 2s and 3s are taken through repeated `sqrt`/`cbrt`, which
 * stays exact where the roots are and accepts negative bases for odd cube
 * roots; any other denominator falls back to a real `pow`.
 *
 * @since 0.1.0
 */

import { Context, Either, Layer } from "effect"
import { InvalidFractionError } from "./Errors.js"
import { reduceFraction } from "./internal/modular.js"

/**
 * Elementary functions consumed by the power reduction. `pow` is only called
 * with positive bases and non-integer exponents.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ElementaryFunctions {
  readonly pow: (base: number, exponent: number) => number
  readonly sqrt: (x: number) => number
  readonly cbrt: (x: number) => number
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const nativeElementary: ElementaryFunctions = {
  pow: Math.pow,
  sqrt: Math.sqrt,
  cbrt: Math.cbrt,
}

export class Elementary extends Context.Tag("effect-dimq/Elementary")<
  Elementary,
  ElementaryFunctions
>() {
  static readonly native = Layer.succeed(this, nativeElementary)
}

/**
 * Exponentiation by squaring. `intPow(x, 0)` is 1 for every `x`.
 *
 * @category Powers
 * @since 0.1.0
 */
export const intPow = (x: number, m: number): number => {
  if (m < 0) {
    return 1 / intPow(x, -m)
  }
  if (m === 0) {
    return 1
  }
  if (m === 1) {
    return x
  }
  const half = intPow(x, Math.floor(m / 2))
  const halfSquared = half * half
  return m % 2 === 1 ? halfSquared * x : halfSquared
}

/**
 * Whether dividing out 2s and 3s reduces `n` to 1.
 *
 * @category Powers
 * @since 0.1.0
 */
export const only2and3 = (n: number): boolean => {
  if (!Number.isInteger(n) || n < 1) {
    return false
  }
  let rest = n
  while (rest % 2 === 0) {
    rest /= 2
  }
  while (rest % 3 === 0) {
    rest /= 3
  }
  return rest === 1
}

/**
 * `x^(m/n)` for a denominator made of 2s and 3s only.
 *
 * @category Powers
 * @since 0.1.0
 */
export const fracPow23 = (
  elementary: ElementaryFunctions,
  x: number,
  m: number,
  n: number,
): Either.Either<number, InvalidFractionError> => {
  if (!only2and3(n)) {
    return Either.left(
      new InvalidFractionError({ numer: m, denom: n, reason: "denominator must be a product of 2s and 3s" }),
    )
  }
  let base = x
  let rest = n
  while (rest !== 1) {
    if (rest % 2 === 0) {
      base = elementary.sqrt(base)
      rest /= 2
    } else {
      base = elementary.cbrt(base)
      rest /= 3
    }
  }
  return Either.right(intPow(base, m))
}

/**
 * `x^(m/n)` for any non-zero `n`, after reducing the fraction to lowest terms.
 *
 * @category Powers
 * @since 0.1.0
 * @example
 * ```ts
 * fracPow(nativeElementary, 8, 2, 3) // Either.right(4)
 * fracPow(nativeElementary, 16, 2, 4) // Either.right(4), same as 1/2
 * ```
 */
export const fracPow = (
  elementary: ElementaryFunctions,
  x: number,
  m: number,
  n: number,
): Either.Either<number, InvalidFractionError> =>
  Either.flatMap(reduceFraction(m, n), ([numer, denom]): Either.Either<number, InvalidFractionError> => {
    if (numer === 0) {
      return Either.right(1)
    }
    if (denom === 1) {
      return Either.right(intPow(x, numer))
    }
    if (only2and3(denom)) {
      return fracPow23(elementary, x, numer, denom)
    }
    return Either.right(elementary.pow(x, numer / denom))
  })
