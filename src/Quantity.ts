/**
 * Dimensioned quantities.
 *
 * A `DimQ` is a magnitude together with the exponent code and unit code it is
 * expressed in. The magnitude is always in the units the unit code names;
 * nothing here converts between units implicitly. Operators gate on the
 * codes: sums and comparisons need equal dimensions in equal units, products
 * and quotients need the units of every shared dimension to agree.
 *
 * Every operator takes the {@link Encodings} the codes were built with.
 *
 * @since 0.1.0
 */

import { Data, Either } from "effect"
import { ExponentCode, UnitCode, type Encodings } from "./Encodings.js"
import {
  DimensionMismatchError,
  InvalidFractionError,
  UnificationFailureError,
  UninvertibleModulusError,
  UnitMismatchError,
} from "./Errors.js"
import { fracPow, intPow, type ElementaryFunctions } from "./FracPow.js"

/**
 * @category Models
 * @since 0.1.0
 * @example
 * ```typescript
 * const length = yield* encodings.dimExp(0)
 * const fiveMetres = new DimQ({ value: 5, dims: length, units: UnitCode(0n) })
 * ```
 */
export class DimQ extends Data.Class<{
  readonly value: number
  readonly dims: ExponentCode
  readonly units: UnitCode
}> {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeDimQ = (
  value: number,
  dims: ExponentCode = ExponentCode(0n),
  units: UnitCode = UnitCode(0n),
): DimQ => new DimQ({ value, dims, units })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const dimensionless = (value: number): DimQ => makeDimQ(value)

export const isDimensionless = (quantity: DimQ): boolean => quantity.dims === 0n

const withValue = (quantity: DimQ, value: number): DimQ =>
  new DimQ({ value, dims: quantity.dims, units: quantity.units })

const sameDimensions = (left: DimQ, right: DimQ): Either.Either<void, DimensionMismatchError> =>
  left.dims === right.dims
    ? Either.right(undefined)
    : Either.left(new DimensionMismatchError({ expected: left.dims, actual: right.dims }))

const comparable = (
  encodings: Encodings,
  left: DimQ,
  right: DimQ,
): Either.Either<void, DimensionMismatchError | UnitMismatchError> =>
  Either.flatMap(sameDimensions(left, right), () => encodings.checkUnits(left.dims, left.units, right.units))

// Same dimensions, same units

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const add = (
  encodings: Encodings,
  left: DimQ,
  right: DimQ,
): Either.Either<DimQ, DimensionMismatchError | UnitMismatchError> =>
  Either.map(comparable(encodings, left, right), () => withValue(left, left.value + right.value))

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const subtract = (
  encodings: Encodings,
  left: DimQ,
  right: DimQ,
): Either.Either<DimQ, DimensionMismatchError | UnitMismatchError> =>
  Either.map(comparable(encodings, left, right), () => withValue(left, left.value - right.value))

/**
 * Three-way comparison of magnitudes.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const compare = (
  encodings: Encodings,
  left: DimQ,
  right: DimQ,
): Either.Either<-1 | 0 | 1, DimensionMismatchError | UnitMismatchError> =>
  Either.map(comparable(encodings, left, right), () =>
    left.value < right.value ? -1 : left.value > right.value ? 1 : 0
  )

const comparison =
  (test: (left: number, right: number) => boolean) =>
  (
    encodings: Encodings,
    left: DimQ,
    right: DimQ,
  ): Either.Either<boolean, DimensionMismatchError | UnitMismatchError> =>
    Either.map(comparable(encodings, left, right), () => test(left.value, right.value))

/**
 * @category Comparisons
 * @since 0.1.0
 */
export const equals = comparison((left, right) => left === right)

/**
 * @category Comparisons
 * @since 0.1.0
 */
export const notEquals = comparison((left, right) => left !== right)

/**
 * @category Comparisons
 * @since 0.1.0
 */
export const lessThan = comparison((left, right) => left < right)

/**
 * @category Comparisons
 * @since 0.1.0
 */
export const lessThanOrEqualTo = comparison((left, right) => left <= right)

/**
 * @category Comparisons
 * @since 0.1.0
 */
export const greaterThan = comparison((left, right) => left > right)

/**
 * @category Comparisons
 * @since 0.1.0
 */
export const greaterThanOrEqualTo = comparison((left, right) => left >= right)

// Dimensionless factors

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const scale = (quantity: DimQ, factor: number): DimQ => withValue(quantity, quantity.value * factor)

export const negate = (quantity: DimQ): DimQ => withValue(quantity, -quantity.value)

export const abs = (quantity: DimQ): DimQ => withValue(quantity, Math.abs(quantity.value))

export const floor = (quantity: DimQ): DimQ => withValue(quantity, Math.floor(quantity.value))

export const ceil = (quantity: DimQ): DimQ => withValue(quantity, Math.ceil(quantity.value))

export const round = (quantity: DimQ): DimQ => withValue(quantity, Math.round(quantity.value))

/**
 * The quantity of magnitude 1 in the same dimensions and units.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const unitOf = (quantity: DimQ): DimQ => withValue(quantity, 1)

// Dimension-changing operators

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const multiply = (
  encodings: Encodings,
  left: DimQ,
  right: DimQ,
): Either.Either<DimQ, UnificationFailureError> => {
  const dims = encodings.addExp(left.dims, right.dims)
  return Either.map(encodings.unifyUnits(left.dims, right.dims, left.units, right.units), (units) =>
    new DimQ({ value: left.value * right.value, dims, units: encodings.cleanUpUnits(dims, units) })
  )
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const divide = (
  encodings: Encodings,
  left: DimQ,
  right: DimQ,
): Either.Either<DimQ, UnificationFailureError> => {
  const dims = encodings.subExp(left.dims, right.dims)
  return Either.map(encodings.unifyUnits(left.dims, right.dims, left.units, right.units), (units) =>
    new DimQ({ value: left.value / right.value, dims, units: encodings.cleanUpUnits(dims, units) })
  )
}

/**
 * `1 / quantity`, keeping its units.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const reciprocal = (encodings: Encodings, quantity: DimQ): DimQ =>
  new DimQ({
    value: 1 / quantity.value,
    dims: encodings.subExp(ExponentCode(0n), quantity.dims),
    units: quantity.units,
  })

const integerTerm = (numer: number, denom: number): Either.Either<void, InvalidFractionError> =>
  Number.isInteger(numer) && Number.isInteger(denom)
    ? Either.right(undefined)
    : Either.left(new InvalidFractionError({ numer, denom, reason: "terms must be integers" }))

/**
 * Integer power.
 *
 * @category Powers
 * @since 0.1.0
 */
export const ipow = (
  encodings: Encodings,
  quantity: DimQ,
  m: number,
): Either.Either<DimQ, InvalidFractionError> =>
  Either.map(integerTerm(m, 1), () => {
    const dims = encodings.multExp(quantity.dims, m)
    return new DimQ({
      value: intPow(quantity.value, m),
      dims,
      units: encodings.cleanUpUnits(dims, quantity.units),
    })
  })

/**
 * Rational power `m / n`. The root degree `n` must be positive and must not
 * be a multiple of the modulus.
 *
 * @category Powers
 * @since 0.1.0
 */
export const rpow = (
  encodings: Encodings,
  elementary: ElementaryFunctions,
  quantity: DimQ,
  m: number,
  n: number,
): Either.Either<DimQ, InvalidFractionError | UninvertibleModulusError> =>
  Either.gen(function* () {
    yield* integerTerm(m, n)
    if (n <= 0) {
      return yield* Either.left(new InvalidFractionError({ numer: m, denom: n, reason: "root degree must be positive" }))
    }
    const dims = yield* encodings.divExp(encodings.multExp(quantity.dims, m), n)
    const value = yield* fracPow(elementary, quantity.value, m, n)
    return new DimQ({ value, dims, units: encodings.cleanUpUnits(dims, quantity.units) })
  })

/**
 * @category Powers
 * @since 0.1.0
 */
export const sqrt = (encodings: Encodings, elementary: ElementaryFunctions, quantity: DimQ) =>
  rpow(encodings, elementary, quantity, 1, 2)

/**
 * @category Powers
 * @since 0.1.0
 */
export const cbrt = (encodings: Encodings, elementary: ElementaryFunctions, quantity: DimQ) =>
  rpow(encodings, elementary, quantity, 1, 3)

// Extraction and predicates

/**
 * The magnitude of a dimensionless quantity.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const toNumber = (quantity: DimQ): Either.Either<number, DimensionMismatchError> =>
  isDimensionless(quantity)
    ? Either.right(quantity.value)
    : Either.left(new DimensionMismatchError({ expected: 0n, actual: quantity.dims }))

export const isZero = (quantity: DimQ): boolean => quantity.value === 0

export const isFinite = (quantity: DimQ): boolean => Number.isFinite(quantity.value)

export const isNegative = (quantity: DimQ): boolean => quantity.value < 0

export const isPositive = (quantity: DimQ): boolean => quantity.value > 0
