/**
 * Error hierarchy for dimensioned quantities.
 *
 * Every failure the encoding engine can report is a tagged error, so callers
 * can pattern match with `Effect.catchTag`. None of them are transient: each
 * one marks a combination of dimensions or units that has no meaning without
 * an explicit conversion, or an exponent that grew outside the representable
 * range.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a modular inverse is requested for a multiple of the modulus.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new UninvertibleModulusError({ value: 254, modulus: 127 })
 * yield* Effect.fail(error)
 * ```
 */
export class UninvertibleModulusError extends Data.TaggedError("UninvertibleModulusError")<{
  readonly value: number
  readonly modulus: number
}> {
  override get message(): string {
    return `${this.value} has no inverse modulo ${this.modulus}`
  }
}

/**
 * Raised when two quantities with the same dimensions are added, subtracted
 * or compared while expressed in different units.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitMismatchError extends Data.TaggedError("UnitMismatchError")<{
  readonly dimension: number
  readonly left: number
  readonly right: number
}> {
  override get message(): string {
    return `Units do not match in dimension ${this.dimension}: ${this.left} vs ${this.right}`
  }
}

/**
 * Raised when a product or quotient combines two operands that both carry
 * the same dimension but disagree on its unit.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnificationFailureError extends Data.TaggedError("UnificationFailureError")<{
  readonly dimension: number
  readonly left: number
  readonly right: number
}> {
  override get message(): string {
    return `Cannot unify units ${this.left} and ${this.right} in dimension ${this.dimension}`
  }
}

/**
 * Raised when a residue matches no rational up to the configured maximum
 * height.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DecodeExhaustedError extends Data.TaggedError("DecodeExhaustedError")<{
  readonly residue: number
  readonly modulus: number
  readonly maxHeight: number
}> {
  override get message(): string {
    return `Residue ${this.residue} (mod ${this.modulus}) matches no exponent of height <= ${this.maxHeight}`
  }
}

/**
 * Raised when an operation needs two quantities of identical dimensions (or a
 * dimensionless one) and gets something else.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly expected: bigint
  readonly actual: bigint
}> {
  override get message(): string {
    return `Dimension code ${this.actual} does not match ${this.expected}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class InvalidDimensionError extends Data.TaggedError("InvalidDimensionError")<{
  readonly dimension: number
  readonly maxDims: number
}> {
  override get message(): string {
    return `Dimension index ${this.dimension} is outside [0, ${this.maxDims})`
  }
}

/**
 * Raised for fractional exponents that cannot be applied: a zero denominator,
 * or a reduction step handed a denominator outside its precondition.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidFractionError extends Data.TaggedError("InvalidFractionError")<{
  readonly numer: number
  readonly denom: number
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid fraction ${this.numer}/${this.denom}: ${this.reason}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class UnknownDimensionError extends Data.TaggedError("UnknownDimensionError")<{
  readonly name: string
}> {
  override get message(): string {
    return `Unknown dimension "${this.name}"`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class UnknownUnitError extends Data.TaggedError("UnknownUnitError")<{
  readonly dimension: string
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit "${this.symbol}" for dimension "${this.dimension}"`
  }
}

/**
 * Raised when a unit system declaration cannot be encoded.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidDeclarationError extends Data.TaggedError("InvalidDeclarationError")<{
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid unit system declaration: ${this.reason}`
  }
}

/**
 * Raised when formatting a quantity whose magnitude is `NaN` or infinite.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonFiniteMagnitudeError extends Data.TaggedError("NonFiniteMagnitudeError")<{
  readonly value: number
}> {
  override get message(): string {
    return `Cannot format non-finite magnitude ${this.value}`
  }
}

/**
 * Raised when a formatted quantity cannot be read back.
 *
 * @category Errors
 * @since 0.1.0
 */
export class QuantityParseError extends Data.TaggedError("QuantityParseError")<{
  readonly text: string
  readonly column: number
  readonly problem: string
}> {
  override get message(): string {
    return `Cannot parse quantity at column ${this.column}: ${this.problem}`
  }
}

/**
 * Failures of the exponent and unit encoding itself.
 *
 * @category Errors
 * @since 0.1.0
 */
export type EncodingError =
  | UninvertibleModulusError
  | UnitMismatchError
  | UnificationFailureError
  | DecodeExhaustedError
  | InvalidDimensionError
  | InvalidFractionError

/**
 * Failures of unit system lookups and declarations.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitSystemError =
  | UnknownDimensionError
  | UnknownUnitError
  | InvalidDeclarationError
  | NonFiniteMagnitudeError
  | QuantityParseError
