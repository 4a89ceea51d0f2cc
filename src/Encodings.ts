/**
 * Encoding engine for dimension exponents and unit selectors.
 *
 * An exponent code packs one rational exponent per dimension as a residue
 * modulo a small prime; a unit code packs, per dimension, which declared unit
 * is in play. Both are plain 64-bit words (held as `bigint`), combined field by
 * field when quantities are multiplied, divided or raised to powers, and
 * decoded back to rationals only for conversions and formatting.
 *
 * @since 0.1.0
 */

import { Brand, Context, Effect, Either, Layer, Schema } from "effect"
import { EncodingConfig, makeLayout, type EncodingLayout, type MaxDims } from "./Config.js"
import {
  DecodeExhaustedError,
  InvalidDimensionError,
  InvalidFractionError,
  UnificationFailureError,
  UninvertibleModulusError,
  UnitMismatchError,
} from "./Errors.js"
import * as Bits from "./internal/bits.js"
import { findMaxHeight, getNumerAndDenom } from "./internal/height.js"
import * as Modular from "./internal/modular.js"
import * as Units from "./internal/units.js"

/**
 * Packed rational exponents, one field per dimension.
 *
 * @category Models
 * @since 0.1.0
 */
export type ExponentCode = bigint & Brand.Brand<"ExponentCode">

/**
 * @category Constructors
 * @since 0.1.0
 */
export const ExponentCode = Brand.nominal<ExponentCode>()

/**
 * Packed unit selectors, one field per dimension.
 *
 * @category Models
 * @since 0.1.0
 */
export type UnitCode = bigint & Brand.Brand<"UnitCode">

/**
 * @category Constructors
 * @since 0.1.0
 */
export const UnitCode = Brand.nominal<UnitCode>()

/**
 * A reduced fraction with a positive denominator.
 *
 * @category Models
 * @since 0.1.0
 */
export const Rational = Schema.Struct({
  numer: Schema.Int,
  denom: Schema.Int.pipe(Schema.positive()),
})

/**
 * @category Models
 * @since 0.1.0
 */
export type Rational = typeof Rational.Type

const toRational = ([numer, denom]: Modular.Fraction): Rational => ({ numer, denom })

/**
 * Height of a rational: `|numer| + denom`.
 *
 * @category Utils
 * @since 0.1.0
 */
export const height = (rational: Rational): number => Math.abs(rational.numer) + rational.denom

/**
 * Encoding operations bound to one layout. Arithmetic on codes is total;
 * anything that can fail returns an `Either`.
 *
 * @category Models
 * @since 0.1.0
 */
export class Encodings {
  /**
   * Largest height for which every reduced rational has its own residue.
   */
  readonly maxHeight: number

  constructor(readonly layout: EncodingLayout) {
    this.maxHeight = findMaxHeight(layout.modulus)
  }

  get maxDims(): number {
    return this.layout.maxDims
  }

  get modulus(): number {
    return this.layout.modulus
  }

  get fieldBits(): number {
    return this.layout.fieldBits
  }

  checkDimension(dim: number): Either.Either<number, InvalidDimensionError> {
    return Bits.isDimension(this.layout, dim)
      ? Either.right(dim)
      : Either.left(new InvalidDimensionError({ dimension: dim, maxDims: this.layout.maxDims }))
  }

  // Bit fields

  getField(word: bigint, dim: number): Either.Either<number, InvalidDimensionError> {
    return Either.map(this.checkDimension(dim), (d) => Bits.getField(this.layout, word, d))
  }

  putField(value: number, dim: number): Either.Either<bigint, InvalidDimensionError> {
    return Either.map(this.checkDimension(dim), (d) => Bits.putField(this.layout, value, d))
  }

  clearAndSet(word: bigint, dim: number, value: number): Either.Either<bigint, InvalidDimensionError> {
    return Either.map(this.checkDimension(dim), (d) => Bits.clearAndSet(this.layout, word, d, value))
  }

  // Residues

  normalise(x: number): number {
    return Modular.normalise(this.layout.modulus, x)
  }

  inverseModP(n: number): Either.Either<number, UninvertibleModulusError> {
    return Modular.inverseModP(this.layout.modulus, n)
  }

  encode(numer: number, denom: number): Either.Either<number, InvalidFractionError | UninvertibleModulusError> {
    return Modular.encodeRational(this.layout.modulus, numer, denom)
  }

  getNumerAndDenom(residue: number): Either.Either<Rational, DecodeExhaustedError> {
    return Either.map(getNumerAndDenom(this.layout.modulus, this.maxHeight, residue), toRational)
  }

  // Exponent codes

  /**
   * Exponent code with `numer / denom` in dimension `dim` and zero elsewhere.
   */
  exponent(
    dim: number,
    numer: number,
    denom = 1,
  ): Either.Either<ExponentCode, InvalidDimensionError | InvalidFractionError | UninvertibleModulusError> {
    return Either.flatMap(this.checkDimension(dim), (d) =>
      Either.map(this.encode(numer, denom), (residue) =>
        ExponentCode(Bits.putField(this.layout, residue, d))
      )
    )
  }

  dimExp(dim: number): Either.Either<ExponentCode, InvalidDimensionError> {
    return Either.map(this.checkDimension(dim), (d) => ExponentCode(Units.dimExp(this.layout, d)))
  }

  addExp(e: ExponentCode, f: ExponentCode): ExponentCode {
    return ExponentCode(Modular.addExp(this.layout, e, f))
  }

  subExp(e: ExponentCode, f: ExponentCode): ExponentCode {
    return ExponentCode(Modular.subExp(this.layout, e, f))
  }

  multExp(e: ExponentCode, m: number): ExponentCode {
    return ExponentCode(Modular.multExp(this.layout, e, m))
  }

  divExp(
    e: ExponentCode,
    n: number,
  ): Either.Either<ExponentCode, InvalidFractionError | UninvertibleModulusError> {
    return Either.map(Modular.divExp(this.layout, e, n), ExponentCode)
  }

  /**
   * Decodes every field of an exponent code, dimension 0 first.
   */
  exponents(e: ExponentCode): Either.Either<ReadonlyArray<Rational>, DecodeExhaustedError> {
    return Either.all(Bits.fields(this.layout, e).map((residue) => this.getNumerAndDenom(residue)))
  }

  // Unit codes

  mkUnit(dim: number, unit: number): Either.Either<UnitCode, InvalidDimensionError> {
    return Either.map(this.checkDimension(dim), (d) => UnitCode(Units.mkUnit(this.layout, d, unit)))
  }

  setUnit(units: UnitCode, dim: number, unit: number): Either.Either<UnitCode, InvalidDimensionError> {
    return Either.map(this.checkDimension(dim), (d) => UnitCode(Units.setUnit(this.layout, units, d, unit)))
  }

  unitOf(units: UnitCode, dim: number): number {
    return Bits.getField(this.layout, units, dim)
  }

  residueOf(e: ExponentCode, dim: number): number {
    return Bits.getField(this.layout, e, dim)
  }

  unifyUnits(
    e: ExponentCode,
    f: ExponentCode,
    u: UnitCode,
    v: UnitCode,
  ): Either.Either<UnitCode, UnificationFailureError> {
    return Either.map(Units.unifyUnits(this.layout, e, f, u, v), UnitCode)
  }

  unitsOK(e: ExponentCode, u: UnitCode, v: UnitCode): boolean {
    return Units.unitsOK(this.layout, e, u, v)
  }

  checkUnits(e: ExponentCode, u: UnitCode, v: UnitCode): Either.Either<void, UnitMismatchError> {
    return Units.checkUnits(this.layout, e, u, v)
  }

  cleanUpUnits(e: ExponentCode, u: UnitCode): UnitCode {
    return UnitCode(Units.cleanUpUnits(this.layout, e, u))
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeEncodings = (maxDims?: MaxDims): Encodings => new Encodings(makeLayout(maxDims))

export class EncodingEngine extends Context.Tag("effect-dimq/EncodingEngine")<
  EncodingEngine,
  Encodings
>() {
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const layout = yield* EncodingConfig
      const encodings = new Encodings(layout)
      yield* Effect.logDebug("encoding engine ready").pipe(
        Effect.annotateLogs({
          maxDims: layout.maxDims,
          modulus: layout.modulus,
          maxHeight: encodings.maxHeight,
        }),
      )
      return encodings
    }),
  )

  static make(maxDims?: MaxDims) {
    return Layer.provide(EncodingEngine.layer, EncodingConfig.layer(maxDims))
  }
}
