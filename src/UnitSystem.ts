/**
 * Declaring dimensions and units, and converting between them.
 *
 * A unit system names up to `maxDims` dimensions. Each dimension has a
 * fundamental unit (selector 0, scale 1) and any number of further units,
 * each given by its value in fundamental units. Quantities only change unit
 * through {@link UnitSystemService.convert}, which scales the magnitude by
 * `(oldScale / newScale) ^ exponent` for the dimension being converted.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer, Schema } from "effect"
import { EncodingEngine, ExponentCode, UnitCode, type Encodings, type Rational } from "./Encodings.js"
import {
  DecodeExhaustedError,
  DimensionMismatchError,
  InvalidDeclarationError,
  InvalidFractionError,
  NonFiniteMagnitudeError,
  QuantityParseError,
  UnificationFailureError,
  UninvertibleModulusError,
  UnitMismatchError,
  UnknownDimensionError,
  UnknownUnitError,
} from "./Errors.js"
import { Elementary, fracPow, nativeElementary, type ElementaryFunctions } from "./FracPow.js"
import * as Quantity from "./Quantity.js"
import { DimQ } from "./Quantity.js"
import { dimExp, mkUnit, setUnit } from "./internal/units.js"
import { parseQuantityText } from "./internal/parser/QuantityParser.js"
import { UNIT_SYMBOL_PATTERN } from "./internal/parser/tokens.js"

const UnitSymbol = Schema.String.pipe(
  Schema.pattern(UNIT_SYMBOL_PATTERN, {
    message: () => "unit symbols cannot contain whitespace, '*', '/', '^' or parentheses, nor start with a digit or sign",
  }),
)

/**
 * A non-fundamental unit: `scale` is its value in the dimension's
 * fundamental unit.
 *
 * @category Declarations
 * @since 0.1.0
 */
export class UnitDeclaration extends Schema.Class<UnitDeclaration>("UnitDeclaration")({
  symbol: UnitSymbol,
  scale: Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0)),
}) {}

/**
 * @category Declarations
 * @since 0.1.0
 */
export class DimensionDeclaration extends Schema.Class<DimensionDeclaration>("DimensionDeclaration")({
  name: Schema.NonEmptyTrimmedString,
  fundamental: UnitSymbol,
  units: Schema.optionalWith(Schema.Array(UnitDeclaration), { default: () => [] }),
}) {}

/**
 * Dimensions in declaration order; the first is dimension 0.
 *
 * @category Declarations
 * @since 0.1.0
 * @example
 * ```typescript
 * const declaration = Schema.decodeSync(SystemDeclaration)({
 *   dimensions: [
 *     { name: "Len", fundamental: "m", units: [{ symbol: "km", scale: 1000 }] },
 *     { name: "Time", fundamental: "sec", units: [{ symbol: "day", scale: 86400 }] },
 *   ],
 * })
 * ```
 */
export class SystemDeclaration extends Schema.Class<SystemDeclaration>("SystemDeclaration")({
  dimensions: Schema.Array(DimensionDeclaration).pipe(Schema.minItems(1)),
}) {}

interface DeclaredUnit {
  readonly symbol: string
  readonly scale: number
  readonly selector: number
}

interface DeclaredDimension {
  readonly name: string
  readonly index: number
  readonly units: ReadonlyArray<DeclaredUnit>
}

/**
 * Errors raised while converting or printing a quantity.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ConversionError =
  | UnknownDimensionError
  | UnknownUnitError
  | DecodeExhaustedError
  | InvalidFractionError

export interface UnitSystemService {
  readonly encodings: Encodings
  readonly elementary: ElementaryFunctions
  /** Dimension names; position is the dimension index. */
  readonly dimensions: ReadonlyArray<string>
  readonly dimensionIndex: (name: string) => Either.Either<number, UnknownDimensionError>
  readonly unitScale: (dimension: string, symbol: string) => Either.Either<number, UnknownDimensionError | UnknownUnitError>
  /** The quantity of magnitude 1 in the given unit. */
  readonly unit: (dimension: string, symbol: string) => Either.Either<DimQ, UnknownDimensionError | UnknownUnitError>
  readonly quantity: (
    value: number,
    dimension: string,
    symbol: string,
  ) => Either.Either<DimQ, UnknownDimensionError | UnknownUnitError>
  readonly dimensionless: (value: number) => DimQ
  readonly convert: (quantity: DimQ, dimension: string, symbol: string) => Either.Either<DimQ, ConversionError>
  readonly toFundamental: (quantity: DimQ) => Either.Either<DimQ, ConversionError>
  readonly exponents: (
    quantity: DimQ,
  ) => Either.Either<Readonly<Record<string, Rational>>, UnknownDimensionError | DecodeExhaustedError>
  /** Finite magnitudes only; the text reads back through `parse`. */
  readonly format: (quantity: DimQ) => Either.Either<string, ConversionError | NonFiniteMagnitudeError>
  readonly parse: (
    text: string,
  ) => Either.Either<
    DimQ,
    QuantityParseError | UnificationFailureError | InvalidFractionError | UninvertibleModulusError
  >
  readonly add: (left: DimQ, right: DimQ) => Either.Either<DimQ, DimensionMismatchError | UnitMismatchError>
  readonly subtract: (left: DimQ, right: DimQ) => Either.Either<DimQ, DimensionMismatchError | UnitMismatchError>
  readonly compare: (left: DimQ, right: DimQ) => Either.Either<-1 | 0 | 1, DimensionMismatchError | UnitMismatchError>
  readonly equals: (left: DimQ, right: DimQ) => Either.Either<boolean, DimensionMismatchError | UnitMismatchError>
  readonly lessThan: (left: DimQ, right: DimQ) => Either.Either<boolean, DimensionMismatchError | UnitMismatchError>
  readonly greaterThan: (left: DimQ, right: DimQ) => Either.Either<boolean, DimensionMismatchError | UnitMismatchError>
  readonly multiply: (left: DimQ, right: DimQ) => Either.Either<DimQ, UnificationFailureError>
  readonly divide: (left: DimQ, right: DimQ) => Either.Either<DimQ, UnificationFailureError>
  readonly reciprocal: (quantity: DimQ) => DimQ
  readonly ipow: (quantity: DimQ, m: number) => Either.Either<DimQ, InvalidFractionError>
  readonly rpow: (
    quantity: DimQ,
    m: number,
    n: number,
  ) => Either.Either<DimQ, InvalidFractionError | UninvertibleModulusError>
  readonly sqrt: (quantity: DimQ) => Either.Either<DimQ, InvalidFractionError | UninvertibleModulusError>
  readonly cbrt: (quantity: DimQ) => Either.Either<DimQ, InvalidFractionError | UninvertibleModulusError>
}

const exponentTerm = (symbol: string, { numer, denom }: Rational): string => {
  if (denom !== 1) {
    return ` ${symbol}^(${numer}/${denom})`
  }
  if (numer === 1) {
    return ` ${symbol}`
  }
  return numer > 0 ? ` ${symbol}^${numer}` : ` ${symbol}^(${numer})`
}

const invalid = (reason: string) => Either.left(new InvalidDeclarationError({ reason }))

const declareDimensions = (
  encodings: Encodings,
  declaration: SystemDeclaration,
): Either.Either<ReadonlyArray<DeclaredDimension>, InvalidDeclarationError> => {
  if (declaration.dimensions.length > encodings.maxDims) {
    return invalid(`${declaration.dimensions.length} dimensions declared, at most ${encodings.maxDims} fit`)
  }
  const maxSelector = Number(encodings.layout.fieldMask)
  const names = new Set<string>()
  const dimensions: Array<DeclaredDimension> = []

  for (const [index, dimension] of declaration.dimensions.entries()) {
    if (names.has(dimension.name)) {
      return invalid(`dimension "${dimension.name}" is declared twice`)
    }
    names.add(dimension.name)

    const declared = [{ symbol: dimension.fundamental, scale: 1 }, ...dimension.units]
    if (declared.length - 1 > maxSelector) {
      return invalid(`dimension "${dimension.name}" has ${declared.length} units, at most ${maxSelector + 1} fit`)
    }
    const symbols = new Set<string>()
    const units: Array<DeclaredUnit> = []
    for (const [selector, unit] of declared.entries()) {
      if (symbols.has(unit.symbol)) {
        return invalid(`unit "${unit.symbol}" is declared twice for dimension "${dimension.name}"`)
      }
      symbols.add(unit.symbol)
      units.push({ symbol: unit.symbol, scale: unit.scale, selector })
    }
    dimensions.push({ name: dimension.name, index, units })
  }
  return Either.right(dimensions)
}

/**
 * Builds a unit system over the given encodings.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeUnitSystem = (
  encodings: Encodings,
  declaration: SystemDeclaration,
  elementary: ElementaryFunctions = nativeElementary,
): Either.Either<UnitSystemService, InvalidDeclarationError> =>
  Either.map(declareDimensions(encodings, declaration), (dimensions): UnitSystemService => {
    const byName = new Map(dimensions.map((dimension) => [dimension.name, dimension] as const))

    const findDimension = (name: string): Either.Either<DeclaredDimension, UnknownDimensionError> => {
      const dimension = byName.get(name)
      return dimension ? Either.right(dimension) : Either.left(new UnknownDimensionError({ name }))
    }

    const dimensionAt = (index: number): Either.Either<DeclaredDimension, UnknownDimensionError> => {
      const dimension = dimensions[index]
      return dimension ? Either.right(dimension) : Either.left(new UnknownDimensionError({ name: `#${index}` }))
    }

    const findUnit = (dimension: DeclaredDimension, symbol: string): Either.Either<DeclaredUnit, UnknownUnitError> => {
      const unit = dimension.units.find((candidate) => candidate.symbol === symbol)
      return unit
        ? Either.right(unit)
        : Either.left(new UnknownUnitError({ dimension: dimension.name, symbol }))
    }

    const unitAt = (dimension: DeclaredDimension, selector: number): Either.Either<DeclaredUnit, UnknownUnitError> => {
      const unit = dimension.units[selector]
      return unit
        ? Either.right(unit)
        : Either.left(new UnknownUnitError({ dimension: dimension.name, symbol: `#${selector}` }))
    }

    const unitQuantity = (dimension: DeclaredDimension, unit: DeclaredUnit, value: number): DimQ =>
      new DimQ({
        value,
        dims: ExponentCode(dimExp(encodings.layout, dimension.index)),
        units: UnitCode(mkUnit(encodings.layout, dimension.index, unit.selector)),
      })

    const quantity = (value: number, dimensionName: string, symbol: string) =>
      Either.gen(function* () {
        const dimension = yield* findDimension(dimensionName)
        const unit = yield* findUnit(dimension, symbol)
        return unitQuantity(dimension, unit, value)
      })

    const convertIn = (
      value: DimQ,
      dimension: DeclaredDimension,
      target: DeclaredUnit,
    ): Either.Either<DimQ, ConversionError> =>
      Either.gen(function* () {
        const residue = encodings.residueOf(value.dims, dimension.index)
        if (residue === 0) {
          return value
        }
        const source = yield* unitAt(dimension, encodings.unitOf(value.units, dimension.index))
        const { numer, denom } = yield* encodings.getNumerAndDenom(residue)
        const factor = yield* fracPow(elementary, source.scale / target.scale, numer, denom)
        const units = UnitCode(setUnit(encodings.layout, value.units, dimension.index, target.selector))
        return new DimQ({
          value: value.value * factor,
          dims: value.dims,
          units: encodings.cleanUpUnits(value.dims, units),
        })
      })

    // Dimensions present in the code, in index order.
    const presentDimensions = (
      dims: ExponentCode,
    ): Either.Either<ReadonlyArray<DeclaredDimension>, UnknownDimensionError> => {
      const present: Array<Either.Either<DeclaredDimension, UnknownDimensionError>> = []
      for (let index = 0; index < encodings.maxDims; index++) {
        if (encodings.residueOf(dims, index) !== 0) {
          present.push(dimensionAt(index))
        }
      }
      return Either.all(present)
    }

    const resolveSymbol = (
      text: string,
      symbol: string,
      column: number,
    ): Either.Either<readonly [DeclaredDimension, DeclaredUnit], QuantityParseError> => {
      const matches = dimensions.flatMap((dimension) =>
        dimension.units
          .filter((unit) => unit.symbol === symbol)
          .map((unit) => [dimension, unit] as const)
      )
      const [match, ...others] = matches
      if (!match) {
        return Either.left(new QuantityParseError({ text, column, problem: `Unknown unit "${symbol}"` }))
      }
      if (others.length > 0) {
        const owners = matches.map(([dimension]) => dimension.name).join(", ")
        return Either.left(new QuantityParseError({ text, column, problem: `Unit "${symbol}" is ambiguous between ${owners}` }))
      }
      return Either.right(match)
    }

    return {
      encodings,
      elementary,
      dimensions: dimensions.map((dimension) => dimension.name),
      dimensionIndex: (name) => Either.map(findDimension(name), (dimension) => dimension.index),
      unitScale: (dimensionName, symbol) =>
        Either.gen(function* () {
          const dimension = yield* findDimension(dimensionName)
          const unit = yield* findUnit(dimension, symbol)
          return unit.scale
        }),
      unit: (dimensionName, symbol) => quantity(1, dimensionName, symbol),
      quantity,
      dimensionless: Quantity.dimensionless,
      convert: (value, dimensionName, symbol) =>
        Either.gen(function* () {
          const dimension = yield* findDimension(dimensionName)
          const target = yield* findUnit(dimension, symbol)
          return yield* convertIn(value, dimension, target)
        }),
      toFundamental: (value) =>
        Either.gen(function* () {
          let current = value
          for (const dimension of yield* presentDimensions(value.dims)) {
            const fundamental = yield* unitAt(dimension, 0)
            current = yield* convertIn(current, dimension, fundamental)
          }
          return current
        }),
      exponents: (value) =>
        Either.gen(function* () {
          const entries: Array<readonly [string, Rational]> = []
          for (const dimension of yield* presentDimensions(value.dims)) {
            const exponent = yield* encodings.getNumerAndDenom(encodings.residueOf(value.dims, dimension.index))
            entries.push([dimension.name, exponent])
          }
          return Object.fromEntries(entries)
        }),
      format: (value) =>
        Either.gen(function* () {
          if (!Number.isFinite(value.value)) {
            return yield* Either.left(new NonFiniteMagnitudeError({ value: value.value }))
          }
          let text = value.value.toExponential(16)
          for (const dimension of yield* presentDimensions(value.dims)) {
            const unit = yield* unitAt(dimension, encodings.unitOf(value.units, dimension.index))
            const exponent = yield* encodings.getNumerAndDenom(encodings.residueOf(value.dims, dimension.index))
            text += exponentTerm(unit.symbol, exponent)
          }
          return text
        }),
      parse: (text) =>
        Either.gen(function* () {
          const parsed = yield* parseQuantityText(text)
          let current = Quantity.dimensionless(parsed.value)
          for (const factor of parsed.factors) {
            const [dimension, unit] = yield* resolveSymbol(text, factor.symbol, factor.column)
            const dims = yield* encodings.divExp(
              encodings.multExp(unitQuantity(dimension, unit, 1).dims, factor.numer),
              factor.denom,
            )
            const units = UnitCode(mkUnit(encodings.layout, dimension.index, unit.selector))
            current = yield* Quantity.multiply(
              encodings,
              current,
              new DimQ({ value: 1, dims, units: encodings.cleanUpUnits(dims, units) }),
            )
          }
          return current
        }),
      add: (left, right) => Quantity.add(encodings, left, right),
      subtract: (left, right) => Quantity.subtract(encodings, left, right),
      compare: (left, right) => Quantity.compare(encodings, left, right),
      equals: (left, right) => Quantity.equals(encodings, left, right),
      lessThan: (left, right) => Quantity.lessThan(encodings, left, right),
      greaterThan: (left, right) => Quantity.greaterThan(encodings, left, right),
      multiply: (left, right) => Quantity.multiply(encodings, left, right),
      divide: (left, right) => Quantity.divide(encodings, left, right),
      reciprocal: (value) => Quantity.reciprocal(encodings, value),
      ipow: (value, m) => Quantity.ipow(encodings, value, m),
      rpow: (value, m, n) => Quantity.rpow(encodings, elementary, value, m, n),
      sqrt: (value) => Quantity.sqrt(encodings, elementary, value),
      cbrt: (value) => Quantity.cbrt(encodings, elementary, value),
    }
  })

/**
 * Decodes an encoded declaration and builds the unit system.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const declareUnitSystem = (
  encodings: Encodings,
  input: typeof SystemDeclaration.Encoded,
  elementary: ElementaryFunctions = nativeElementary,
): Either.Either<UnitSystemService, InvalidDeclarationError> =>
  Either.flatMap(
    Either.mapLeft(
      Schema.decodeUnknownEither(SystemDeclaration)(input),
      (error) => new InvalidDeclarationError({ reason: error.message }),
    ),
    (declaration) => makeUnitSystem(encodings, declaration, elementary),
  )

export class UnitSystem extends Context.Tag("effect-dimq/UnitSystem")<UnitSystem, UnitSystemService>() {
  static layer(declaration: typeof SystemDeclaration.Encoded) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const encodings = yield* EncodingEngine
        const elementary = yield* Elementary
        const system = yield* declareUnitSystem(encodings, declaration, elementary)
        yield* Effect.logDebug("unit system declared").pipe(
          Effect.annotateLogs({ dimensions: system.dimensions.join(",") }),
        )
        return system
      }),
    )
  }
}
