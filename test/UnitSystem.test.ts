import { describe, it, expect } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { EncodingEngine, ExponentCode, UnitCode, makeEncodings } from "../src/Encodings.js"
import {
  DecodeExhaustedError,
  InvalidDeclarationError,
  NonFiniteMagnitudeError,
  QuantityParseError,
  UnificationFailureError,
  UninvertibleModulusError,
  UnitMismatchError,
  UnknownDimensionError,
  UnknownUnitError,
} from "../src/Errors.js"
import { Elementary, type ElementaryFunctions } from "../src/FracPow.js"
import { DimQ } from "../src/Quantity.js"
import { UnitSystem, declareUnitSystem } from "../src/UnitSystem.js"
import { astronomyDeclaration, expectLeft, expectRight } from "./fixtures.js"

const system = expectRight(declareUnitSystem(makeEncodings(), astronomyDeclaration))

const km = (value: number) => expectRight(system.quantity(value, "Len", "km"))
const perMinute = (value: DimQ) => expectRight(system.divide(value, expectRight(system.unit("Time", "min"))))

describe("UnitSystem", () => {
  describe("lookups", () => {
    it("lists dimensions in declaration order", () => {
      expect(system.dimensions).toEqual(["Len", "Time", "Mass"])
      expect(expectRight(system.dimensionIndex("Mass"))).toBe(2)
      expect(expectLeft(system.dimensionIndex("Charge"))).toBeInstanceOf(UnknownDimensionError)
    })

    it("knows each unit's scale", () => {
      expect(expectRight(system.unitScale("Len", "mi"))).toBe(1609.344)
      expect(expectRight(system.unitScale("Time", "sec"))).toBe(1)
    })

    it("builds quantities with the unit's selector", () => {
      expect(km(1)).toEqual(new DimQ({ value: 1, dims: ExponentCode(1n), units: UnitCode(1n) }))
      const days = expectRight(system.quantity(5, "Time", "day"))
      expect(days.dims).toBe(256n)
      expect(days.units).toBe(512n)
    })

    it("rejects unknown names", () => {
      const unit = expectLeft(system.quantity(1, "Len", "parsec"))
      expect(unit).toBeInstanceOf(UnknownUnitError)
      expect(unit).toMatchObject({ dimension: "Len", symbol: "parsec" })
      expect(expectLeft(system.unit("Charge", "C"))).toBeInstanceOf(UnknownDimensionError)
    })
  })

  describe("conversion", () => {
    it("scales by the ratio of unit scales", () => {
      const metres = expectRight(system.convert(km(5), "Len", "m"))
      expect(metres.value).toBe(5000)
      expect(metres.units).toBe(0n)

      const au = expectRight(system.convert(expectRight(system.unit("Len", "AU")), "Len", "km"))
      expect(au.value).toBeCloseTo(149_597_870.7)
    })

    it("raises the ratio to the dimension's exponent", () => {
      const speed = perMinute(km(120))
      const perSecond = expectRight(system.convert(speed, "Time", "sec"))
      expect(perSecond.value).toBeCloseTo(2)
      expect(perSecond.units).toBe(1n)

      const metresPerSecond = expectRight(system.convert(perSecond, "Len", "m"))
      expect(metresPerSecond.value).toBeCloseTo(2000)
      expect(metresPerSecond.units).toBe(0n)
    })

    it("converts fractional exponents through roots", () => {
      const rootKm = expectRight(system.sqrt(km(9)))
      const rootM = expectRight(system.convert(rootKm, "Len", "m"))
      expect(rootM.value).toBeCloseTo(3 * Math.sqrt(1000))
      expect(rootM.dims).toBe(126n)
    })

    it("leaves quantities without the dimension unchanged", () => {
      const distance = km(5)
      expect(expectRight(system.convert(distance, "Time", "day"))).toBe(distance)
    })

    it("converts every dimension to its fundamental unit", () => {
      const grams = expectRight(system.quantity(2, "Mass", "g"))
      const product = expectRight(system.multiply(km(3), grams))
      const fundamental = expectRight(system.toFundamental(product))
      expect(fundamental.value).toBeCloseTo(6)
      expect(fundamental.units).toBe(0n)
    })

    it("fails for selectors the system never declared", () => {
      const stray = new DimQ({ value: 1, dims: ExponentCode(1n), units: UnitCode(9n) })
      const error = expectLeft(system.convert(stray, "Len", "m"))
      expect(error).toBeInstanceOf(UnknownUnitError)
      expect(error).toMatchObject({ dimension: "Len", symbol: "#9" })
    })
  })

  describe("mixed units", () => {
    it("refuses to add kilometres to miles", () => {
      const miles = expectRight(system.quantity(1, "Len", "mi"))
      const error = expectLeft(system.add(km(1), miles))
      expect(error).toBeInstanceOf(UnitMismatchError)
      expect(error).toMatchObject({ dimension: 0, left: 1, right: 2 })
      expect(expectLeft(system.multiply(km(1), miles))).toBeInstanceOf(UnificationFailureError)
    })

    it("adds once both sides share a unit", () => {
      const miles = expectRight(system.convert(expectRight(system.quantity(1, "Len", "mi")), "Len", "km"))
      expect(expectRight(system.add(km(1), miles)).value).toBeCloseTo(2.609344)
      expect(expectRight(system.compare(km(1), miles))).toBe(-1)
      expect(expectRight(system.lessThan(km(1), miles))).toBe(true)
      expect(expectRight(system.equals(km(1), km(1)))).toBe(true)
    })
  })

  describe("exponents", () => {
    it("decodes the exponent of every present dimension", () => {
      const quantity = perMinute(expectRight(system.sqrt(km(9))))
      expect(expectRight(system.exponents(quantity))).toEqual({
        Len: { numer: 1, denom: 2 },
        Time: { numer: -1, denom: 1 },
      })
    })

    it("keeps dimension names that collide with Object.prototype members", () => {
      const odd = expectRight(
        declareUnitSystem(makeEncodings(), {
          dimensions: [
            { name: "__proto__", fundamental: "q" },
            { name: "constructor", fundamental: "c" },
          ],
        }),
      )
      const quantity = expectRight(
        odd.multiply(expectRight(odd.unit("__proto__", "q")), expectRight(odd.unit("constructor", "c"))),
      )
      const exponents = expectRight(odd.exponents(quantity))
      expect(Object.keys(exponents)).toEqual(["__proto__", "constructor"])
      expect(Object.getPrototypeOf(exponents)).toBe(Object.prototype)
      expect(Object.getOwnPropertyDescriptor(exponents, "__proto__")?.value).toEqual({ numer: 1, denom: 1 })
      expect(Object.getOwnPropertyDescriptor(exponents, "constructor")?.value).toEqual({ numer: 1, denom: 1 })
    })
  })

  describe("format", () => {
    it("writes the magnitude and each unit with its exponent", () => {
      expect(expectRight(system.format(km(5)))).toBe("5.0000000000000000e+0 km")
      expect(expectRight(system.format(perMinute(km(120))))).toBe("1.2000000000000000e+2 km min^(-1)")
      expect(expectRight(system.format(expectRight(system.multiply(km(4), km(4)))))).toBe(
        "1.6000000000000000e+1 km^2",
      )
      expect(expectRight(system.format(system.dimensionless(2.5)))).toBe("2.5000000000000000e+0")
    })

    it("writes fractional exponents in parentheses", () => {
      expect(expectRight(system.format(expectRight(system.sqrt(km(9)))))).toBe("3.0000000000000000e+0 km^(1/2)")

      const grams = expectRight(system.quantity(8, "Mass", "g"))
      const inverseRoot = system.reciprocal(expectRight(system.cbrt(grams)))
      expect(expectRight(system.format(inverseRoot))).toBe("5.0000000000000000e-1 g^(-1/3)")

      const metres = expectRight(system.quantity(8, "Len", "m"))
      expect(expectRight(system.format(expectRight(system.rpow(metres, 2, 3))))).toBe(
        "4.0000000000000000e+0 m^(2/3)",
      )
    })

    it("refuses magnitudes that parse cannot read back", () => {
      for (const value of [Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY]) {
        const error = expectLeft(system.format(km(value)))
        expect(error).toBeInstanceOf(NonFiniteMagnitudeError)
        expect(error).toMatchObject({ value })
      }
      expect(expectRight(system.format(system.dimensionless(-0.5)))).toBe("-5.0000000000000000e-1")
    })

    it("fails for undeclared dimensions and undecodable exponents", () => {
      const undeclared = new DimQ({ value: 1, dims: ExponentCode(1n << 40n), units: UnitCode(0n) })
      const dimension = expectLeft(system.format(undeclared))
      expect(dimension).toBeInstanceOf(UnknownDimensionError)
      expect(dimension).toMatchObject({ name: "#5" })

      const tall = new DimQ({ value: 1, dims: ExponentCode(20n), units: UnitCode(0n) })
      const exhausted = expectLeft(system.format(tall))
      expect(exhausted).toBeInstanceOf(DecodeExhaustedError)
      expect(exhausted).toMatchObject({ residue: 20 })
    })
  })

  describe("parse", () => {
    it("reads back what format writes", () => {
      const samples = [
        km(5),
        perMinute(km(120)),
        expectRight(system.sqrt(km(9))),
        system.reciprocal(expectRight(system.cbrt(expectRight(system.quantity(8, "Mass", "g"))))),
        system.dimensionless(2.5),
      ]
      for (const sample of samples) {
        const text = expectRight(system.format(sample))
        expect(expectRight(system.parse(text))).toEqual(sample)
      }
    })

    it("combines factors across dimensions", () => {
      const parsed = expectRight(system.parse("2 km * g / min"))
      expect(parsed.value).toBe(2)
      expect(expectRight(system.exponents(parsed))).toEqual({
        Len: { numer: 1, denom: 1 },
        Time: { numer: -1, denom: 1 },
        Mass: { numer: 1, denom: 1 },
      })
    })

    it("reports unknown symbols with their column", () => {
      const error = expectLeft(system.parse("5 parsec"))
      expect(error).toBeInstanceOf(QuantityParseError)
      expect(error).toMatchObject({ column: 3, problem: 'Unknown unit "parsec"' })
    })

    it("refuses two units of one dimension", () => {
      const error = expectLeft(system.parse("5 km m"))
      expect(error).toBeInstanceOf(UnificationFailureError)
      expect(error).toMatchObject({ dimension: 0, left: 1, right: 0 })
    })

    it("refuses roots the modulus cannot express", () => {
      expect(expectLeft(system.parse("5 km^(1/251)"))).toBeInstanceOf(UninvertibleModulusError)
    })

    it("refuses symbols shared by several dimensions", () => {
      const shared = expectRight(
        declareUnitSystem(makeEncodings(), {
          dimensions: [
            { name: "A", fundamental: "u" },
            { name: "B", fundamental: "u" },
          ],
        }),
      )
      const error = expectLeft(shared.parse("1 u"))
      expect(error).toMatchObject({ column: 3, problem: 'Unit "u" is ambiguous between A, B' })
    })
  })

  describe("declarations", () => {
    const reasonOf = (declaration: Parameters<typeof declareUnitSystem>[1], maxDims: 8 | 9 = 8) => {
      const error = expectLeft(declareUnitSystem(makeEncodings(maxDims), declaration))
      expect(error).toBeInstanceOf(InvalidDeclarationError)
      return error.reason
    }

    it("limits the number of dimensions", () => {
      const dimensions = Array.from({ length: 9 }, (_, i) => ({ name: `D${i}`, fundamental: `s${i}` }))
      expect(reasonOf({ dimensions })).toBe("9 dimensions declared, at most 8 fit")
    })

    it("rejects duplicate names and symbols", () => {
      expect(
        reasonOf({
          dimensions: [
            { name: "Len", fundamental: "m" },
            { name: "Len", fundamental: "ft" },
          ],
        }),
      ).toBe('dimension "Len" is declared twice')
      expect(reasonOf({ dimensions: [{ name: "Len", fundamental: "m", units: [{ symbol: "m", scale: 2 }] }] })).toBe(
        'unit "m" is declared twice for dimension "Len"',
      )
    })

    it("limits the number of units to the selector width", () => {
      const units = Array.from({ length: 128 }, (_, i) => ({ symbol: `u${i}`, scale: i + 2 }))
      expect(reasonOf({ dimensions: [{ name: "Len", fundamental: "m", units }] }, 9)).toBe(
        'dimension "Len" has 129 units, at most 128 fit',
      )
      const fits = declareUnitSystem(makeEncodings(9), {
        dimensions: [{ name: "Len", fundamental: "m", units: units.slice(0, 127) }],
      })
      expect(expectRight(fits).dimensions).toEqual(["Len"])
    })

    it("validates scales and symbols", () => {
      expect(
        expectLeft(
          declareUnitSystem(makeEncodings(), {
            dimensions: [{ name: "Len", fundamental: "m", units: [{ symbol: "km", scale: -1000 }] }],
          }),
        ),
      ).toBeInstanceOf(InvalidDeclarationError)
      expect(
        expectLeft(declareUnitSystem(makeEncodings(), { dimensions: [{ name: "Len", fundamental: "k m" }] })),
      ).toBeInstanceOf(InvalidDeclarationError)
      expect(expectLeft(declareUnitSystem(makeEncodings(), { dimensions: [] }))).toBeInstanceOf(
        InvalidDeclarationError,
      )
    })
  })
})

const recording = (calls: Array<string>): ElementaryFunctions => ({
  pow: Math.pow,
  sqrt: (x) => {
    calls.push("sqrt")
    return Math.sqrt(x)
  },
  cbrt: Math.cbrt,
})

describe("UnitSystem layer", () => {
  const encodingLayer = EncodingEngine.make()

  it.effect("declares the system from its dependencies", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      expect(units.dimensions).toEqual(["Len", "Time", "Mass"])
      const metres = yield* units.convert(yield* units.quantity(2, "Len", "km"), "Len", "m")
      expect(metres.value).toBe(2000)
    }).pipe(
      Effect.provide(UnitSystem.layer(astronomyDeclaration)),
      Effect.provide(Layer.mergeAll(encodingLayer, Elementary.native)),
    ),
  )

  it.effect("uses the provided elementary functions", () => {
    const calls: Array<string> = []
    return Effect.gen(function* () {
      const units = yield* UnitSystem
      const root = yield* units.sqrt(yield* units.quantity(9, "Len", "km"))
      yield* units.convert(root, "Len", "m")
      expect(calls).toEqual(["sqrt", "sqrt"])
    }).pipe(
      Effect.provide(UnitSystem.layer(astronomyDeclaration)),
      Effect.provide(Layer.mergeAll(encodingLayer, Layer.succeed(Elementary, recording(calls)))),
    )
  })

  it.effect("fails to build from an invalid declaration", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        UnitSystem.pipe(
          Effect.provide(UnitSystem.layer({ dimensions: [{ name: "Len", fundamental: "m", units: [{ symbol: "km", scale: 0 }] }] })),
          Effect.provide(Layer.mergeAll(encodingLayer, Elementary.native)),
        ),
      )
      expect(error).toBeInstanceOf(InvalidDeclarationError)
    }),
  )
})
