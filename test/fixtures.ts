import { Either } from "effect"
import type { SystemDeclaration } from "../src/UnitSystem.js"

/**
 * Length, time and mass with a few non-fundamental units each.
 *
 * Selectors: Len m=0 km=1 mi=2 AU=3, Time sec=0 min=1 day=2, Mass kg=0 g=1.
 */
export const astronomyDeclaration = {
  dimensions: [
    {
      name: "Len",
      fundamental: "m",
      units: [
        { symbol: "km", scale: 1000 },
        { symbol: "mi", scale: 1609.344 },
        { symbol: "AU", scale: 149_597_870_700 },
      ],
    },
    {
      name: "Time",
      fundamental: "sec",
      units: [
        { symbol: "min", scale: 60 },
        { symbol: "day", scale: 86_400 },
      ],
    },
    {
      name: "Mass",
      fundamental: "kg",
      units: [{ symbol: "g", scale: 0.001 }],
    },
  ],
} satisfies typeof SystemDeclaration.Encoded

export const expectRight = <A, E>(either: Either.Either<A, E>): A =>
  Either.getOrThrowWith(either, (error) => new Error(`expected success, got ${String(error)}`))

export const expectLeft = <A, E>(either: Either.Either<A, E>): E =>
  Either.getOrThrowWith(Either.flip(either), (value) => new Error(`expected failure, got ${String(value)}`))
