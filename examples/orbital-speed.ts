import { Console, Effect, Layer, Logger, LogLevel } from "effect"
import { EncodingEngine } from "../src/Encodings.js"
import { Elementary } from "../src/FracPow.js"
import * as Quantity from "../src/Quantity.js"
import { UnitSystem } from "../src/UnitSystem.js"

const astronomy = UnitSystem.layer({
  dimensions: [
    {
      name: "Len",
      fundamental: "m",
      units: [
        { symbol: "km", scale: 1000 },
        { symbol: "AU", scale: 149_597_870_700 },
      ],
    },
    {
      name: "Time",
      fundamental: "sec",
      units: [{ symbol: "day", scale: 86_400 }],
    },
  ],
})

const layer = astronomy.pipe(Layer.provide(Layer.mergeAll(EncodingEngine.make(), Elementary.native)))

const program = Effect.gen(function* () {
  const units = yield* UnitSystem
  const orbit = Quantity.scale(yield* units.unit("Len", "AU"), 2 * Math.PI)
  const year = yield* units.quantity(365.25, "Time", "day")

  const speed = yield* units.divide(orbit, year)
  yield* Console.log(`mean orbital speed: ${yield* units.format(speed)}`)

  const inKm = yield* units.convert(speed, "Len", "km")
  const perSecond = yield* units.convert(inKm, "Time", "sec")
  yield* Console.log(`                  = ${yield* units.format(perSecond)}`)

  const roundTrip = yield* units.parse(yield* units.format(perSecond))
  yield* Console.log(`parsed back equal: ${yield* units.equals(roundTrip, perSecond)}`)
}).pipe(Effect.provide(layer), Logger.withMinimumLogLevel(LogLevel.Debug))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run orbital speed example", error)
  process.exitCode = 1
})
