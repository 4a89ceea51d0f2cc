/**
 * Encoding configuration.
 *
 * Exponent and unit codes pack one field per dimension into a 64-bit word.
 * Three layouts are supported; each pairs the number of dimensions with the
 * field width and the largest prime that fits in that width:
 *
 * | dimensions | field bits | modulus |
 * | ---------- | ---------- | ------- |
 * | 7          | 9          | 509     |
 * | 8          | 8          | 251     |
 * | 9          | 7          | 127     |
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Schema } from "effect"

/**
 * Supported dimension counts.
 *
 * @category Config
 * @since 0.1.0
 */
export const MaxDims = Schema.Literal(7, 8, 9)

/**
 * @category Config
 * @since 0.1.0
 */
export type MaxDims = typeof MaxDims.Type

/**
 * @category Config
 * @since 0.1.0
 */
export const DEFAULT_MAX_DIMS: MaxDims = 8

const FIELD_BITS = { 7: 9, 8: 8, 9: 7 } as const satisfies Record<MaxDims, number>
const MODULI = { 7: 509, 8: 251, 9: 127 } as const satisfies Record<MaxDims, number>

/**
 * Field layout derived from the dimension count.
 *
 * @category Config
 * @since 0.1.0
 */
export class EncodingLayout extends Schema.Class<EncodingLayout>("EncodingLayout")({
  maxDims: MaxDims,
}) {
  get fieldBits(): number {
    return FIELD_BITS[this.maxDims]
  }

  get modulus(): number {
    return MODULI[this.maxDims]
  }

  get fieldMask(): bigint {
    return (1n << BigInt(this.fieldBits)) - 1n
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeLayout = (maxDims: MaxDims = DEFAULT_MAX_DIMS): EncodingLayout =>
  new EncodingLayout({ maxDims })

/**
 * Environment variable read by {@link EncodingConfig.fromEnv}.
 *
 * @category Config
 * @since 0.1.0
 */
export const MAX_DIMS_VARIABLE = "DIMQ_MAX_DIMS"

const maxDimsConfig = Config.literal(7, 8, 9)(MAX_DIMS_VARIABLE).pipe(
  Config.withDefault(DEFAULT_MAX_DIMS),
)

export class EncodingConfig extends Context.Tag("effect-dimq/EncodingConfig")<
  EncodingConfig,
  EncodingLayout
>() {
  static layer(maxDims: MaxDims = DEFAULT_MAX_DIMS) {
    return Layer.succeed(this, makeLayout(maxDims))
  }

  static readonly fromEnv = Layer.effect(
    this,
    Effect.map(maxDimsConfig, (maxDims) => makeLayout(maxDims)),
  )
}
