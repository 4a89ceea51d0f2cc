/**
 * Dimensioned quantities with packed rational exponents and unit selectors.
 *
 * @since 0.1.0
 */

export * from "./Config.js"
export * from "./Encodings.js"
export * from "./Errors.js"
export * from "./FracPow.js"
export * from "./Quantity.js"
export * from "./UnitSystem.js"
