/**
 * Tokens of the quantity notation written by `UnitSystem.format`:
 * `2.5e+3 km^2 sec^(-1) kg^(1/3)`, optionally with `*` and `/` between
 * factors.
 */

import { createToken, Lexer } from "chevrotain"

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })
export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/,
})
export const UnitSymbol = createToken({ name: "UnitSymbol", pattern: /[^\s*/^()0-9+.-][^\s*/^()]*/ })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })

export const QuantityTokens = [
  WhiteSpace,
  NumberLiteral,
  Caret,
  Star,
  Slash,
  Plus,
  Minus,
  LParen,
  RParen,
  UnitSymbol,
]

export const QuantityLexer = new Lexer(QuantityTokens)

/** Unit symbols the lexer reads back as a single token. */
export const UNIT_SYMBOL_PATTERN = /^[^\s*/^()0-9+.-][^\s*/^()]*$/
