import type { IToken, TokenType } from "chevrotain"
import { Either } from "effect"
import { QuantityParseError } from "../../Errors.js"
import {
  Caret,
  LParen,
  Minus,
  NumberLiteral,
  Plus,
  QuantityLexer,
  RParen,
  Slash,
  Star,
  UnitSymbol,
} from "./tokens.js"

export interface ParsedFactor {
  readonly symbol: string
  readonly numer: number
  readonly denom: number
  readonly column: number
}

export interface ParsedQuantity {
  readonly value: number
  readonly factors: ReadonlyArray<ParsedFactor>
}

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(): IToken | undefined {
    return this.#tokens[this.#index]
  }

  match(tokenType: TokenType): IToken | undefined {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return token
    }
    return undefined
  }

  expect(tokenType: TokenType, problem: string): IToken {
    const token = this.match(tokenType)
    if (!token) {
      throw this.error(this.peek(), problem)
    }
    return token
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(token: IToken | undefined, problem: string): QuantityParseError {
    return new QuantityParseError({
      text: this.#source,
      column: token?.startColumn ?? this.#source.length + 1,
      problem,
    })
  }
}

const parseInteger = (stream: Stream): number => {
  const token = stream.expect(NumberLiteral, "Expected an integer exponent")
  const value = Number(token.image)
  if (!Number.isInteger(value)) {
    throw stream.error(token, `Exponent ${token.image} is not an integer`)
  }
  return value
}

// `^k`, `^-k`, `^(k)`, `^(-k)`, `^(m/n)`
const parseExponent = (stream: Stream): readonly [numer: number, denom: number] => {
  if (stream.match(LParen)) {
    const negative = stream.match(Minus) !== undefined
    const numer = parseInteger(stream)
    let denom = 1
    const slash = stream.match(Slash)
    if (slash) {
      denom = parseInteger(stream)
      if (denom === 0) {
        throw stream.error(slash, "Zero denominator in exponent")
      }
    }
    stream.expect(RParen, "Expected ')' after exponent")
    return [negative ? -numer : numer, denom]
  }
  const negative = stream.match(Minus) !== undefined
  const numer = parseInteger(stream)
  return [negative ? -numer : numer, 1]
}

const parseMagnitude = (stream: Stream): number => {
  const sign = stream.match(Minus) ? -1 : 1
  const signed = sign < 0 || stream.match(Plus) !== undefined
  const literal = stream.match(NumberLiteral)
  if (literal) {
    return sign * Number(literal.image)
  }
  if (signed) {
    throw stream.error(stream.peek(), "Expected a magnitude after the sign")
  }
  return 1
}

const parseFactor = (stream: Stream): ParsedFactor => {
  const inverse = stream.match(Slash) !== undefined
  if (!inverse) {
    stream.match(Star)
  }
  const token = stream.expect(UnitSymbol, "Expected a unit symbol")
  const [numer, denom] = stream.match(Caret) ? parseExponent(stream) : ([1, 1] as const)
  return {
    symbol: token.image,
    numer: inverse ? -numer : numer,
    denom,
    column: token.startColumn ?? 1,
  }
}

/**
 * Reads a magnitude (1 when omitted) followed by unit factors with optional
 * rational exponents. Symbols are returned as written; resolving them to
 * dimensions is the caller's job.
 */
export const parseQuantityText = (text: string): Either.Either<ParsedQuantity, QuantityParseError> =>
  Either.try({
    try: () => {
      const lexing = QuantityLexer.tokenize(text)
      const lexError = lexing.errors[0]
      if (lexError) {
        throw new QuantityParseError({ text, column: lexError.column ?? 1, problem: lexError.message })
      }
      const stream = new Stream(lexing.tokens, text)
      const value = parseMagnitude(stream)
      const factors: Array<ParsedFactor> = []
      while (!stream.done()) {
        factors.push(parseFactor(stream))
      }
      return { value, factors }
    },
    catch: (error) =>
      error instanceof QuantityParseError
        ? error
        : new QuantityParseError({
            text,
            column: 1,
            problem: error instanceof Error ? error.message : String(error),
          }),
  })
