import * as Either from "effect/Either"

import type { LexError, ParseError } from "./errors.js"
import { parseError } from "./errors.js"
import type { Token } from "./lexer.js"
import { describeToken, tokenize } from "./lexer.js"
import type { Document, Value } from "./value.js"
import { array, dictionary, float, integer, string } from "./value.js"

// CHANGE: descent parser from tokens to the Value tree over an explicit frame stack
// WHY: turn `key = value` dumps into a Document the tree algorithms can walk
// FORMAT THEOREM: document := (identifier '=' value)*; value := array | literal | identifier ['=' value]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: `name = value` nested in a value yields a one-key Dictionary; a bare name yields a String
// COMPLEXITY: O(n) where n = number of tokens

interface ParserState {
  readonly tokens: ReadonlyArray<Token>
  index: number
}

const endOfInput = (expected: string): ParseError =>
  parseError("UnexpectedEndOfInput", `Unexpected end of input, expected ${expected}`, undefined)

const unexpectedToken = (token: Token, expected: string): ParseError =>
  parseError("UnexpectedToken", `Unexpected ${describeToken(token)}, expected ${expected}`, token.position)

// Open containers of the value being read: an array waiting for items or `}`,
// or `name =` waiting for its value. Nesting depth is bounded by memory, not the call stack.
type Frame =
  | { readonly _tag: "Array"; readonly items: Array<Value> }
  | { readonly _tag: "Entry"; readonly name: string }

const readIdentifier = (
  state: ParserState,
  frames: Array<Frame>,
  name: string
): Either.Either<Value | undefined, ParseError> => {
  const lookahead = state.tokens[state.index]
  if (lookahead === undefined) {
    return Either.left(endOfInput(`'=' or '}' after ${name}`))
  }
  if (lookahead._tag !== "Equal") {
    return Either.right(string(name))
  }
  state.index += 1
  frames.push({ _tag: "Entry", name })
  return Either.right(undefined)
}

// Consume one token: either a finished value, or undefined when a frame was opened or a comma skipped.
const step = (state: ParserState, frames: Array<Frame>): Either.Either<Value | undefined, ParseError> => {
  const token = state.tokens[state.index]
  const top = frames.at(-1)
  if (token === undefined) {
    return Either.left(endOfInput(top?._tag === "Array" ? "'}'" : "a value"))
  }
  if (top?._tag === "Array") {
    if (token._tag === "Comma") {
      state.index += 1
      return Either.right(undefined)
    }
    if (token._tag === "CloseBrace") {
      state.index += 1
      frames.pop()
      return Either.right(array(top.items))
    }
  }
  switch (token._tag) {
    case "OpenBrace":
      state.index += 1
      frames.push({ _tag: "Array", items: [] })
      return Either.right(undefined)
    case "StringLiteral":
      state.index += 1
      return Either.right(string(token.text))
    case "IntegerLiteral":
      state.index += 1
      return Either.right(integer(token.value))
    case "FloatLiteral":
      state.index += 1
      return Either.right(float(token.value))
    case "Identifier":
      state.index += 1
      return readIdentifier(state, frames, token.text)
    default:
      return Either.left(unexpectedToken(token, "a value"))
  }
}

const parseValue = (state: ParserState): Either.Either<Value, ParseError> => {
  const frames: Array<Frame> = []
  for (;;) {
    const next = step(state, frames)
    if (Either.isLeft(next)) {
      return Either.left(next.left)
    }
    let value = next.right
    while (value !== undefined) {
      const top = frames.at(-1)
      if (top === undefined) {
        return Either.right(value)
      }
      if (top._tag === "Array") {
        top.items.push(value)
        value = undefined
      } else {
        frames.pop()
        value = dictionary([[top.name, value]])
      }
    }
  }
}

/**
 * Build a Document from a token sequence.
 *
 * @param tokens - Output of tokenize.
 * @returns Either with the Document or the first ParseError.
 *
 * @pure true
 * @invariant lookahead never reads past the last token
 * @complexity O(n)
 */
export const parseTokens = (tokens: ReadonlyArray<Token>): Either.Either<Document, ParseError> => {
  const state: ParserState = { tokens, index: 0 }
  const document: Document = new Map()
  let token = tokens[state.index]
  while (token !== undefined) {
    if (token._tag !== "Identifier") {
      return Either.left(
        parseError("ExpectedIdentifier", `Expected identifier at top level, found ${describeToken(token)}`, token.position)
      )
    }
    const name = token.text
    state.index += 1
    const equal = tokens[state.index]
    if (equal === undefined) {
      return Either.left(endOfInput(`'=' after ${name}`))
    }
    if (equal._tag !== "Equal") {
      return Either.left(unexpectedToken(equal, `'=' after ${name}`))
    }
    state.index += 1
    const value = parseValue(state)
    if (Either.isLeft(value)) {
      return Either.left(value.left)
    }
    document.set(name, value.right)
    token = tokens[state.index]
  }
  return Either.right(document)
}

/**
 * Tokenize and parse AST dump text.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseDocument = (input: string): Either.Either<Document, LexError | ParseError> =>
  Either.flatMap(tokenize(input), (tokens): Either.Either<Document, LexError | ParseError> => parseTokens(tokens))
