import * as Either from "effect/Either"

import type { LexError, Position } from "./errors.js"
import { lexError } from "./errors.js"

// CHANGE: tokenize AST dump text into a flat token sequence
// WHY: the parser works on tokens, never on raw characters
// FORMAT THEOREM: ∀s: tokenize(s) = Right(ts) → concat(render(ts)) ≡ s modulo whitespace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every token carries the position of its first character
// COMPLEXITY: O(n) where n = input length in code points

export type Token =
  | { readonly _tag: "Equal"; readonly position: Position }
  | { readonly _tag: "OpenBrace"; readonly position: Position }
  | { readonly _tag: "CloseBrace"; readonly position: Position }
  | { readonly _tag: "Comma"; readonly position: Position }
  | { readonly _tag: "Identifier"; readonly text: string; readonly position: Position }
  | { readonly _tag: "StringLiteral"; readonly text: string; readonly position: Position }
  | { readonly _tag: "IntegerLiteral"; readonly value: bigint; readonly position: Position }
  | { readonly _tag: "FloatLiteral"; readonly value: number; readonly position: Position }

type PunctuationTag = "Equal" | "OpenBrace" | "CloseBrace" | "Comma"

const punctuation: ReadonlyMap<string, PunctuationTag> = new Map([
  ["=", "Equal"],
  ["{", "OpenBrace"],
  ["}", "CloseBrace"],
  [",", "Comma"]
])

/** Character after a backslash inside a string literal → decoded character. */
export const escapeSequences: ReadonlyMap<string, string> = new Map([
  ["n", "\n"],
  ["t", "\t"],
  ["\"", "\""],
  ["\\", "\\"]
])

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const whitespacePattern = /^[\p{White_Space}\uFEFF]$/u
const identifierPattern = /^[\p{Alphabetic}\p{N}_]$/u
const floatPattern = /^-?[0-9]+\.[0-9]*$/u

interface Cursor {
  readonly chars: ReadonlyArray<string>
  index: number
  line: number
  column: number
}

const positionOf = (cursor: Cursor): Position => ({ line: cursor.line, column: cursor.column })

const peek = (cursor: Cursor): string | undefined => cursor.chars[cursor.index]

const advance = (cursor: Cursor): string | undefined => {
  const char = cursor.chars[cursor.index]
  if (char === undefined) {
    return undefined
  }
  cursor.index += 1
  if (char === "\n") {
    cursor.line += 1
    cursor.column = 1
  } else {
    cursor.column += 1
  }
  return char
}

const isAsciiDigit = (char: string | undefined): boolean => char !== undefined && char >= "0" && char <= "9"

const isIdentifierChar = (char: string | undefined): boolean => char !== undefined && identifierPattern.test(char)

const readString = (cursor: Cursor, start: Position): Either.Either<Token, LexError> => {
  let text = ""
  let char = advance(cursor)
  while (char !== undefined) {
    if (char === "\"") {
      const token: Token = { _tag: "StringLiteral", text, position: start }
      return Either.right(token)
    }
    if (char === "\\") {
      const escapeAt = { line: cursor.line, column: cursor.column - 1 }
      const escaped = advance(cursor)
      if (escaped === undefined) {
        return Either.left(lexError("IncompleteEscape", "Incomplete escape sequence at end of input", escapeAt))
      }
      const decoded = escapeSequences.get(escaped)
      if (decoded === undefined) {
        return Either.left(lexError("UnknownEscape", `Unknown escape sequence \\${escaped}`, escapeAt))
      }
      text += decoded
    } else {
      text += char
    }
    char = advance(cursor)
  }
  return Either.left(lexError("UnterminatedString", "Unterminated string literal", start))
}

const toNumberToken = (text: string, start: Position): Either.Either<Token, LexError> => {
  if (text.includes(".")) {
    if (!floatPattern.test(text)) {
      return Either.left(lexError("NumberFormat", `Malformed float literal: ${text}`, start))
    }
    const token: Token = { _tag: "FloatLiteral", value: Number(text), position: start }
    return Either.right(token)
  }
  const value = BigInt(text)
  if (value < INT64_MIN || value > INT64_MAX) {
    return Either.left(lexError("NumberFormat", `Integer literal out of 64-bit range: ${text}`, start))
  }
  const token: Token = { _tag: "IntegerLiteral", value, position: start }
  return Either.right(token)
}

const readNumber = (cursor: Cursor, first: string, start: Position): Either.Either<Token, LexError> => {
  let text = first
  let next = peek(cursor)
  while (next === "." || isAsciiDigit(next)) {
    text += advance(cursor) ?? ""
    next = peek(cursor)
  }
  return toNumberToken(text, start)
}

const readIdentifier = (cursor: Cursor, first: string, start: Position): Token => {
  let text = first
  while (isIdentifierChar(peek(cursor))) {
    text += advance(cursor) ?? ""
  }
  return { _tag: "Identifier", text, position: start }
}

const nextToken = (cursor: Cursor): Either.Either<Token | undefined, LexError> => {
  const start = positionOf(cursor)
  const char = advance(cursor)
  if (char === undefined || whitespacePattern.test(char)) {
    return Either.right(undefined)
  }
  const tag = punctuation.get(char)
  if (tag !== undefined) {
    const token: Token = { _tag: tag, position: start }
    return Either.right(token)
  }
  if (char === "\"") {
    return readString(cursor, start)
  }
  if (isAsciiDigit(char) || (char === "-" && isAsciiDigit(peek(cursor)))) {
    return readNumber(cursor, char, start)
  }
  if (isIdentifierChar(char)) {
    return Either.right(readIdentifier(cursor, char, start))
  }
  return Either.left(lexError("UnexpectedCharacter", `Unexpected character ${JSON.stringify(char)}`, start))
}

/**
 * Split AST dump text into tokens.
 *
 * @param input - Full file contents.
 * @returns Either with the token sequence or the first LexError.
 *
 * @pure true
 * @invariant numeric detection wins over identifiers for ASCII digits and `-digit`
 * @complexity O(n)
 */
export const tokenize = (input: string): Either.Either<ReadonlyArray<Token>, LexError> => {
  const cursor: Cursor = { chars: Array.from(input), index: 0, line: 1, column: 1 }
  const tokens: Array<Token> = []
  while (cursor.index < cursor.chars.length) {
    const next = nextToken(cursor)
    if (Either.isLeft(next)) {
      return Either.left(next.left)
    }
    if (next.right !== undefined) {
      tokens.push(next.right)
    }
  }
  return Either.right(tokens)
}

/** Short human-readable form of a token for error messages. */
export const describeToken = (token: Token): string => {
  switch (token._tag) {
    case "Equal":
      return "'='"
    case "OpenBrace":
      return "'{'"
    case "CloseBrace":
      return "'}'"
    case "Comma":
      return "','"
    case "Identifier":
      return `identifier ${token.text}`
    case "StringLiteral":
      return `string ${JSON.stringify(token.text)}`
    case "IntegerLiteral":
      return `integer ${token.value.toString()}`
    case "FloatLiteral":
      return `float ${String(token.value)}`
  }
}
