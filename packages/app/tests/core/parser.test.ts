import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseDocument } from "../../src/core/parser.js"
import { array, dictionary, float, integer, string } from "../../src/core/value.js"
import { parse, ONE_BLOCK_SCRIPT } from "./fixtures.js"

const failure = (input: string) => Either.getOrThrow(Either.flip(parseDocument(input)))

describe("parseDocument", () => {
  it.effect("reads top-level pairs in source order", () =>
    Effect.sync(() => {
      const document = parse(ONE_BLOCK_SCRIPT)
      expect([...document.keys()]).toEqual(["astver", "ast"])
      expect(document.get("astver")).toEqual(float(2))
    }))

  it.effect("builds block wrappers, items and nested text", () =>
    Effect.sync(() => {
      const document = parse(ONE_BLOCK_SCRIPT)
      expect(document.get("ast")).toEqual(
        array([
          dictionary([[
            "block_00000",
            array([
              array([string("x")]),
              dictionary([["text", array([dictionary([["ja", array([array([string("hello")])])]])])]]),
              dictionary([["line", integer(1n)]])
            ])
          ]])
        ])
      )
    }))

  it.effect("treats a bare identifier as a string", () =>
    Effect.sync(() => {
      expect(parse("x = a").get("x")).toEqual(string("a"))
      expect(parse("x = {a, b}").get("x")).toEqual(array([string("a"), string("b")]))
    }))

  it.effect("wraps `name = value` inside a value as a one-key dictionary", () =>
    Effect.sync(() => {
      expect(parse("x = {a = b}").get("x")).toEqual(array([dictionary([["a", string("b")]])]))
      expect(parse("x = {a = b = 1}").get("x")).toEqual(
        array([dictionary([["a", dictionary([["b", integer(1n)]])]])])
      )
    }))

  it.effect("skips leading, repeated and trailing commas in arrays", () =>
    Effect.sync(() => {
      expect(parse("x = {,1,,2,}").get("x")).toEqual(array([integer(1n), integer(2n)]))
      expect(parse("x = {}").get("x")).toEqual(array([]))
    }))

  it.effect("keeps the first position and the last value of a repeated key", () =>
    Effect.sync(() => {
      const document = parse("a = 1 b = 2 a = 3")
      expect([...document.keys()]).toEqual(["a", "b"])
      expect(document.get("a")).toEqual(integer(3n))
    }))

  it.effect("returns an empty document for empty input", () =>
    Effect.sync(() => {
      expect(parse("").size).toBe(0)
    }))
})

describe("parseDocument nesting", () => {
  const depth = 20000

  it.effect("reads arrays nested far deeper than the call stack allows", () =>
    Effect.sync(() => {
      let node = parse(`x = ${"{".repeat(depth)}${"}".repeat(depth)}`).get("x")
      let levels = 0
      while (node?._tag === "Array") {
        levels += 1
        node = node.items[0]
      }
      expect(levels).toBe(depth)
    }))

  it.effect("reads long `name = name = ...` chains", () =>
    Effect.sync(() => {
      let node = parse(`x = ${"a = ".repeat(depth)}1`).get("x")
      let levels = 0
      while (node?._tag === "Dictionary") {
        levels += 1
        node = node.entries.get("a")
      }
      expect(levels).toBe(depth)
      expect(node).toEqual(integer(1n))
    }))

  it.effect("reports deep unclosed arrays as a parse error", () =>
    Effect.sync(() => {
      expect(failure(`x = ${"{".repeat(depth)}`)).toMatchObject({ reason: "UnexpectedEndOfInput" })
    }))
})

describe("parseDocument failures", () => {
  it.effect("requires an identifier at top level", () =>
    Effect.sync(() => {
      const error = failure("= 1")
      expect(error._tag).toBe("ParseError")
      expect(error).toMatchObject({ reason: "ExpectedIdentifier", position: { line: 1, column: 1 } })
    }))

  it.effect("requires '=' after a top-level identifier", () =>
    Effect.sync(() => {
      expect(failure("x 1")).toMatchObject({ reason: "UnexpectedToken", position: { line: 1, column: 3 } })
    }))

  it.effect("reports the end of input instead of reading past the last token", () =>
    Effect.sync(() => {
      expect(failure("x")).toMatchObject({ reason: "UnexpectedEndOfInput" })
      expect(failure("x =")).toMatchObject({ reason: "UnexpectedEndOfInput" })
      expect(failure("x = {a")).toMatchObject({ reason: "UnexpectedEndOfInput" })
      expect(failure("x = a")).toMatchObject({ reason: "UnexpectedEndOfInput" })
      expect(failure("x = {1")).toMatchObject({ reason: "UnexpectedEndOfInput" })
    }))

  it.effect("rejects tokens that cannot start a value", () =>
    Effect.sync(() => {
      expect(failure("x = }")).toMatchObject({ reason: "UnexpectedToken" })
      expect(failure("x = {=}")).toMatchObject({ reason: "UnexpectedToken", position: { line: 1, column: 6 } })
    }))

  it.effect("passes lexer failures through", () =>
    Effect.sync(() => {
      expect(failure(`x = "open`)).toMatchObject({ _tag: "LexError", reason: "UnterminatedString" })
    }))
})
