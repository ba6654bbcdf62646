import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { pruneDocument } from "../../src/core/prune.js"
import { serializeDocument } from "../../src/core/serializer.js"
import { array, dictionary, document, documentsEqual, integer, string } from "../../src/core/value.js"
import { MORNING_SCRIPT, parse, ONE_BLOCK_SCRIPT } from "./fixtures.js"

const prune = (source: string) => pruneDocument(parse(source))

describe("pruneDocument", () => {
  it.effect("reduces a one-block script to its line number", () =>
    Effect.sync(() => {
      expect(serializeDocument(prune(ONE_BLOCK_SCRIPT))).toBe(
        "astver = 2.0\nast = {\n\t\n\t\tblock_00000={\n\t\t\t\n\t\t\t\tline=1\n\t\t\t\n\t\t}\n\t\n}\n"
      )
    }))

  it.effect("keeps linknext and line items of every block", () =>
    Effect.sync(() => {
      const expected = parse(
        `astver = 2.0 ast = {block_00000 = {linknext = "block_00001", line = 12}, block_00001 = {line = 20}}`
      )
      expect(documentsEqual(prune(MORNING_SCRIPT), expected)).toBe(true)
    }))

  it.effect("drops other keys from an item that also holds a retained one", () =>
    Effect.sync(() => {
      const input = document([[
        "ast",
        array([dictionary([[
          "block_1",
          array([dictionary([["linknext", string("block_2")], ["text", array([])], ["line", integer(4n)]])])
        ]])])
      ]])
      const expected = document([[
        "ast",
        array([dictionary([[
          "block_1",
          array([dictionary([["linknext", string("block_2")], ["line", integer(4n)]])])
        ]])])
      ]])
      expect(documentsEqual(pruneDocument(input), expected)).toBe(true)
    }))

  it.effect("is idempotent", () =>
    Effect.sync(() => {
      const once = prune(MORNING_SCRIPT)
      const text = serializeDocument(once)
      const twice = pruneDocument(once)
      expect(serializeDocument(twice)).toBe(text)
    }))

  it.effect("leaves top-level pairs and non-block wrappers alone", () =>
    Effect.sync(() => {
      const pruned = prune(`astver = 2.0 ast = {label_x = {{"fg"}, text = 1}} extra = {{"keep"}}`)
      expect(serializeDocument(pruned)).toBe(
        serializeDocument(parse(`astver = 2.0 ast = {label_x = {{"fg"}, text = 1}} extra = {{"keep"}}`))
      )
    }))

  it.effect("returns a document without ast unchanged", () =>
    Effect.sync(() => {
      expect(serializeDocument(prune("astver = 2.0 title = {\"x\"}"))).toBe("astver = 2.0\ntitle = {\n\t\"x\"\n}\n")
      expect(serializeDocument(prune("ast = 7"))).toBe("ast = 7\n")
    }))

  it.effect("skips wrappers that are not dictionaries and prunes the rest", () =>
    Effect.sync(() => {
      const pruned = prune(`ast = {5, block_1 = {{"x"}, line = 1}}`)
      expect(documentsEqual(pruned, parse("ast = {5, block_1 = {line = 1}}"))).toBe(true)
    }))
})
