import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { extractScenario } from "../../src/core/extract.js"
import { mergeScenario } from "../../src/core/merge.js"
import { serializeDocument } from "../../src/core/serializer.js"
import { MORNING_LINES, MORNING_SCRIPT, parse, ONE_BLOCK_SCRIPT } from "./fixtures.js"

const failure = (source: string, lines: ReadonlyArray<string>) =>
  Either.getOrThrow(Either.flip(mergeScenario(parse(source), lines)))

describe("mergeScenario", () => {
  it.effect("replaces the single string of a one-block script", () =>
    Effect.sync(() => {
      const merged = Either.getOrThrow(mergeScenario(parse(ONE_BLOCK_SCRIPT), ["world"]))
      expect(Either.getOrThrow(extractScenario(merged))).toEqual(["world"])
    }))

  it.effect("writes lines back in traversal order", () =>
    Effect.sync(() => {
      const lines = ["早上好。", "第一行。", "第二行。"]
      const merged = Either.getOrThrow(mergeScenario(parse(MORNING_SCRIPT), lines))
      expect(Either.getOrThrow(extractScenario(merged))).toEqual(lines)
    }))

  it.effect("leaves everything but the scenario strings alone", () =>
    Effect.sync(() => {
      const document = parse(MORNING_SCRIPT)
      const merged = Either.getOrThrow(mergeScenario(document, MORNING_LINES))
      expect(serializeDocument(merged)).toBe(serializeDocument(parse(MORNING_SCRIPT)))
    }))

  it.effect("keeps a line with special characters readable after writing", () =>
    Effect.sync(() => {
      const merged = Either.getOrThrow(mergeScenario(parse(ONE_BLOCK_SCRIPT), ["say \"hi\"\\n"]))
      const reread = parse(serializeDocument(merged))
      expect(Either.getOrThrow(extractScenario(reread))).toEqual(["say \"hi\"\\n"])
    }))

  it.effect("fails when there are fewer lines than strings", () =>
    Effect.sync(() => {
      const error = failure(MORNING_SCRIPT, ["one", "two"])
      expect(error).toMatchObject({ _tag: "TreeError", reason: "ExhaustedInput" })
      expect(error.message).toBe("Ran out of lines: got 2, the document has 3 scenario strings")
    }))

  it.effect("fails when lines are left over", () =>
    Effect.sync(() => {
      const error = failure(ONE_BLOCK_SCRIPT, ["one", "two"])
      expect(error).toMatchObject({ reason: "UnusedInput" })
      expect(error.message).toBe("1 line(s) left unused: got 2, the document has 1 scenario strings")
    }))

  it.effect("does not touch the document when the counts differ", () =>
    Effect.sync(() => {
      const document = parse(MORNING_SCRIPT)
      expect(Either.isLeft(mergeScenario(document, ["only one"]))).toBe(true)
      expect(Either.getOrThrow(extractScenario(document))).toEqual(MORNING_LINES)
    }))

  it.effect("fails like extract on a document without ast", () =>
    Effect.sync(() => {
      expect(failure("astver = 2.0", [])).toMatchObject({ reason: "MissingField" })
    }))
})
