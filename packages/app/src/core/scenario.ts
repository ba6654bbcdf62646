import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Option from "effect/Option"

import type { TreeError } from "./errors.js"
import { treeError } from "./errors.js"
import type { DictionaryValue, Document, StringValue, Value } from "./value.js"
import { asArray, asDictionary, asString } from "./value.js"

// CHANGE: shared walk over ast → block_* → items → text → ja → line → string
// WHY: extract and merge must visit the same leaves in the same order
// FORMAT THEOREM: ∀d: leaves(d) is a deterministic sequence fixed by array order and Map insertion order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: collecting blocks and leaves never mutates the Document
// COMPLEXITY: O(n) where n = number of nodes under ast

export interface Block {
  readonly items: Array<Value>
}

const BLOCK_PREFIX = "block_"

const wrapperBlocks = (wrapper: DictionaryValue): ReadonlyArray<Block> =>
  [...wrapper.entries].flatMap(([id, block]) =>
    id.startsWith(BLOCK_PREFIX) && block._tag === "Array" ? [{ items: block.items }] : []
  )

/**
 * Locate every block item array under `ast`.
 *
 * @param document - Parsed script.
 * @returns Blocks in traversal order, or a TreeError when `ast` is missing or malformed.
 *
 * @pure true
 * @invariant entries whose key lacks the block_ prefix or whose value is not an Array are skipped
 * @complexity O(n) where n = number of block wrappers
 */
export const collectBlocks = (document: Document): Either.Either<ReadonlyArray<Block>, TreeError> => {
  const ast = document.get("ast")
  if (ast === undefined) {
    return Either.left(treeError("MissingField", "Document has no ast field"))
  }
  if (ast._tag !== "Array") {
    return Either.left(treeError("TypeMismatch", `ast must be an Array, found ${ast._tag}`))
  }
  const blocks: Array<Block> = []
  for (const [index, wrapper] of ast.items.entries()) {
    if (wrapper._tag !== "Dictionary") {
      return Either.left(treeError("TypeMismatch", `ast[${index}] must be a Dictionary, found ${wrapper._tag}`))
    }
    blocks.push(...wrapperBlocks(wrapper))
  }
  return Either.right(blocks)
}

/**
 * Same walk as collectBlocks, but a missing or malformed `ast` and non-Dictionary
 * wrappers contribute no blocks.
 *
 * @pure true
 */
export const reachableBlocks = (document: Document): ReadonlyArray<Block> =>
  pipe(
    Option.fromNullable(document.get("ast")),
    Option.flatMap(asArray),
    Option.match({
      onNone: (): ReadonlyArray<Block> => [],
      onSome: (ast) => ast.items.flatMap((wrapper) => Option.match(asDictionary(wrapper), {
        onNone: (): ReadonlyArray<Block> => [],
        onSome: wrapperBlocks
      }))
    })
  )

const arrayField = (value: Value, key: string): ReadonlyArray<Value> =>
  pipe(
    asDictionary(value),
    Option.flatMapNullable((dict) => dict.entries.get(key)),
    Option.flatMap(asArray),
    Option.match({
      onNone: (): ReadonlyArray<Value> => [],
      onSome: (field) => field.items
    })
  )

const lineLeaves = (line: Value): ReadonlyArray<StringValue> =>
  pipe(
    asArray(line),
    Option.match({
      onNone: (): ReadonlyArray<StringValue> => [],
      onSome: (entries) => entries.items.flatMap((entry) => Option.toArray(asString(entry)))
    })
  )

/**
 * Collect the scenario string leaves of the given blocks.
 *
 * @pure true
 * @invariant order: block, item, text block, ja line, position within the line
 * @complexity O(n)
 */
export const collectScenarioLeaves = (blocks: ReadonlyArray<Block>): ReadonlyArray<StringValue> =>
  blocks.flatMap((block) =>
    block.items.flatMap((item) =>
      arrayField(item, "text").flatMap((textBlock) => arrayField(textBlock, "ja").flatMap(lineLeaves))
    )
  )
