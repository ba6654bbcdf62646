import * as Either from "effect/Either"

import type { TreeError } from "./errors.js"
import { treeError } from "./errors.js"
import { collectBlocks, collectScenarioLeaves } from "./scenario.js"
import type { Document } from "./value.js"

// CHANGE: write an ordered list of translated lines back into the scenario leaves
// WHY: a translated list becomes a script with the source structure
// FORMAT THEOREM: ∀d,l: |l| = |extract(d)| → extract(merge(d, l)) = l
// PURITY: CORE (mutates the given Document)
// EFFECT: n/a
// INVARIANT: on failure the Document is left untouched
// COMPLEXITY: O(n)

/**
 * Overwrite scenario leaves in place with `lines`, in traversal order.
 *
 * @param document - Parsed script, mutated on success.
 * @param lines - Replacement strings, one per leaf.
 * @returns The same Document, or ExhaustedInput / UnusedInput when counts differ.
 *
 * @pure false
 * @invariant counts must match exactly
 * @complexity O(n)
 */
export const mergeScenario = (
  document: Document,
  lines: ReadonlyArray<string>
): Either.Either<Document, TreeError> =>
  Either.flatMap(collectBlocks(document), (blocks): Either.Either<Document, TreeError> => {
    const leaves = collectScenarioLeaves(blocks)
    if (lines.length < leaves.length) {
      return Either.left(
        treeError(
          "ExhaustedInput",
          `Ran out of lines: got ${lines.length}, the document has ${leaves.length} scenario strings`
        )
      )
    }
    if (lines.length > leaves.length) {
      return Either.left(
        treeError(
          "UnusedInput",
          `${lines.length - leaves.length} line(s) left unused: got ${lines.length}, the document has ${leaves.length} scenario strings`
        )
      )
    }
    for (const [index, leaf] of leaves.entries()) {
      const line = lines[index]
      if (line !== undefined) {
        leaf.value = line
      }
    }
    return Either.right(document)
  })
