import * as Either from "effect/Either"

import type { TreeError } from "./errors.js"
import { collectBlocks, collectScenarioLeaves } from "./scenario.js"
import type { Document } from "./value.js"

/**
 * List every scenario string of a Document in traversal order.
 *
 * @param document - Parsed script; not modified.
 * @returns Ordered strings, or MissingField / TypeMismatch when `ast` is absent or malformed.
 *
 * @pure true
 * @invariant extract(merge(d, l)) = l whenever merge succeeds
 * @complexity O(n)
 */
export const extractScenario = (document: Document): Either.Either<ReadonlyArray<string>, TreeError> =>
  Either.map(collectBlocks(document), (blocks) => collectScenarioLeaves(blocks).map((leaf) => leaf.value))
