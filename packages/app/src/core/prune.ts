import { reachableBlocks } from "./scenario.js"
import type { Document, Value } from "./value.js"

// CHANGE: reduce every block to its control-flow skeleton
// WHY: a release build ships the link structure without scenario content
// FORMAT THEOREM: ∀d: prune(prune(d)) ≅ prune(d) ∧ ∀item ∈ items(prune(d)): keys(item) ⊆ {linknext, line}
// PURITY: CORE (mutates the given Document)
// EFFECT: n/a
// INVARIANT: nothing above the item level (astver, block ids) is touched
// COMPLEXITY: O(n) where n = total items

export const RETAINED_ITEM_KEYS: ReadonlySet<string> = new Set(["linknext", "line"])

const pruneItem = (item: Value): boolean => {
  if (item._tag !== "Dictionary") {
    return false
  }
  for (const key of [...item.entries.keys()]) {
    if (!RETAINED_ITEM_KEYS.has(key)) {
      item.entries.delete(key)
    }
  }
  // an empty dictionary has no textual form
  return item.entries.size > 0
}

const pruneItems = (items: Array<Value>): void => {
  let kept = 0
  for (const item of items) {
    if (pruneItem(item)) {
      items[kept] = item
      kept += 1
    }
  }
  items.length = kept
}

/**
 * Strip every block item down to `linknext` and `line`, in place.
 *
 * @param document - Parsed script, mutated.
 * @returns The same Document; without a well-formed `ast` nothing is removed.
 *
 * @pure false
 * @invariant non-Dictionary items and emptied Dictionaries are removed
 * @complexity O(n)
 */
export const pruneDocument = (document: Document): Document => {
  for (const block of reachableBlocks(document)) {
    pruneItems(block.items)
  }
  return document
}
