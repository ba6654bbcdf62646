import { escapeSequences } from "./lexer.js"
import type { Document, Value } from "./value.js"

// CHANGE: render a Value tree back to AST dump text
// WHY: pruned and merged documents are written in the format the engine reads
// FORMAT THEOREM: ∀d: parseDocument(serializeDocument(d)) ≅ d (structural equality)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: string escaping is the exact inverse of the lexer's escape table
// COMPLEXITY: O(n) where n = number of nodes

const INDENT = "\t"

const escapedCharacters: ReadonlyMap<string, string> = new Map(
  [...escapeSequences].map(([code, char]) => [char, `\\${code}`])
)

const escapeString = (text: string): string => Array.from(text, (char) => escapedCharacters.get(char) ?? char).join("")

const exponentPattern = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/u

// Number#toString switches to exponent notation below 1e-6, which the lexer cannot read.
const toPlainDecimal = (value: number): string => {
  const text = String(value)
  const match = exponentPattern.exec(text)
  if (match === null) {
    return text
  }
  const [, sign = "", lead = "", fraction = "", exponentText = "0"] = match
  const digits = lead + fraction
  const exponent = Number(exponentText)
  if (exponent < 0) {
    return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`
  }
  const pointIndex = exponent + 1
  return digits.length > pointIndex
    ? `${sign}${digits.slice(0, pointIndex)}.${digits.slice(pointIndex)}`
    : `${sign}${digits.padEnd(pointIndex, "0")}`
}

/**
 * Render a float the way the dump writes them: `2.0` for integral values,
 * the shortest round-trip decimal otherwise.
 *
 * @pure true
 */
export const formatFloat = (value: number): string => {
  if (Number.isInteger(value)) {
    return Object.is(value, -0) ? "-0.0" : `${BigInt(value).toString()}.0`
  }
  return toPlainDecimal(value)
}

// Pending output: literal text, or a value still to render at an indentation depth.
type Chunk = string | { readonly value: Value; readonly indentLevel: number }

const expand = (value: Value, indentLevel: number): ReadonlyArray<Chunk> => {
  const indent = INDENT.repeat(indentLevel)
  const nextIndent = INDENT.repeat(indentLevel + 1)
  switch (value._tag) {
    case "String":
      return [`"${escapeString(value.value)}"`]
    case "Float":
      return [formatFloat(value.value)]
    case "Integer":
      return [value.value.toString()]
    case "Array": {
      if (value.items.length === 0) {
        return ["{}"]
      }
      const chunks: Array<Chunk> = [`{\n${nextIndent}`]
      for (const [index, item] of value.items.entries()) {
        if (index > 0) {
          chunks.push(`,\n${nextIndent}`)
        }
        chunks.push({ value: item, indentLevel: indentLevel + 1 })
      }
      chunks.push(`\n${indent}}`)
      return chunks
    }
    case "Dictionary": {
      const chunks: Array<Chunk> = [`\n${nextIndent}`]
      let first = true
      for (const [key, entry] of value.entries) {
        if (!first) {
          chunks.push(`,\n${nextIndent}`)
        }
        first = false
        chunks.push(`${key}=`, { value: entry, indentLevel: indentLevel + 1 })
      }
      chunks.push(`\n${indent}`)
      return chunks
    }
  }
}

/**
 * Render one value at the given indentation depth (tabs).
 *
 * @pure true
 * @invariant empty arrays render as `{}`; dictionaries render as `key=value` lines
 * @invariant nesting depth does not consume call stack
 * @complexity O(n)
 */
export const serializeValue = (value: Value, indentLevel: number): string => {
  const parts: Array<string> = []
  const pending: Array<Chunk> = [{ value, indentLevel }]
  for (let chunk = pending.pop(); chunk !== undefined; chunk = pending.pop()) {
    if (typeof chunk === "string") {
      parts.push(chunk)
      continue
    }
    const expanded = expand(chunk.value, chunk.indentLevel)
    for (let index = expanded.length - 1; index >= 0; index -= 1) {
      const next = expanded[index]
      if (next !== undefined) {
        pending.push(next)
      }
    }
  }
  return parts.join("")
}

/**
 * Render a whole Document, one `key = value` pair per top-level entry.
 *
 * @pure true
 * @invariant pairs appear in Document insertion order
 * @complexity O(n)
 */
export const serializeDocument = (document: Document): string =>
  [...document].map(([key, value]) => `${key} = ${serializeValue(value, 0)}\n`).join("")
