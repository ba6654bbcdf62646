import * as Option from "effect/Option"

// CHANGE: define the tree value model for parsed AST dumps
// WHY: every stage (parser, serializer, tree algorithms) shares one closed union
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Integer, Float, String, Array, Dictionary}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Dictionary and Document iterate in insertion order
// COMPLEXITY: O(1) per constructor, O(n) for equals

export interface IntegerValue {
  readonly _tag: "Integer"
  readonly value: bigint
}

export interface FloatValue {
  readonly _tag: "Float"
  readonly value: number
}

export interface StringValue {
  readonly _tag: "String"
  value: string
}

export interface ArrayValue {
  readonly _tag: "Array"
  readonly items: Array<Value>
}

export interface DictionaryValue {
  readonly _tag: "Dictionary"
  readonly entries: Map<string, Value>
}

export type Value = IntegerValue | FloatValue | StringValue | ArrayValue | DictionaryValue

/** Top-level `key = value` pairs of a script file. */
export type Document = Map<string, Value>

export const integer = (value: bigint): IntegerValue => ({ _tag: "Integer", value })

export const float = (value: number): FloatValue => ({ _tag: "Float", value })

export const string = (value: string): StringValue => ({ _tag: "String", value })

export const array = (items: Iterable<Value>): ArrayValue => ({ _tag: "Array", items: [...items] })

export const dictionary = (entries: Iterable<readonly [string, Value]>): DictionaryValue => ({
  _tag: "Dictionary",
  entries: new Map(entries)
})

export const document = (entries: Iterable<readonly [string, Value]>): Document => new Map(entries)

export const asArray = (value: Value): Option.Option<ArrayValue> =>
  value._tag === "Array" ? Option.some(value) : Option.none()

export const asDictionary = (value: Value): Option.Option<DictionaryValue> =>
  value._tag === "Dictionary" ? Option.some(value) : Option.none()

export const asString = (value: Value): Option.Option<StringValue> =>
  value._tag === "String" ? Option.some(value) : Option.none()

type Pair = readonly [Value, Value]

const queueEntries = (
  left: ReadonlyMap<string, Value>,
  right: ReadonlyMap<string, Value>,
  pending: Array<Pair>
): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, value] of left) {
    const other = right.get(key)
    if (other === undefined) {
      return false
    }
    pending.push([value, other])
  }
  return true
}

// Compares one node and queues its children.
const matchNode = (left: Value, right: Value, pending: Array<Pair>): boolean => {
  switch (left._tag) {
    case "Integer":
      return right._tag === "Integer" && left.value === right.value
    case "Float":
      return right._tag === "Float" && Object.is(left.value, right.value)
    case "String":
      return right._tag === "String" && left.value === right.value
    case "Array": {
      if (right._tag !== "Array" || left.items.length !== right.items.length) {
        return false
      }
      for (const [index, item] of left.items.entries()) {
        const other = right.items[index]
        if (other === undefined) {
          return false
        }
        pending.push([item, other])
      }
      return true
    }
    case "Dictionary":
      return right._tag === "Dictionary" && queueEntries(left.entries, right.entries, pending)
  }
}

const drain = (pending: Array<Pair>): boolean => {
  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    if (!matchNode(pair[0], pair[1], pending)) {
      return false
    }
  }
  return true
}

/**
 * Structural equality over values.
 *
 * @pure true
 * @invariant dictionary key order is ignored, array order is not
 * @complexity O(n) where n = number of nodes
 */
export const equals = (left: Value, right: Value): boolean => drain([[left, right]])

export const documentsEqual = (left: Document, right: Document): boolean => {
  const pending: Array<Pair> = []
  return queueEntries(left, right, pending) && drain(pending)
}
