export * from "./core/errors.js"
export { extractScenario } from "./core/extract.js"
export { describeToken, escapeSequences, tokenize } from "./core/lexer.js"
export type { Token } from "./core/lexer.js"
export { mergeScenario } from "./core/merge.js"
export { parseDocument, parseTokens } from "./core/parser.js"
export { pruneDocument, RETAINED_ITEM_KEYS } from "./core/prune.js"
export { collectBlocks, collectScenarioLeaves, reachableBlocks } from "./core/scenario.js"
export type { Block } from "./core/scenario.js"
export { formatFloat, serializeDocument, serializeValue } from "./core/serializer.js"
export * from "./core/value.js"
