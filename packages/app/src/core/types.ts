import type { AppError } from "./errors.js"

// CHANGE: define per-file outcomes reported by every CLI command
// WHY: keep IO-free data structures reusable across commands and tests
// PURITY: CORE
// INVARIANT: outcome.type ∈ {"extracted","pruned","merged","checked","failed"}

export type FileOutcome =
  | { readonly type: "extracted"; readonly input: string; readonly output: string; readonly lines: number }
  | { readonly type: "pruned"; readonly input: string; readonly output: string }
  | {
    readonly type: "merged"
    readonly input: string
    readonly scenario: string
    readonly output: string
    readonly lines: number
  }
  | { readonly type: "checked"; readonly input: string; readonly roundTrip: boolean }
  | { readonly type: "failed"; readonly input: string; readonly error: AppError }
