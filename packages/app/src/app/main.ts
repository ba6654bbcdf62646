#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderAppError } from "../core/report.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult, 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: failures are rendered once to stderr
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const exitCode = yield* _(
    runCli(process.argv).pipe(
      Effect.map((result) => result.exitCode),
      Effect.catchAll((error) =>
        Effect.sync(() => {
          process.stderr.write(`${renderAppError(error)}\n`)
          return 1
        })
      )
    )
  )
  if (exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = exitCode
      })
    )
  }
})

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
