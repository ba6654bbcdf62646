import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import { dump, load } from "js-yaml"

import type { AppError } from "../core/errors.js"
import { fileError, scenarioFileError } from "../core/errors.js"

// CHANGE: encode and decode the ordered scenario list as a YAML sequence
// WHY: translators edit a flat list; merge reads it back in the same order
// FORMAT THEOREM: ∀l: decode(encode(l)) = l
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, AppError, FileSystem>
// INVARIANT: only a sequence of strings decodes successfully
// COMPLEXITY: O(n)

const ScenarioSchema = S.Array(S.String)

/**
 * Render scenario lines as a YAML block sequence without line folding.
 *
 * @pure true
 */
export const encodeScenario = (lines: ReadonlyArray<string>): string => dump([...lines], { lineWidth: -1 })

/**
 * Decode YAML text into scenario lines.
 *
 * @param file - Source path, used in error messages.
 * @param raw - YAML text.
 */
export const decodeScenario = (file: string, raw: string): Effect.Effect<ReadonlyArray<string>, AppError> =>
  pipe(
    Effect.try({
      try: (): unknown => load(raw),
      catch: (error) => scenarioFileError(file, String(error))
    }),
    Effect.flatMap((value) =>
      S.decodeUnknown(ScenarioSchema)(value).pipe(
        Effect.mapError((error) => scenarioFileError(file, TreeFormatter.formatErrorSync(error)))
      )
    )
  )

export const readScenario = (
  path: string
): Effect.Effect<ReadonlyArray<string>, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const lines = yield* _(decodeScenario(path, raw))
    yield* _(Effect.logDebug(`Read ${lines.length} scenario lines from ${path}`))
    return lines
  })

export const writeScenario = (
  path: string,
  lines: ReadonlyArray<string>
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, encodeScenario(lines)).pipe(
        Effect.mapError((error) => fileError(String(error)))
      )
    )
    yield* _(Effect.logInfo(`Wrote ${lines.length} scenario lines to ${path}`))
  })
