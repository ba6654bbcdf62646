import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { fileError, inFile } from "../core/errors.js"
import { tokenize } from "../core/lexer.js"
import { parseTokens } from "../core/parser.js"
import { serializeDocument } from "../core/serializer.js"
import type { Document } from "../core/value.js"

// CHANGE: read and write AST dump files
// WHY: isolate filesystem IO from the pure parser and serializer
// PURITY: SHELL
// EFFECT: Effect<Document, AppError, FileSystem>
// INVARIANT: lex and parse failures are reported with the file they came from
// COMPLEXITY: O(n)

export const readScript = (path: string): Effect.Effect<Document, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const source = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const tokens = tokenize(source)
    if (Either.isLeft(tokens)) {
      return yield* _(Effect.fail(inFile(path, tokens.left)))
    }
    const parsed = parseTokens(tokens.right)
    if (Either.isLeft(parsed)) {
      return yield* _(Effect.fail(inFile(path, parsed.left)))
    }
    yield* _(Effect.logDebug(`Parsed ${path}: ${tokens.right.length} tokens, ${parsed.right.size} top-level entries`))
    return parsed.right
  })

export const writeScript = (
  path: string,
  document: Document
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, serializeDocument(document)).pipe(
        Effect.mapError((error) => fileError(String(error)))
      )
    )
    yield* _(Effect.logInfo(`Wrote ${path}`))
  })
