import type { PlatformError } from "@effect/platform/Error"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError, noScriptsFound } from "../core/errors.js"

// CHANGE: list script files under a directory for the batch commands
// WHY: extract-all / merge-all walk a whole game data folder
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, AppError, FileSystem | Path>
// INVARIANT: result is sorted and non-empty
// COMPLEXITY: O(n log n) where n = directory entries

const mapFsError = (error: PlatformError): AppError => fileError(String(error))

const ensureDirectoryExists = (
  fs: FileSystemService,
  directory: string
): Effect.Effect<void, AppError> =>
  Effect.gen(function*(_) {
    const exists = yield* _(fs.exists(directory).pipe(Effect.mapError(mapFsError)))
    if (!exists) {
      return yield* _(Effect.fail(fileError(`Directory not found: ${directory}`)))
    }
  })

export const listScripts = (
  directory: string,
  extension: string
): Effect.Effect<ReadonlyArray<string>, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    yield* _(ensureDirectoryExists(fs, directory))
    const entries = yield* _(fs.readDirectory(directory, { recursive: true }).pipe(Effect.mapError(mapFsError)))
    const scripts = entries
      .filter((entry) => entry.endsWith(extension))
      .map((entry) => path.join(directory, entry))
      .toSorted((left, right) => left.localeCompare(right))
    if (scripts.length === 0) {
      return yield* _(Effect.fail(noScriptsFound(directory, extension)))
    }
    yield* _(Effect.logDebug(`Found ${scripts.length} ${extension} files under ${directory}`))
    return scripts
  })

export const replaceExtension = (path: PathService, file: string, from: string, to: string): string =>
  path.join(path.dirname(file), `${path.basename(file, from)}${to}`)

export const ensureParentDirectory = (file: string): Effect.Effect<void, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    yield* _(fs.makeDirectory(path.dirname(file), { recursive: true }).pipe(Effect.mapError(mapFsError)))
  })
