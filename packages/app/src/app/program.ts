import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs, CliCommand, CliOptions } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError, ScriptError } from "../core/errors.js"
import { inFile } from "../core/errors.js"
import { extractScenario } from "../core/extract.js"
import { mergeScenario } from "../core/merge.js"
import { parseDocument } from "../core/parser.js"
import { pruneDocument } from "../core/prune.js"
import { renderAppError, renderHelp, renderSummary } from "../core/report.js"
import { serializeDocument } from "../core/serializer.js"
import type { FileOutcome } from "../core/types.js"
import { documentsEqual } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readScenario, writeScenario } from "../shell/scenario-file.js"
import { ensureParentDirectory, listScripts, replaceExtension } from "../shell/scan.js"
import { readScript, writeScript } from "../shell/script-file.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0, 1, 2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: batch commands process files sequentially in sorted order; a failing file is reported, not fatal
// COMPLEXITY: O(n) over total input size

export interface ProgramResult {
  readonly outcomes: ReadonlyArray<FileOutcome>
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

type FileCommand = Exclude<CliCommand, { readonly _tag: "help" }>

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const inScript = <A>(file: string, result: Either.Either<A, ScriptError>): Effect.Effect<A, AppError> =>
  fromEither(Either.mapLeft(result, (error) => inFile(file, error)))

const extractFile = (input: string, output: string): Effect.Effect<FileOutcome, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const document = yield* _(readScript(input))
    const lines = yield* _(inScript(input, extractScenario(document)))
    yield* _(Effect.logDebug(`Collected ${lines.length} scenario strings from ${input}`))
    yield* _(writeScenario(output, lines))
    const outcome: FileOutcome = { type: "extracted", input, output, lines: lines.length }
    return outcome
  })

const pruneFile = (input: string, output: string): Effect.Effect<FileOutcome, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const document = yield* _(readScript(input))
    yield* _(writeScript(output, pruneDocument(document)))
    const outcome: FileOutcome = { type: "pruned", input, output }
    return outcome
  })

const mergeFile = (
  input: string,
  scenario: string,
  output: string
): Effect.Effect<FileOutcome, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const document = yield* _(readScript(input))
    const lines = yield* _(readScenario(scenario))
    const merged = yield* _(inScript(input, mergeScenario(document, lines)))
    yield* _(Effect.logDebug(`Replaced ${lines.length} scenario strings in ${input}`))
    yield* _(writeScript(output, merged))
    const outcome: FileOutcome = { type: "merged", input, scenario, output, lines: lines.length }
    return outcome
  })

const checkFile = (input: string): Effect.Effect<FileOutcome, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const document = yield* _(readScript(input))
    const reparsed = yield* _(inScript(input, parseDocument(serializeDocument(document))))
    const roundTrip = documentsEqual(document, reparsed)
    if (!roundTrip) {
      yield* _(Effect.logWarning(`${input} does not survive serialize -> parse unchanged`))
    }
    const outcome: FileOutcome = { type: "checked", input, roundTrip }
    return outcome
  })

// One broken script must not stop the rest of a batch.
const continueOnFailure = (
  input: string,
  run: Effect.Effect<FileOutcome, AppError, ProgramEnv>
): Effect.Effect<FileOutcome, never, ProgramEnv> =>
  run.pipe(
    Effect.catchAll((error) =>
      Effect.gen(function*(_) {
        yield* _(Effect.logError(renderAppError(error)))
        const outcome: FileOutcome = { type: "failed", input, error }
        return outcome
      })
    )
  )

const extractAll = (
  directory: string,
  config: ResolvedConfig
): Effect.Effect<ReadonlyArray<FileOutcome>, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const scripts = yield* _(listScripts(directory, config.scriptExtension))
    return yield* _(
      Effect.forEach(
        scripts,
        (script) =>
          continueOnFailure(
            script,
            extractFile(script, replaceExtension(path, script, config.scriptExtension, config.scenarioExtension))
          ),
        { concurrency: 1 }
      )
    )
  })

const mergeAll = (
  directory: string,
  outputDirectory: string,
  config: ResolvedConfig
): Effect.Effect<ReadonlyArray<FileOutcome>, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const scripts = yield* _(listScripts(directory, config.scriptExtension))
    return yield* _(
      Effect.forEach(
        scripts,
        (script) =>
          continueOnFailure(
            script,
            Effect.gen(function*(_) {
              const output = path.join(outputDirectory, path.relative(directory, script))
              yield* _(ensureParentDirectory(output))
              const scenario = replaceExtension(path, script, config.scriptExtension, config.translationExtension)
              return yield* _(mergeFile(script, scenario, output))
            })
          ),
        { concurrency: 1 }
      )
    )
  })

const executeCommand = (
  command: FileCommand,
  config: ResolvedConfig
): Effect.Effect<ReadonlyArray<FileOutcome>, AppError, ProgramEnv> =>
  Match.value(command).pipe(
    Match.when({ _tag: "extract" }, (command) => Effect.map(extractFile(command.input, command.output), (o) => [o])),
    Match.when({ _tag: "prune" }, (command) => Effect.map(pruneFile(command.input, command.output), (o) => [o])),
    Match.when(
      { _tag: "merge" },
      (command) => Effect.map(mergeFile(command.input, command.scenario, command.output), (o) => [o])
    ),
    Match.when({ _tag: "extract-all" }, (command) => extractAll(command.directory, config)),
    Match.when({ _tag: "merge-all" }, (command) => mergeAll(command.directory, command.outputDirectory, config)),
    Match.when({ _tag: "check" }, (command) => Effect.map(checkFile(command.input), (o) => [o])),
    Match.exhaustive
  )

const logLevelFor = (options: CliOptions): LogLevel.LogLevel => {
  if (options.silent) {
    return LogLevel.None
  }
  return options.verbose ? LogLevel.Debug : LogLevel.Info
}

const exitCodeFor = (outcomes: ReadonlyArray<FileOutcome>): number => {
  if (outcomes.some((outcome) => outcome.type === "failed")) {
    return 1
  }
  return outcomes.some((outcome) => outcome.type === "checked" && !outcome.roundTrip) ? 2 : 0
}

const runParsed = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    if (cli.command._tag === "help") {
      yield* _(writeStdout(renderHelp()))
      return { outcomes: [], exitCode: 0 }
    }
    const configFile = yield* _(loadConfigFile(cli.options.configPath, cli.options.configPathExplicit))
    const config = resolveConfig(cli.options, configFile)
    const outcomes = yield* _(executeCommand(cli.command, config))
    if (!cli.options.silent && outcomes.length > 0) {
      yield* _(writeStdout(renderSummary(outcomes)))
    }
    return { outcomes, exitCode: exitCodeFor(outcomes) }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with per-file outcomes and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Logger
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (argv: ReadonlyArray<string>): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(runParsed(cli).pipe(Logger.withMinimumLogLevel(logLevelFor(cli.options))))
  })
