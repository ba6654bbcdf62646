import { Match } from "effect"

import { usageLines } from "./cli.js"
import type { AppError, Position, ScriptError } from "./errors.js"
import type { FileOutcome } from "./types.js"

// CHANGE: render command outcomes, help text and errors for the terminal
// WHY: keep reporting pure and deterministic across CLI modes
// FORMAT THEOREM: ∀e ∈ AppError: render(e) is a single non-empty line block
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: script errors are prefixed with file:line:column when known
// COMPLEXITY: O(n)

const locate = (file: string | undefined, position: Position | undefined): string => {
  const parts = [
    ...(file === undefined ? [] : [file]),
    ...(position === undefined ? [] : [`${position.line}:${position.column}`])
  ]
  return parts.length === 0 ? "" : `${parts.join(":")}: `
}

const renderScriptError = (error: ScriptError, file: string | undefined): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "LexError" }, (value) => `${locate(file, value.position)}[LexError/${value.reason}] ${value.message}`),
    Match.when(
      { _tag: "ParseError" },
      (value) => `${locate(file, value.position)}[ParseError/${value.reason}] ${value.message}`
    ),
    Match.when({ _tag: "TreeError" }, (value) => `${locate(file, undefined)}[TreeError/${value.reason}] ${value.message}`),
    Match.exhaustive
  )

const renderUsage = (): ReadonlyArray<string> => ["Usage:", ...usageLines.map((line) => `  ${line}`)]

/**
 * Render an error for stderr.
 *
 * @pure true
 * @invariant every AppError tag is handled
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "CliError" }, (value) => [value.message, "", ...renderUsage()].join("\n")),
    Match.when({ _tag: "ConfigError" }, (value) => `[ConfigError] ${value.message}`),
    Match.when({ _tag: "FileError" }, (value) => `[FileError] ${value.message}`),
    Match.when({ _tag: "ScenarioFileError" }, (value) => `${value.file}: [ScenarioFileError] ${value.message}`),
    Match.when(
      { _tag: "NoScriptsFound" },
      (value) => `[NoScriptsFound] No *${value.extension} files under ${value.directory}`
    ),
    Match.when({ _tag: "InFile" }, (value) => renderScriptError(value.error, value.file)),
    Match.when({ _tag: "LexError" }, (value) => renderScriptError(value, undefined)),
    Match.when({ _tag: "ParseError" }, (value) => renderScriptError(value, undefined)),
    Match.when({ _tag: "TreeError" }, (value) => renderScriptError(value, undefined)),
    Match.exhaustive
  )

export const renderHelp = (): string =>
  [
    ...renderUsage(),
    "",
    "Options:",
    "  --config <path>            config file (default ./.artemis-ast.json)",
    "  --script-ext <ext>         script extension for batch commands (default .ast)",
    "  --scenario-ext <ext>       list written by extract-all (default .yaml)",
    "  --translation-ext <ext>    list read by merge-all (default .cn)",
    "  --verbose                  debug logging",
    "  --silent                   no logging, no summary"
  ].join("\n")

const formatOutcome = (outcome: FileOutcome): string =>
  Match.value(outcome).pipe(
    Match.when({ type: "extracted" }, (value) => `extracted ${value.lines} lines: ${value.input} -> ${value.output}`),
    Match.when({ type: "pruned" }, (value) => `pruned: ${value.input} -> ${value.output}`),
    Match.when(
      { type: "merged" },
      (value) => `merged ${value.lines} lines: ${value.input} + ${value.scenario} -> ${value.output}`
    ),
    Match.when(
      { type: "checked" },
      (value) => value.roundTrip ? `round-trip ok: ${value.input}` : `round-trip mismatch: ${value.input}`
    ),
    Match.when({ type: "failed" }, (value) =>
      value.error._tag === "InFile"
        ? `failed: ${renderAppError(value.error)}`
        : `failed: ${value.input}: ${renderAppError(value.error)}`),
    Match.exhaustive
  )

/**
 * Render one summary line per processed file.
 *
 * @pure true
 * @invariant lines follow processing order
 */
export const renderSummary = (outcomes: ReadonlyArray<FileOutcome>): string =>
  outcomes.map((outcome) => formatOutcome(outcome)).join("\n")
