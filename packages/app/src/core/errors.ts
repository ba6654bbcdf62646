import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for lexing, parsing, tree algorithms and the CLI
// WHY: provide typed failures for program flow and exit codes
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; reasons are unique within a tag
// COMPLEXITY: O(1)/O(1)

export interface Position {
  readonly line: number
  readonly column: number
}

export type LexErrorReason =
  | "UnknownEscape"
  | "IncompleteEscape"
  | "UnterminatedString"
  | "UnexpectedCharacter"
  | "NumberFormat"

export type ParseErrorReason = "ExpectedIdentifier" | "UnexpectedToken" | "UnexpectedEndOfInput"

export type TreeErrorReason = "MissingField" | "TypeMismatch" | "ExhaustedInput" | "UnusedInput"

export type LexError = {
  readonly _tag: "LexError"
  readonly reason: LexErrorReason
  readonly message: string
  readonly position: Position
}

export type ParseError = {
  readonly _tag: "ParseError"
  readonly reason: ParseErrorReason
  readonly message: string
  readonly position: Position | undefined
}

export type TreeError = {
  readonly _tag: "TreeError"
  readonly reason: TreeErrorReason
  readonly message: string
}

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ScenarioFileError = { readonly _tag: "ScenarioFileError"; readonly file: string; readonly message: string }
export type NoScriptsFound = { readonly _tag: "NoScriptsFound"; readonly directory: string; readonly extension: string }

export type ScriptError = LexError | ParseError | TreeError

export type InFile = {
  readonly _tag: "InFile"
  readonly file: string
  readonly error: ScriptError
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ScenarioFileError
  | NoScriptsFound
  | ScriptError
  | InFile

export const lexError = (reason: LexErrorReason, message: string, position: Position): LexError => ({
  _tag: "LexError",
  reason,
  message,
  position
})

export const parseError = (
  reason: ParseErrorReason,
  message: string,
  position: Position | undefined
): ParseError => ({
  _tag: "ParseError",
  reason,
  message,
  position
})

export const treeError = (reason: TreeErrorReason, message: string): TreeError => ({
  _tag: "TreeError",
  reason,
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const scenarioFileError = (file: string, message: string): ScenarioFileError => ({
  _tag: "ScenarioFileError",
  file,
  message
})

export const noScriptsFound = (directory: string, extension: string): NoScriptsFound => ({
  _tag: "NoScriptsFound",
  directory,
  extension
})

export const inFile = (file: string, error: ScriptError): InFile => ({
  _tag: "InFile",
  file,
  error
})
