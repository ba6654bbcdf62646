import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for artemis-ast
// WHY: keep CLI decoding pure and testable at the boundary
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → |positionals| = arity(args.command)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and wrong positional counts are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand =
  | { readonly _tag: "extract"; readonly input: string; readonly output: string }
  | { readonly _tag: "prune"; readonly input: string; readonly output: string }
  | { readonly _tag: "merge"; readonly input: string; readonly scenario: string; readonly output: string }
  | { readonly _tag: "extract-all"; readonly directory: string }
  | { readonly _tag: "merge-all"; readonly directory: string; readonly outputDirectory: string }
  | { readonly _tag: "check"; readonly input: string }
  | { readonly _tag: "help" }

export type CommandName = CliCommand["_tag"]

export interface CliOptions {
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly scriptExtension: string | undefined
  readonly scenarioExtension: string | undefined
  readonly translationExtension: string | undefined
  readonly verbose: boolean
  readonly silent: boolean
}

export interface CliArgs {
  readonly command: CliCommand
  readonly options: CliOptions
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

export const DEFAULT_CONFIG_PATH = "./.artemis-ast.json"

const defaultOptions: CliOptions = {
  configPath: DEFAULT_CONFIG_PATH,
  configPathExplicit: false,
  scriptExtension: undefined,
  scenarioExtension: undefined,
  translationExtension: undefined,
  verbose: false,
  silent: false
}

const usageOf: Record<CommandName, string> = {
  extract: "extract <input.ast> <output.yaml>",
  prune: "prune <input.ast> <output.ast>",
  merge: "merge <input.ast> <scenario.yaml> <output.ast>",
  "extract-all": "extract-all <directory>",
  "merge-all": "merge-all <directory> <output-directory>",
  check: "check <input.ast>",
  help: "help"
}

export const usageLines: ReadonlyArray<string> = Object.values(usageOf).map((usage) => `artemis-ast ${usage}`)

const expectArity = (
  name: CommandName,
  positionals: ReadonlyArray<string>,
  arity: number
): Either.Either<ReadonlyArray<string>, CliError> =>
  positionals.length === arity
    ? Either.right(positionals)
    : Either.left(cliError(`Usage: artemis-ast ${usageOf[name]}`))

const at = (values: ReadonlyArray<string>, index: number): string => values[index] ?? ""

const buildCommand = (
  name: CommandName,
  positionals: ReadonlyArray<string>
): Either.Either<CliCommand, CliError> =>
  Match.value(name).pipe(
    Match.when("extract", (tag) =>
      Either.map(expectArity(tag, positionals, 2), (args): CliCommand => ({
        _tag: tag,
        input: at(args, 0),
        output: at(args, 1)
      }))),
    Match.when("prune", (tag) =>
      Either.map(expectArity(tag, positionals, 2), (args): CliCommand => ({
        _tag: tag,
        input: at(args, 0),
        output: at(args, 1)
      }))),
    Match.when("merge", (tag) =>
      Either.map(expectArity(tag, positionals, 3), (args): CliCommand => ({
        _tag: tag,
        input: at(args, 0),
        scenario: at(args, 1),
        output: at(args, 2)
      }))),
    Match.when("extract-all", (tag) =>
      Either.map(expectArity(tag, positionals, 1), (args): CliCommand => ({
        _tag: tag,
        directory: at(args, 0)
      }))),
    Match.when("merge-all", (tag) =>
      Either.map(expectArity(tag, positionals, 2), (args): CliCommand => ({
        _tag: tag,
        directory: at(args, 0),
        outputDirectory: at(args, 1)
      }))),
    Match.when("check", (tag) =>
      Either.map(expectArity(tag, positionals, 1), (args): CliCommand => ({
        _tag: tag,
        input: at(args, 0)
      }))),
    Match.when("help", () => Either.right<CliCommand>({ _tag: "help" })),
    Match.exhaustive
  )

const isCommandName = (value: string): value is CommandName => Object.hasOwn(usageOf, value)

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

interface ParsedFlag {
  readonly next: CliOptions
  readonly consumed: number
}

const setParsedFlag = (next: CliOptions, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliOptions,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (options: CliOptions, value: string) => CliOptions
): Either.Either<ParsedFlag, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

type FlagParser = (
  current: CliOptions,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (options, value) => ({
      ...options,
      configPath: value,
      configPathExplicit: true
    })),
  "script-ext": (current, inlineValue, nextValue) =>
    parseValueFlag("script-ext", current, inlineValue, nextValue, (options, value) => ({
      ...options,
      scriptExtension: value
    })),
  "scenario-ext": (current, inlineValue, nextValue) =>
    parseValueFlag("scenario-ext", current, inlineValue, nextValue, (options, value) => ({
      ...options,
      scenarioExtension: value
    })),
  "translation-ext": (current, inlineValue, nextValue) =>
    parseValueFlag("translation-ext", current, inlineValue, nextValue, (options, value) => ({
      ...options,
      translationExtension: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliOptions
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface SplitArgs {
  readonly positionals: ReadonlyArray<string>
  readonly options: CliOptions
}

const parseRest = (rawArgs: ReadonlyArray<string>): Either.Either<SplitArgs, CliError> => {
  let options = defaultOptions
  const positionals: Array<string> = []
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      positionals.push(current)
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], options)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    options = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right({ positionals, options })
}

/**
 * Parse CLI arguments into a typed command and options.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant no arguments, `help`, `--help` and `-h` all yield the help command
 * @complexity O(n)
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || first === "--help" || first === "-h") {
    return Either.right({ command: { _tag: "help" }, options: defaultOptions })
  }
  if (!isCommandName(first)) {
    return Either.left(cliError(`Unknown command: ${first}`))
  }
  const rest = parseRest(rawArgs.slice(1))
  if (Either.isLeft(rest)) {
    return Either.left(rest.left)
  }
  return Either.map(buildCommand(first, rest.right.positionals), (command) => ({
    command,
    options: rest.right.options
  }))
}
