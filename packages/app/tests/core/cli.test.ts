import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { DEFAULT_CONFIG_PATH, parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "artemis-ast", ...args]

const parsed = (...args: ReadonlyArray<string>) => Either.getOrThrow(parseCliArgs(argv(...args)))

const failure = (...args: ReadonlyArray<string>) => Either.getOrThrow(Either.flip(parseCliArgs(argv(...args))))

describe("parseCliArgs", () => {
  it.effect("reads each command with its positionals", () =>
    Effect.sync(() => {
      expect(parsed("extract", "a.ast", "a.yaml").command).toEqual({ _tag: "extract", input: "a.ast", output: "a.yaml" })
      expect(parsed("prune", "a.ast", "b.ast").command).toEqual({ _tag: "prune", input: "a.ast", output: "b.ast" })
      expect(parsed("merge", "a.ast", "a.yaml", "b.ast").command).toEqual({
        _tag: "merge",
        input: "a.ast",
        scenario: "a.yaml",
        output: "b.ast"
      })
      expect(parsed("extract-all", "scripts").command).toEqual({ _tag: "extract-all", directory: "scripts" })
      expect(parsed("merge-all", "scripts", "out").command).toEqual({
        _tag: "merge-all",
        directory: "scripts",
        outputDirectory: "out"
      })
      expect(parsed("check", "a.ast").command).toEqual({ _tag: "check", input: "a.ast" })
    }))

  it.effect("falls back to help", () =>
    Effect.sync(() => {
      expect(parsed().command).toEqual({ _tag: "help" })
      expect(parsed("--help").command).toEqual({ _tag: "help" })
      expect(parsed("-h").command).toEqual({ _tag: "help" })
      expect(parsed("help").command).toEqual({ _tag: "help" })
    }))

  it.effect("uses default options when no flags are given", () =>
    Effect.sync(() => {
      expect(parsed("check", "a.ast").options).toEqual({
        configPath: DEFAULT_CONFIG_PATH,
        configPathExplicit: false,
        scriptExtension: undefined,
        scenarioExtension: undefined,
        translationExtension: undefined,
        verbose: false,
        silent: false
      })
    }))

  it.effect("reads flags between and after positionals", () =>
    Effect.sync(() => {
      const { command, options } = parsed(
        "merge-all",
        "--verbose",
        "scripts",
        "--translation-ext=.zh",
        "out",
        "--config",
        "custom.json"
      )
      expect(command).toEqual({ _tag: "merge-all", directory: "scripts", outputDirectory: "out" })
      expect(options).toMatchObject({
        verbose: true,
        translationExtension: ".zh",
        configPath: "custom.json",
        configPathExplicit: true
      })
    }))

  it.effect("rejects an unknown command", () =>
    Effect.sync(() => {
      expect(failure("explode")).toEqual({ _tag: "CliError", message: "Unknown command: explode" })
    }))

  it.effect("rejects unknown flags", () =>
    Effect.sync(() => {
      expect(failure("check", "a.ast", "--loud").message).toBe("Unknown flag: --loud")
      expect(failure("check", "a.ast", "-v").message).toBe("Unknown flag: -v")
    }))

  it.effect("rejects a value flag without its value", () =>
    Effect.sync(() => {
      expect(failure("extract-all", "scripts", "--script-ext").message).toBe("Missing value for --script-ext")
      expect(failure("extract-all", "scripts", "--config", "--silent").message).toBe("Missing value for --config")
    }))

  it.effect("rejects the wrong number of positionals with the command usage", () =>
    Effect.sync(() => {
      expect(failure("extract", "a.ast").message).toBe("Usage: artemis-ast extract <input.ast> <output.yaml>")
      expect(failure("check", "a.ast", "b.ast").message).toBe("Usage: artemis-ast check <input.ast>")
    }))
})
