import type { CliOptions } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every resolved extension starts with "."
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly scriptExtension?: string
  readonly scenarioExtension?: string
  readonly translationExtension?: string
}

export interface ResolvedConfig {
  readonly scriptExtension: string
  readonly scenarioExtension: string
  readonly translationExtension: string
}

export const defaultConfig: ResolvedConfig = {
  scriptExtension: ".ast",
  scenarioExtension: ".yaml",
  translationExtension: ".cn"
}

const normalizeExtension = (extension: string): string => extension.startsWith(".") ? extension : `.${extension}`

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI options.
 * @param fileConfig - Optional config loaded from .artemis-ast.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (cli: CliOptions, fileConfig: FileConfig | undefined): ResolvedConfig => ({
  scriptExtension: normalizeExtension(
    cli.scriptExtension ?? fileConfig?.scriptExtension ?? defaultConfig.scriptExtension
  ),
  scenarioExtension: normalizeExtension(
    cli.scenarioExtension ?? fileConfig?.scenarioExtension ?? defaultConfig.scenarioExtension
  ),
  translationExtension: normalizeExtension(
    cli.translationExtension ?? fileConfig?.translationExtension ?? defaultConfig.translationExtension
  )
})
