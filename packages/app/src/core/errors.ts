import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify the fatal error algebra for the cleanup CLI
// WHY: only configuration problems may stop a run; walk failures travel as events
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every AppError maps to exit code 1
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }

export type AppError = CliError | ConfigError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

/**
 * Render a fatal error for stderr.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `error: ${value.message}`),
    Match.tag("ConfigError", (value) => `configuration error: ${value.message}`),
    Match.exhaustive
  )
