import * as LogLevel from "effect/LogLevel"
import * as Option from "effect/Option"

import type { CliArgs } from "./cli.js"
import type { EcosystemKind } from "./ecosystem.js"
import { rulesFor } from "./ecosystem.js"
import type { WalkConfig } from "./walk.js"

// CHANGE: define how CLI flags and the environment resolve into run settings
// WHY: environment overrides flags for the log level, flags decide everything else
// FORMAT THEOREM: ∀cli,env: logLevel(cli, Some(l)) = l
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: WalkConfig is built once per run and never mutated
// COMPLEXITY: O(1)/O(1)

/**
 * Build the immutable walk configuration for a run.
 *
 * @param kind - Selected ecosystem.
 * @param cli - Parsed CLI arguments.
 * @param root - Absolute, validated root path.
 *
 * @pure true
 * @complexity O(1)
 */
export const buildWalkConfig = (kind: EcosystemKind, cli: CliArgs, root: string): WalkConfig => ({
  root,
  ruleSet: rulesFor(kind),
  dryRun: cli.dryRun,
  verbose: cli.verbose,
  requireMarker: cli.requireMarker
})

const flagLogLevel = (cli: CliArgs): LogLevel.LogLevel => {
  if (cli.silent) {
    return LogLevel.Error
  }
  return cli.verbose ? LogLevel.Debug : LogLevel.Info
}

export const resolveLogLevel = (
  cli: CliArgs,
  fromEnv: Option.Option<LogLevel.LogLevel>
): LogLevel.LogLevel => Option.getOrElse(fromEnv, () => flagLogLevel(cli))
