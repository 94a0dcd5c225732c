import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import { Match } from "effect"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as LogLevel from "effect/LogLevel"
import * as Option from "effect/Option"

import type { AppError } from "../core/errors.js"
import { configError } from "../core/errors.js"

// CHANGE: decode the log level override from the environment
// WHY: environment input is untyped, reject invalid values before the walk starts
// FORMAT THEOREM: ∀v: decode(v) = Right(Some(l)) → v.trim().toLowerCase() ∈ {"error","warn","info","debug"}
// PURITY: SHELL
// EFFECT: Effect<Option<LogLevel>, AppError, never>
// INVARIANT: unset or blank variable yields None
// COMPLEXITY: O(1)

export const LOG_LEVEL_ENV = "BEGONE_LOG_LEVEL"

const LogLevelNameSchema = S.Literal("error", "warn", "info", "debug")

type LogLevelName = S.Schema.Type<typeof LogLevelNameSchema>

const toLogLevel = (name: LogLevelName): LogLevel.LogLevel =>
  Match.value(name).pipe(
    Match.when("error", () => LogLevel.Error),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("info", () => LogLevel.Info),
    Match.when("debug", () => LogLevel.Debug),
    Match.exhaustive
  )

export const decodeLogLevel = (
  raw: string | undefined
): Effect.Effect<Option.Option<LogLevel.LogLevel>, AppError> => {
  const value = raw?.trim().toLowerCase() ?? ""
  if (value.length === 0) {
    return Effect.succeed(Option.none())
  }
  return pipe(
    S.decodeUnknown(LogLevelNameSchema)(value),
    Effect.map((name) => Option.some(toLogLevel(name))),
    Effect.mapError((error) => configError(`${LOG_LEVEL_ENV}: ${TreeFormatter.formatErrorSync(error)}`))
  )
}

export const readLogLevelFromEnv: Effect.Effect<Option.Option<LogLevel.LogLevel>, AppError> = pipe(
  Effect.sync(() => process.env[LOG_LEVEL_ENV]),
  Effect.flatMap(decodeLogLevel)
)
