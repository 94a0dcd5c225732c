import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"
import type * as Either from "effect/Either"
import * as Logger from "effect/Logger"
import * as Stream from "effect/Stream"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, usage } from "../core/cli.js"
import { buildWalkConfig, resolveLogLevel } from "../core/config.js"
import type { EcosystemKind } from "../core/ecosystem.js"
import { ecosystemLabel } from "../core/ecosystem.js"
import type { AppError } from "../core/errors.js"
import type { WalkSummary } from "../core/report.js"
import {
  emptySummary,
  emptyTally,
  renderEvent,
  renderHumanSummary,
  renderJsonReport,
  tallyEvent,
  toSummary
} from "../core/report.js"
import type { MatchEvent } from "../core/walk.js"
import { DirectoryTreeLive } from "../shell/directory-tree.js"
import { readLogLevelFromEnv } from "../shell/log-level.js"
import { CliLoggerLive } from "../shell/logger.js"
import { resolveWalkRoot, walkTree } from "../shell/walk.js"

// CHANGE: orchestrate a cleanup run with functional core + imperative shell
// WHY: single entrypoint with typed fatal errors and per-event output
// FORMAT THEOREM: ∀argv: run(argv) = Right(r) → r.exitCode = 0
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: summary emitted at most once, after the last event line
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly summary: WalkSummary
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitEvent = (cli: CliArgs) => (event: MatchEvent): Effect.Effect<void> =>
  cli.silent || cli.json ? Effect.void : writeStdout(renderEvent(event))

const emitSummary = (kind: EcosystemKind, cli: CliArgs, summary: WalkSummary): Effect.Effect<void> => {
  if (cli.silent) {
    return Effect.void
  }
  const payload = cli.json
    ? renderJsonReport(kind, summary, cli.dryRun)
    : renderHumanSummary(kind, summary, cli.dryRun)
  return writeStdout(payload)
}

const handleClean = (
  kind: EcosystemKind,
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const root = yield* _(resolveWalkRoot(cli.root))
    const config = buildWalkConfig(kind, cli, root)
    yield* _(Effect.logDebug(`Root directory: ${root}`))
    yield* _(Effect.logDebug(`Matching directory names: ${[...config.ruleSet.names].join(", ")}`))
    yield* _(Effect.logInfo(`Cleaning ${ecosystemLabel(kind)} directories in: ${root}`))
    const summary = yield* _(
      walkTree(config).pipe(
        Stream.tap(emitEvent(cli)),
        Stream.runFold(emptyTally, tallyEvent),
        Effect.map(toSummary),
        Effect.provide(DirectoryTreeLive)
      )
    )
    if (summary.failed.length > 0) {
      yield* _(Effect.logWarning(`${summary.failed.length} entries could not be processed`))
    }
    yield* _(emitSummary(kind, cli, summary))
    return { summary, exitCode: 0 }
  })

const handleHelp = (): Effect.Effect<ProgramResult> =>
  Effect.as(writeStdout(usage), { summary: emptySummary, exitCode: 0 })

/**
 * Run the CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the run summary and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, stdout, stderr
 * @invariant only configuration errors fail the effect; walk failures are part of the summary
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const envLevel = yield* _(readLogLevelFromEnv)
    const command = cli.command
    const run: Effect.Effect<ProgramResult, AppError, ProgramEnv> = command === "help"
      ? handleHelp()
      : handleClean(command, cli)
    return yield* _(run.pipe(Logger.withMinimumLogLevel(resolveLogLevel(cli, envLevel))))
  }).pipe(Effect.provide(CliLoggerLive))
