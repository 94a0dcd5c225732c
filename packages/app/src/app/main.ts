#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire the CLI program into the Node runtime with proper teardown
// WHY: execute effects with platform services and map fatal errors to exit code 1
// FORMAT THEOREM: runMain(program) terminates with exitCode ∈ {0, 1}
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: fatal errors are printed once to stderr

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${formatAppError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
