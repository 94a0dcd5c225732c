import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as LogLevel from "effect/LogLevel"
import * as Option from "effect/Option"

import { parseCliArgs } from "../../src/core/cli.js"
import type { CliArgs } from "../../src/core/cli.js"
import { resolveLogLevel } from "../../src/core/config.js"
import { decodeLogLevel } from "../../src/shell/log-level.js"

const cliArgs = (...args: ReadonlyArray<string>): CliArgs => {
  const parsed = parseCliArgs(["node", "begone", ...args])
  if (parsed._tag === "Left") {
    throw new Error(parsed.left.message)
  }
  return parsed.right
}

describe("decodeLogLevel", () => {
  it.effect("treats an unset or blank variable as no override", () =>
    Effect.gen(function*(_) {
      expect(Option.isNone(yield* _(decodeLogLevel(undefined)))).toBe(true)
      expect(Option.isNone(yield* _(decodeLogLevel("  ")))).toBe(true)
    }))

  it.effect("decodes known names case-insensitively", () =>
    Effect.gen(function*(_) {
      const level = yield* _(decodeLogLevel(" DEBUG "))
      expect(Option.getOrUndefined(level)?.label).toBe("DEBUG")
      const warn = yield* _(decodeLogLevel("warn"))
      expect(Option.getOrUndefined(warn)?.label).toBe("WARN")
    }))

  it.effect("rejects unknown names with a ConfigError", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeLogLevel("loud")))
      expect(error._tag).toBe("ConfigError")
      expect(error.message.startsWith("BEGONE_LOG_LEVEL: ")).toBe(true)
    }))
})

describe("resolveLogLevel", () => {
  it.effect("derives the level from flags when the environment is silent", () =>
    Effect.sync(() => {
      expect(resolveLogLevel(cliArgs("rust"), Option.none()).label).toBe("INFO")
      expect(resolveLogLevel(cliArgs("rust", "-v"), Option.none()).label).toBe("DEBUG")
      expect(resolveLogLevel(cliArgs("rust", "-v", "--silent"), Option.none()).label).toBe("ERROR")
    }))

  it.effect("lets the environment override the flags", () =>
    Effect.sync(() => {
      expect(resolveLogLevel(cliArgs("rust", "--silent"), Option.some(LogLevel.Debug)).label).toBe("DEBUG")
    }))
})
