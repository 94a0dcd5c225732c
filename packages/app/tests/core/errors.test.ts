import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { configError, formatAppError } from "../../src/core/errors.js"

describe("formatAppError", () => {
  it.effect("prefixes each fatal error kind", () =>
    Effect.sync(() => {
      expect(formatAppError({ _tag: "CliError", message: "Unknown flag: --force" })).toBe(
        "error: Unknown flag: --force"
      )
      expect(formatAppError(configError("Root path is not a directory: /w/notes.txt"))).toBe(
        "configuration error: Root path is not a directory: /w/notes.txt"
      )
    }))
})
