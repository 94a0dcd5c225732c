import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const parse = (...args: ReadonlyArray<string>) =>
  Either.match(parseCliArgs(["node", "begone", ...args]), {
    onLeft: (error) => ({ error }),
    onRight: (parsed) => ({ parsed })
  })

const rejected = (message: string) => ({ error: { _tag: "CliError", message } })

describe("parseCliArgs", () => {
  it.effect("parses a bare command with defaults", () =>
    Effect.sync(() => {
      expect(parse("rust")).toEqual({
        parsed: {
          command: "rust",
          root: undefined,
          dryRun: false,
          verbose: false,
          requireMarker: false,
          json: false,
          silent: false
        }
      })
    }))

  it.effect("accepts a root path and flags in any position", () =>
    Effect.sync(() => {
      expect(parse("--dry-run", "js", "./projects", "--verbose", "--require-marker", "--json")).toEqual({
        parsed: {
          command: "js",
          root: "./projects",
          dryRun: true,
          verbose: true,
          requireMarker: true,
          json: true,
          silent: false
        }
      })
    }))

  it.effect("expands grouped short flags", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "begone", "-dvm", "all"])
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.command).toBe("all")
        expect(parsed.right.dryRun).toBe(true)
        expect(parsed.right.verbose).toBe(true)
        expect(parsed.right.requireMarker).toBe(true)
      }
    }))

  it.effect("lets --help win over everything else", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "begone", "ruby", "a", "b", "-h"])
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.command).toBe("help")
      }
    }))

  it.effect("rejects unknown commands, flags and extra positionals", () =>
    Effect.sync(() => {
      expect(parse("ruby")).toEqual(
        rejected("Unknown command: ruby (expected rust | python | js | java | go | dotnet | all)")
      )
      expect(parse("go", "--force")).toEqual(rejected("Unknown flag: --force"))
      expect(parse("go", "-x")).toEqual(rejected("Unknown flag: -x"))
      expect(parse("go", "--dry-run=yes")).toEqual(rejected("Flag --dry-run does not take a value"))
      expect(parse("go", "a", "b")).toEqual(rejected("Unexpected positional argument: b"))
    }))

  it.effect("rejects names inherited from Object.prototype as unknown flags", () =>
    Effect.sync(() => {
      expect(parse("-d", "rust", "--toString")).toEqual(rejected("Unknown flag: --toString"))
      expect(parse("rust", "--constructor")).toEqual(rejected("Unknown flag: --constructor"))
      expect(parse("rust", "--__proto__")).toEqual(rejected("Unknown flag: --__proto__"))
      expect(parse("rust", "--valueOf")).toEqual(rejected("Unknown flag: --valueOf"))
      expect(parse("rust", "--hasOwnProperty")).toEqual(rejected("Unknown flag: --hasOwnProperty"))
    }))

  it.effect("keeps dry-run set when another flag follows it", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "begone", "-d", "rust", "./work", "--json"])
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.dryRun).toBe(true)
        expect(parsed.right.json).toBe(true)
      }
    }))

  it.effect("treats everything after -- as positional", () =>
    Effect.sync(() => {
      expect(parse("-d", "js", "--", "-build")).toEqual({
        parsed: {
          command: "js",
          root: "-build",
          dryRun: true,
          verbose: false,
          requireMarker: false,
          json: false,
          silent: false
        }
      })
      expect(parse("go", "--", "--", "x")).toEqual(rejected("Unexpected positional argument: x"))
    }))

  it.effect("requires a command", () =>
    Effect.sync(() => {
      expect(parse("--dry-run")).toEqual(
        rejected("Missing command (expected rust | python | js | java | go | dotnet | all)")
      )
    }))
})
