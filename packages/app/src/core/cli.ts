import { Match } from "effect"
import * as Either from "effect/Either"

import type { EcosystemKind } from "./ecosystem.js"
import { ecosystemKinds } from "./ecosystem.js"

// CHANGE: implement deterministic CLI parsing for the cleanup command surface
// WHY: keep argv decoding pure and testable at the boundary
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ EcosystemKind ∪ {"help"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown commands and flags are rejected; at most one root path
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = EcosystemKind | "help"

export interface CliArgs {
  readonly command: CliCommand
  readonly root: string | undefined
  readonly dryRun: boolean
  readonly verbose: boolean
  readonly requireMarker: boolean
  readonly json: boolean
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const endOfOptions = "--"

const commandList = ecosystemKinds.join(" | ")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("rust", () => Either.right<CliCommand>("rust")),
    Match.when("python", () => Either.right<CliCommand>("python")),
    Match.when("js", () => Either.right<CliCommand>("js")),
    Match.when("java", () => Either.right<CliCommand>("java")),
    Match.when("go", () => Either.right<CliCommand>("go")),
    Match.when("dotnet", () => Either.right<CliCommand>("dotnet")),
    Match.when("all", () => Either.right<CliCommand>("all")),
    Match.when("help", () => Either.right<CliCommand>("help")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value} (expected ${commandList})`)))
  )

interface FlagState {
  readonly help: boolean
  readonly dryRun: boolean
  readonly verbose: boolean
  readonly requireMarker: boolean
  readonly json: boolean
  readonly silent: boolean
}

type FlagParser = (current: FlagState) => FlagState

// Maps: names inherited from Object.prototype (`--toString`) never resolve as flags
const flagParsers: ReadonlyMap<string, FlagParser> = new Map<string, FlagParser>([
  ["dry-run", (current) => ({ ...current, dryRun: true })],
  ["verbose", (current) => ({ ...current, verbose: true })],
  ["require-marker", (current) => ({ ...current, requireMarker: true })],
  ["json", (current) => ({ ...current, json: true })],
  ["silent", (current) => ({ ...current, silent: true })],
  ["help", (current) => ({ ...current, help: true })]
])

const shortFlags: ReadonlyMap<string, string> = new Map([
  ["d", "dry-run"],
  ["v", "verbose"],
  ["m", "require-marker"],
  ["h", "help"]
])

const applyLongFlag = (raw: string, current: FlagState): Either.Either<FlagState, CliError> => {
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers.get(name)
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  if (inlineValue !== undefined) {
    return Either.left(cliError(`Flag --${name} does not take a value`))
  }
  return Either.right(parser(current))
}

const applyShortFlags = (raw: string, current: FlagState): Either.Either<FlagState, CliError> => {
  let args = current
  for (const letter of raw.slice(1)) {
    const name = shortFlags.get(letter)
    const parser = name === undefined ? undefined : flagParsers.get(name)
    if (parser === undefined) {
      return Either.left(cliError(`Unknown flag: -${letter}`))
    }
    args = parser(args)
  }
  return Either.right(args)
}

const parseFlag = (raw: string, current: FlagState): Either.Either<FlagState, CliError> =>
  raw.startsWith("--") ? applyLongFlag(raw, current) : applyShortFlags(raw, current)

interface Collected {
  readonly flagged: FlagState
  readonly positionals: ReadonlyArray<string>
}

const defaultFlags: FlagState = {
  help: false,
  dryRun: false,
  verbose: false,
  requireMarker: false,
  json: false,
  silent: false
}

const collect = (rawArgs: ReadonlyArray<string>): Either.Either<Collected, CliError> => {
  let flagged = defaultFlags
  const positionals: Array<string> = []
  let optionsEnded = false
  for (const current of rawArgs) {
    if (!optionsEnded && current === endOfOptions) {
      optionsEnded = true
      continue
    }
    if (optionsEnded || !isFlag(current)) {
      positionals.push(current)
      continue
    }
    const parsed = parseFlag(current, flagged)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    flagged = parsed.right
  }
  return Either.right({ flagged, positionals })
}

const resolveCommand = (collected: Collected): Either.Either<CliArgs, CliError> => {
  const [first, root, extra] = collected.positionals
  const { help, ...flags } = collected.flagged
  if (help) {
    return Either.right<CliArgs>({ ...flags, command: "help", root: undefined })
  }
  if (extra !== undefined) {
    return Either.left(cliError(`Unexpected positional argument: ${extra}`))
  }
  if (first === undefined) {
    return Either.left(cliError(`Missing command (expected ${commandList})`))
  }
  return Either.map(parseCommand(first), (command): CliArgs => ({ ...flags, command, root }))
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * Flags may appear before or after the command; short flags can be grouped (`-dv`).
 * Everything after `--` is positional, so a root such as `-tmp` can be passed.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant `--help` anywhere wins over the command
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => Either.flatMap(collect(argv.slice(2)), resolveCommand)

export const usage = [
  "Usage: begone <command> [options] [--] [path]",
  "",
  "Commands:",
  "  rust     Clean Rust project directories (target/)",
  "  python   Clean Python project directories (.venv/, venv/, __pycache__/, .pytest_cache/, .mypy_cache/)",
  "  js       Clean JavaScript/TypeScript project directories (node_modules/, .next/, .nuxt/, .cache/, dist/, build/)",
  "  java     Clean Java project directories (target/, build/, .gradle/, .classpath/)",
  "  go       Clean Go project directories (bin/, pkg/, __debug_bin/)",
  "  dotnet   Clean .NET project directories (bin/, obj/)",
  "  all      Clean all supported project directories",
  "",
  "Options:",
  "  -d, --dry-run          Report what would be removed without deleting anything",
  "  -v, --verbose          Also report every visited directory",
  "  -m, --require-marker   Only remove directories next to a project file (Cargo.toml, package.json, ...)",
  "      --json             Print the summary as JSON",
  "      --silent           Print nothing but errors",
  "  -h, --help             Show this help",
  "",
  "js: .cache/, dist/ and build/ are only removed next to a package.json."
].join("\n")
