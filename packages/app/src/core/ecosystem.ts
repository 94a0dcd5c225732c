import { Match } from "effect"

// CHANGE: encode the ecosystem rule table as a closed union with a total lookup
// WHY: every command resolves to a fixed, non-empty set of artifact directory names
// FORMAT THEOREM: ∀k ∈ EcosystemKind: |rulesFor(k).names| ≥ 1 ∧ rulesFor("all").names = ⋃ rulesFor(k).names
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: name matching is exact and case-sensitive; gated names match only next to a marker
// COMPLEXITY: O(1) membership per lookup

export type EcosystemKind = "rust" | "python" | "js" | "java" | "go" | "dotnet" | "all"

export const ecosystemKinds: ReadonlyArray<EcosystemKind> = [
  "rust",
  "python",
  "js",
  "java",
  "go",
  "dotnet",
  "all"
]

/**
 * A marker is a file name (`Cargo.toml`) or a `*`-prefixed suffix (`*.csproj`)
 * that must sit next to a matched directory when markers are required.
 */
export type MarkerPattern = string

/**
 * `gated` holds the generic names (`dist`, `.cache`) that are only removed when a
 * project marker sits beside them, with or without `--require-marker`.
 */
export interface RuleSet {
  readonly names: ReadonlySet<string>
  readonly markers: ReadonlyMap<string, ReadonlyArray<MarkerPattern>>
  readonly gated: ReadonlySet<string>
}

interface Rule {
  readonly directories: ReadonlyArray<string>
  readonly markers: ReadonlyArray<MarkerPattern>
  readonly gated: ReadonlyArray<string>
}

type SingleKind = Exclude<EcosystemKind, "all">

const rustRule: Rule = { directories: ["target"], markers: ["Cargo.toml"], gated: [] }
const pythonRule: Rule = {
  directories: [".venv", "venv", "__pycache__", ".pytest_cache", ".mypy_cache"],
  markers: ["requirements.txt", "pyproject.toml", "setup.py", "Pipfile"],
  gated: []
}
const jsRule: Rule = {
  directories: ["node_modules", ".next", ".nuxt", ".cache", "dist", "build"],
  markers: ["package.json"],
  gated: [".cache", "dist", "build"]
}
const javaRule: Rule = {
  directories: ["target", "build", ".gradle", ".classpath"],
  markers: ["pom.xml", "build.gradle", "build.gradle.kts"],
  gated: []
}
const goRule: Rule = { directories: ["bin", "pkg", "__debug_bin"], markers: ["go.mod", "go.sum"], gated: [] }
const dotnetRule: Rule = {
  directories: ["bin", "obj"],
  markers: ["*.csproj", "*.fsproj", "*.sln"],
  gated: []
}

const singleKinds: ReadonlyArray<SingleKind> = ["rust", "python", "js", "java", "go", "dotnet"]

const ruleFor = (kind: SingleKind): Rule =>
  Match.value(kind).pipe(
    Match.when("rust", () => rustRule),
    Match.when("python", () => pythonRule),
    Match.when("js", () => jsRule),
    Match.when("java", () => javaRule),
    Match.when("go", () => goRule),
    Match.when("dotnet", () => dotnetRule),
    Match.exhaustive
  )

// A name stays gated under a union only when every rule that lists it gates it.
const buildRuleSet = (rules: ReadonlyArray<Rule>): RuleSet => {
  const names = new Set<string>()
  const ungated = new Set<string>()
  const markers = new Map<string, Array<MarkerPattern>>()
  for (const rule of rules) {
    for (const directory of rule.directories) {
      names.add(directory)
      if (!rule.gated.includes(directory)) {
        ungated.add(directory)
      }
      const current = markers.get(directory) ?? []
      for (const marker of rule.markers) {
        if (!current.includes(marker)) {
          current.push(marker)
        }
      }
      markers.set(directory, current)
    }
  }
  const gated = new Set([...names].filter((name) => !ungated.has(name)))
  return { names, markers, gated }
}

const ruleSets: Readonly<Record<EcosystemKind, RuleSet>> = {
  rust: buildRuleSet([ruleFor("rust")]),
  python: buildRuleSet([ruleFor("python")]),
  js: buildRuleSet([ruleFor("js")]),
  java: buildRuleSet([ruleFor("java")]),
  go: buildRuleSet([ruleFor("go")]),
  dotnet: buildRuleSet([ruleFor("dotnet")]),
  all: buildRuleSet(singleKinds.map(ruleFor))
}

/**
 * Resolve the rule set for an ecosystem.
 *
 * @param kind - Selected ecosystem.
 * @returns Immutable set of directory names plus their project markers.
 *
 * @pure true
 * @invariant result.names is non-empty and duplicate-free
 * @complexity O(1)
 */
export const rulesFor = (kind: EcosystemKind): RuleSet => ruleSets[kind]

export const matchesRule = (ruleSet: RuleSet, name: string): boolean => ruleSet.names.has(name)

export const isGated = (ruleSet: RuleSet, name: string): boolean => ruleSet.gated.has(name)

const matchesMarker = (pattern: MarkerPattern, fileName: string): boolean =>
  pattern.startsWith("*") ? fileName.endsWith(pattern.slice(1)) : fileName === pattern

/**
 * Check whether a matched directory name is backed by a project marker among its siblings.
 *
 * @param ruleSet - Active rules.
 * @param name - Directory name that already matched.
 * @param siblingFiles - File names in the same parent directory.
 *
 * @pure true
 * @complexity O(m * f) where m = markers for the name, f = sibling files
 */
export const hasMarker = (
  ruleSet: RuleSet,
  name: string,
  siblingFiles: ReadonlyArray<string>
): boolean => {
  const patterns = ruleSet.markers.get(name) ?? []
  return patterns.some((pattern) => siblingFiles.some((fileName) => matchesMarker(pattern, fileName)))
}

export const ecosystemLabel = (kind: EcosystemKind): string =>
  Match.value(kind).pipe(
    Match.when("rust", () => "Rust"),
    Match.when("python", () => "Python"),
    Match.when("js", () => "JavaScript/TypeScript"),
    Match.when("java", () => "Java"),
    Match.when("go", () => "Go"),
    Match.when("dotnet", () => ".NET"),
    Match.when("all", () => "project"),
    Match.exhaustive
  )
