import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { ecosystemKinds, hasMarker, isGated, matchesRule, rulesFor } from "../../src/core/ecosystem.js"

describe("rulesFor", () => {
  it.effect("gives every ecosystem a non-empty rule set", () =>
    Effect.sync(() => {
      for (const kind of ecosystemKinds) {
        expect(rulesFor(kind).names.size).toBeGreaterThan(0)
      }
    }))

  it.effect("maps single ecosystems to their directory names", () =>
    Effect.sync(() => {
      expect([...rulesFor("rust").names]).toEqual(["target"])
      expect([...rulesFor("python").names]).toEqual([".venv", "venv", "__pycache__", ".pytest_cache", ".mypy_cache"])
      expect([...rulesFor("js").names]).toEqual(["node_modules", ".next", ".nuxt", ".cache", "dist", "build"])
      expect([...rulesFor("java").names]).toEqual(["target", "build", ".gradle", ".classpath"])
      expect([...rulesFor("go").names]).toEqual(["bin", "pkg", "__debug_bin"])
      expect([...rulesFor("dotnet").names]).toEqual(["bin", "obj"])
    }))

  it.effect("unions every ecosystem for all, without duplicates", () =>
    Effect.sync(() => {
      const all = rulesFor("all")
      for (const name of ["target", "bin", "obj", "node_modules", ".venv", "__pycache__", "pkg", "build"]) {
        expect(matchesRule(all, name)).toBe(true)
      }
      expect(matchesRule(all, "src")).toBe(false)
      expect([...all.names]).toEqual([
        "target",
        ".venv",
        "venv",
        "__pycache__",
        ".pytest_cache",
        ".mypy_cache",
        "node_modules",
        ".next",
        ".nuxt",
        ".cache",
        "dist",
        "build",
        ".gradle",
        ".classpath",
        "bin",
        "pkg",
        "__debug_bin",
        "obj"
      ])
    }))

  it.effect("gates generic js output names behind a marker", () =>
    Effect.sync(() => {
      expect([...rulesFor("js").gated]).toEqual([".cache", "dist", "build"])
      expect(isGated(rulesFor("js"), "node_modules")).toBe(false)
      expect(rulesFor("java").gated.size).toBe(0)
      expect([...rulesFor("all").gated]).toEqual([".cache", "dist"])
      expect(isGated(rulesFor("all"), "build")).toBe(false)
    }))

  it.effect("matches names exactly and case-sensitively", () =>
    Effect.sync(() => {
      const rust = rulesFor("rust")
      expect(matchesRule(rust, "Target")).toBe(false)
      expect(matchesRule(rust, "target ")).toBe(false)
      expect(matchesRule(rust, "target")).toBe(true)
    }))
})

describe("hasMarker", () => {
  it.effect("accepts exact marker file names", () =>
    Effect.sync(() => {
      expect(hasMarker(rulesFor("rust"), "target", ["Cargo.toml", "README.md"])).toBe(true)
      expect(hasMarker(rulesFor("rust"), "target", ["pom.xml"])).toBe(false)
    }))

  it.effect("accepts suffix markers", () =>
    Effect.sync(() => {
      expect(hasMarker(rulesFor("dotnet"), "obj", ["Service.fsproj"])).toBe(true)
      expect(hasMarker(rulesFor("dotnet"), "obj", ["csproj.txt"])).toBe(false)
    }))

  it.effect("merges markers of every ecosystem sharing a name under all", () =>
    Effect.sync(() => {
      const all = rulesFor("all")
      expect(all.markers.get("target")).toEqual(["Cargo.toml", "pom.xml", "build.gradle", "build.gradle.kts"])
      expect(all.markers.get("bin")).toEqual(["go.mod", "go.sum", "*.csproj", "*.fsproj", "*.sln"])
      expect(hasMarker(all, "target", ["pom.xml"])).toBe(true)
      expect(all.markers.get("build")).toEqual(["package.json", "pom.xml", "build.gradle", "build.gradle.kts"])
      expect(hasMarker(all, "bin", ["App.sln"])).toBe(true)
    }))
})
