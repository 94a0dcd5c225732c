import type { Path as PathService } from "@effect/platform/Path"

import type { RuleSet } from "./ecosystem.js"
import { hasMarker, isGated, matchesRule } from "./ecosystem.js"

// CHANGE: define walk configuration, match events and the pure per-directory pruning step
// WHY: keep the match/descend decision IO-free so the walker shell only lists and removes
// FORMAT THEOREM: ∀e ∈ entries: e ∈ matched → e ∉ descend
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: matched directories and symlinks are never scheduled for descent
// COMPLEXITY: O(n log n) where n = entries of one directory

export interface WalkConfig {
  readonly root: string
  readonly ruleSet: RuleSet
  readonly dryRun: boolean
  readonly verbose: boolean
  readonly requireMarker: boolean
}

export type EntryKind = "directory" | "symlink" | "file" | "other"

export interface DirectoryEntry {
  readonly name: string
  readonly kind: EntryKind
}

export type FailureStage = "listing" | "deletion"

export type MatchEvent =
  | { readonly _tag: "Deleted"; readonly path: string }
  | { readonly _tag: "WouldDelete"; readonly path: string }
  | { readonly _tag: "Failed"; readonly path: string; readonly stage: FailureStage; readonly reason: string }
  | { readonly _tag: "Visited"; readonly path: string }

export const deleted = (path: string): MatchEvent => ({ _tag: "Deleted", path })

export const wouldDelete = (path: string): MatchEvent => ({ _tag: "WouldDelete", path })

export const listingFailed = (path: string, reason: string): MatchEvent => ({
  _tag: "Failed",
  path,
  stage: "listing",
  reason
})

export const deletionFailed = (path: string, reason: string): MatchEvent => ({
  _tag: "Failed",
  path,
  stage: "deletion",
  reason
})

export const visited = (path: string): MatchEvent => ({ _tag: "Visited", path })

export interface MatchedEntry {
  readonly path: string
  readonly kind: "directory" | "symlink"
}

export interface Classification {
  readonly matched: ReadonlyArray<MatchedEntry>
  readonly descend: ReadonlyArray<string>
}

const compareNames = (left: DirectoryEntry, right: DirectoryEntry): number => {
  if (left.name < right.name) {
    return -1
  }
  return left.name > right.name ? 1 : 0
}

const isMatch = (
  entry: DirectoryEntry,
  config: WalkConfig,
  siblingFiles: ReadonlyArray<string>
): boolean => {
  if (!matchesRule(config.ruleSet, entry.name)) {
    return false
  }
  const needsMarker = config.requireMarker || isGated(config.ruleSet, entry.name)
  return !needsMarker || hasMarker(config.ruleSet, entry.name, siblingFiles)
}

/**
 * Split the entries of one directory into matched targets and directories to descend into.
 *
 * Files only feed the marker check. Symlinks are matched by name but never descended into.
 *
 * @param parent - Absolute path of the listed directory.
 * @param entries - Its immediate entries, in any order.
 * @param config - Active walk configuration.
 * @param path - Path service used to join child paths.
 * @returns Matched entries and descent candidates, both in name order.
 *
 * @pure true
 * @invariant matched ∩ descend = ∅
 * @complexity O(n log n)
 */
export const classifyEntries = (
  parent: string,
  entries: ReadonlyArray<DirectoryEntry>,
  config: WalkConfig,
  path: PathService
): Classification => {
  const ordered = entries.toSorted(compareNames)
  const siblingFiles = ordered.filter((entry) => entry.kind === "file").map((entry) => entry.name)
  const matched: Array<MatchedEntry> = []
  const descend: Array<string> = []
  for (const entry of ordered) {
    if (entry.kind !== "directory" && entry.kind !== "symlink") {
      continue
    }
    const childPath = path.join(parent, entry.name)
    if (isMatch(entry, config, siblingFiles)) {
      matched.push({ path: childPath, kind: entry.kind })
    } else if (entry.kind === "directory") {
      descend.push(childPath)
    }
  }
  return { matched, descend }
}
