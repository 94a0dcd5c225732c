import { Match } from "effect"
import * as Chunk from "effect/Chunk"

import type { EcosystemKind } from "./ecosystem.js"
import { ecosystemLabel } from "./ecosystem.js"
import type { FailureStage, MatchEvent } from "./walk.js"

// CHANGE: fold match events into a summary and render event lines and reports
// WHY: keep reporting pure and deterministic across output modes
// FORMAT THEOREM: ∀es: tally(es).deleted = [e.path | e ∈ es, e._tag = "Deleted"] in stream order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: one rendered line per non-visited event
// COMPLEXITY: O(n) over the whole stream

export interface FailedEntry {
  readonly path: string
  readonly stage: FailureStage
  readonly reason: string
}

export interface WalkSummary {
  readonly deleted: ReadonlyArray<string>
  readonly wouldDelete: ReadonlyArray<string>
  readonly failed: ReadonlyArray<FailedEntry>
  readonly visited: number
}

export const emptySummary: WalkSummary = {
  deleted: [],
  wouldDelete: [],
  failed: [],
  visited: 0
}

/**
 * Running totals while the stream is folded; lists are chunks so each step appends without copying.
 */
export interface SummaryTally {
  readonly deleted: Chunk.Chunk<string>
  readonly wouldDelete: Chunk.Chunk<string>
  readonly failed: Chunk.Chunk<FailedEntry>
  readonly visited: number
}

export const emptyTally: SummaryTally = {
  deleted: Chunk.empty(),
  wouldDelete: Chunk.empty(),
  failed: Chunk.empty(),
  visited: 0
}

/**
 * Add one event to a running tally.
 *
 * @pure true
 * @complexity O(1) amortized
 */
export const tallyEvent = (tally: SummaryTally, event: MatchEvent): SummaryTally =>
  Match.value(event).pipe(
    Match.tag("Deleted", (value) => ({ ...tally, deleted: Chunk.append(tally.deleted, value.path) })),
    Match.tag("WouldDelete", (value) => ({ ...tally, wouldDelete: Chunk.append(tally.wouldDelete, value.path) })),
    Match.tag("Failed", (value) => ({
      ...tally,
      failed: Chunk.append(tally.failed, { path: value.path, stage: value.stage, reason: value.reason })
    })),
    Match.tag("Visited", () => ({ ...tally, visited: tally.visited + 1 })),
    Match.exhaustive
  )

export const toSummary = (tally: SummaryTally): WalkSummary => ({
  deleted: Chunk.toReadonlyArray(tally.deleted),
  wouldDelete: Chunk.toReadonlyArray(tally.wouldDelete),
  failed: Chunk.toReadonlyArray(tally.failed),
  visited: tally.visited
})

/**
 * Fold a finite sequence of events into a summary.
 *
 * @pure true
 * @complexity O(n)
 */
export const summarizeEvents = (events: Iterable<MatchEvent>): WalkSummary => {
  let tally = emptyTally
  for (const event of events) {
    tally = tallyEvent(tally, event)
  }
  return toSummary(tally)
}

/**
 * Render one event as a human-readable line.
 *
 * @pure true
 * @complexity O(1)
 */
export const renderEvent = (event: MatchEvent): string =>
  Match.value(event).pipe(
    Match.tag("Deleted", (value) => `Removed: ${value.path}`),
    Match.tag("WouldDelete", (value) => `Would remove: ${value.path}`),
    Match.tag("Failed", (value) =>
      value.stage === "listing"
        ? `Failed to list: ${value.path} (${value.reason})`
        : `Failed to remove: ${value.path} (${value.reason})`),
    Match.tag("Visited", (value) => `Visited: ${value.path}`),
    Match.exhaustive
  )

const pluralDirectories = (count: number): string => count === 1 ? "directory" : "directories"

const failureLines = (failed: ReadonlyArray<FailedEntry>): ReadonlyArray<string> => {
  const deletion = failed.filter((entry) => entry.stage === "deletion").length
  const listing = failed.length - deletion
  return [
    ...(deletion === 0 ? [] : [`Failed to remove ${deletion} ${pluralDirectories(deletion)}`]),
    ...(listing === 0 ? [] : [`Could not read ${listing} ${pluralDirectories(listing)}`])
  ]
}

/**
 * Render the closing summary of a run.
 *
 * @param kind - Selected ecosystem, used for the label.
 * @param summary - Folded events.
 * @param dryRun - Whether nothing was actually removed.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @invariant exactly one headline, followed by failure counts when present
 * @complexity O(n)
 */
export const renderHumanSummary = (
  kind: EcosystemKind,
  summary: WalkSummary,
  dryRun: boolean
): string => {
  const label = ecosystemLabel(kind)
  const count = dryRun ? summary.wouldDelete.length : summary.deleted.length
  const headline = count === 0
    ? `No ${label} directories found to clean`
    : `${dryRun ? "Would remove" : "Removed"} ${count} ${label} ${pluralDirectories(count)}`
  return [headline, ...failureLines(summary.failed)].join("\n")
}

/**
 * Render the summary as JSON text.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderJsonReport = (
  kind: EcosystemKind,
  summary: WalkSummary,
  dryRun: boolean
): string =>
  JSON.stringify(
    {
      ecosystem: kind,
      dryRun,
      deleted: summary.deleted,
      wouldDelete: summary.wouldDelete,
      failed: summary.failed,
      visited: summary.visited
    },
    null,
    2
  )
