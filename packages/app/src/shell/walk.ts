import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Chunk from "effect/Chunk"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Stream from "effect/Stream"

import type { AppError } from "../core/errors.js"
import { configError } from "../core/errors.js"
import type { MatchedEntry, MatchEvent, WalkConfig } from "../core/walk.js"
import { classifyEntries, deleted, deletionFailed, listingFailed, visited, wouldDelete } from "../core/walk.js"
import type { DirectoryTreeService } from "./directory-tree.js"
import { DirectoryTree } from "./directory-tree.js"

// CHANGE: walk the tree with an explicit work-list and prune at every match
// WHY: matched subtrees are removed or skipped, so nothing beneath them may be listed
// FORMAT THEOREM: ∀m ∈ matched: ∀d ⊂ m: list(d) is never called
// PURITY: SHELL
// EFFECT: Stream<MatchEvent, never, DirectoryTree | Path>
// INVARIANT: listing and deletion failures become Failed events, never stream errors
// COMPLEXITY: O(n log n) where n = visited entries

const actOnMatch = (
  tree: DirectoryTreeService,
  config: WalkConfig,
  entry: MatchedEntry
): Effect.Effect<MatchEvent> => {
  if (config.dryRun) {
    return Effect.succeed(wouldDelete(entry.path))
  }
  return tree.remove(entry.path).pipe(
    Effect.match({
      onFailure: (failure) => deletionFailed(entry.path, failure.reason),
      onSuccess: () => deleted(entry.path)
    })
  )
}

const visitDirectory = (
  tree: DirectoryTreeService,
  path: PathService,
  config: WalkConfig,
  pending: Array<string>,
  directory: string
): Effect.Effect<ReadonlyArray<MatchEvent>> =>
  tree.list(directory).pipe(
    Effect.matchEffect({
      onFailure: (failure) => Effect.succeed([listingFailed(directory, failure.reason)]),
      onSuccess: (entries) =>
        Effect.gen(function*(_) {
          const { descend, matched } = classifyEntries(directory, entries, config, path)
          pending.push(...descend.toReversed())
          const events = yield* _(Effect.forEach(matched, (entry) => actOnMatch(tree, config, entry)))
          return config.verbose ? [visited(directory), ...events] : events
        })
    })
  )

/**
 * Walk `config.root` depth-first and emit one event per matched entry, lazily.
 *
 * Each directory's events are emitted as soon as that directory has been processed.
 * The root itself is never matched; symlinks are never descended into.
 *
 * @param config - Immutable walk configuration with an already validated root.
 * @returns Stream of match events in traversal order.
 *
 * @pure false
 * @effect DirectoryTree, Path
 * @invariant no directory is listed twice and nothing under a match is listed
 * @complexity O(n log n)
 */
export const walkTree = (
  config: WalkConfig
): Stream.Stream<MatchEvent, never, DirectoryTree | PathService> =>
  Stream.unwrap(
    Effect.gen(function*(_) {
      const tree = yield* _(DirectoryTree)
      const path = yield* _(Path)
      const pending: Array<string> = [config.root]
      const next: Effect.Effect<Chunk.Chunk<MatchEvent>, Option.Option<never>> = Effect.suspend(() => {
        const directory = pending.pop()
        if (directory === undefined) {
          return Effect.fail(Option.none())
        }
        return Effect.map(visitDirectory(tree, path, config, pending, directory), Chunk.fromIterable)
      })
      return Stream.repeatEffectChunkOption(next)
    })
  )

/**
 * Resolve the walk root against the working directory and check it is a directory.
 *
 * @param root - User supplied root, or undefined for the working directory.
 * @returns Absolute root path.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant fails with ConfigError before any traversal
 * @complexity O(1)
 */
export const resolveWalkRoot = (
  root: string | undefined
): Effect.Effect<string, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const cwd = yield* _(Effect.sync(() => process.cwd()))
    const absolute = path.resolve(cwd, root ?? ".")
    const info = yield* _(
      fs.stat(absolute).pipe(
        Effect.mapError((error) => configError(`Cannot access root path ${absolute}: ${error.message}`))
      )
    )
    if (info.type !== "Directory") {
      return yield* _(Effect.fail(configError(`Root path is not a directory: ${absolute}`)))
    }
    return absolute
  })
