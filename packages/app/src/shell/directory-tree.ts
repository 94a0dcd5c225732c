import type { Dirent } from "node:fs"
import { readdir } from "node:fs/promises"

import { FileSystem } from "@effect/platform/FileSystem"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"

import type { DirectoryEntry, EntryKind } from "../core/walk.js"

// CHANGE: expose directory listing and subtree removal as an Effect service
// WHY: the platform FileSystem follows symlinks on stat, the walker needs link-aware entries
// FORMAT THEOREM: ∀d: list(d) = Right(es) → ∀e ∈ es: e.kind = "symlink" ⇔ lstat(d/e).isSymbolicLink()
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<DirectoryEntry>, TreeFailure> | Effect<void, TreeFailure>
// INVARIANT: remove never follows a symlink into its target
// COMPLEXITY: O(n) per listing

export type TreeFailure = { readonly _tag: "TreeFailure"; readonly reason: string }

export const treeFailure = (reason: string): TreeFailure => ({ _tag: "TreeFailure", reason })

export interface DirectoryTreeService {
  readonly list: (directory: string) => Effect.Effect<ReadonlyArray<DirectoryEntry>, TreeFailure>
  readonly remove: (target: string) => Effect.Effect<void, TreeFailure>
}

export class DirectoryTree extends Context.Tag("begone/DirectoryTree")<
  DirectoryTree,
  DirectoryTreeService
>() {}

const describeError = (error: unknown): string => error instanceof Error ? error.message : String(error)

const toEntryKind = (entry: Dirent): EntryKind => {
  if (entry.isSymbolicLink()) {
    return "symlink"
  }
  if (entry.isDirectory()) {
    return "directory"
  }
  return entry.isFile() ? "file" : "other"
}

const listDirectory = (directory: string): Effect.Effect<ReadonlyArray<DirectoryEntry>, TreeFailure> =>
  Effect.tryPromise({
    try: () => readdir(directory, { withFileTypes: true }),
    catch: (error) => treeFailure(describeError(error))
  }).pipe(
    Effect.map((entries) => entries.map((entry) => ({ name: entry.name, kind: toEntryKind(entry) })))
  )

/**
 * Live service: listing through `readdir` with file types, removal through the platform FileSystem.
 *
 * @effect FileSystem
 */
export const DirectoryTreeLive: Layer.Layer<DirectoryTree, never, FileSystem> = Layer.effect(
  DirectoryTree,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return {
      list: listDirectory,
      remove: (target: string) =>
        fs.remove(target, { recursive: true }).pipe(Effect.mapError((error) => treeFailure(error.message)))
    }
  })
)
