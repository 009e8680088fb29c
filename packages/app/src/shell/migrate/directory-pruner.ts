import * as Path from "@effect/platform/Path"
import { Effect, pipe } from "effect"

import { TransferEvent } from "../../core/events.js"
import { ancestorsWithinBoundary, buildPruneBoundary, orderDeepestFirst, type PruneBoundary } from "../../core/prune.js"
import { type DirectoryEntry, FileSystemService } from "../services/file-system.js"
import { TransferLog } from "../services/transfer-log.js"
import { isStrictlyInside } from "./path-boundary.js"
import { type MigrationError, migrationError } from "./types.js"

type PrunerEnv = FileSystemService | TransferLog | Path.Path

const forEach = Effect.forEach

const buildBoundary = (path: Path.Path, root: string): PruneBoundary =>
  buildPruneBoundary(root, (candidate) => isStrictlyInside(path, root, candidate))

const skip = (error: MigrationError) =>
  Effect.gen(function*(_) {
    const log = yield* _(TransferLog)
    yield* _(log.report(TransferEvent.PruneSkipped({ path: error.path, reason: error.reason })))
  })

// CHANGE: list nested directories without following links, skipping unreadable ones
// WHY: a link could lead outside the root boundary
// SOURCE: n/a
// FORMAT THEOREM: forall d in result: inside(scope, d)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, never, FileSystemService | TransferLog>
// INVARIANT: result excludes root itself
// COMPLEXITY: O(n)/O(n)
const collectDirectories = (
  root: string
): Effect.Effect<ReadonlyArray<string>, never, FileSystemService | TransferLog> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const entries = yield* _(
      pipe(
        fs.readDirectory(root),
        Effect.catchAll((error) => pipe(skip(error), Effect.as<ReadonlyArray<DirectoryEntry>>([])))
      )
    )
    const chunks = yield* _(
      forEach(
        entries.filter((entry) => entry.kind === "directory"),
        (entry) =>
          pipe(
            collectDirectories(entry.path),
            Effect.map((nested) => [entry.path, ...nested])
          )
      )
    )
    return chunks.flat()
  })

type RemovalResult = "removed" | "kept" | "failed"

// CHANGE: re-check emptiness at deletion time and report instead of failing
// WHY: prune failures never fail a file that was already moved
// SOURCE: n/a
// FORMAT THEOREM: forall d: gainedEntry(d) -> kept(d)
// PURITY: SHELL
// EFFECT: Effect<RemovalResult, never, FileSystemService | TransferLog>
// INVARIANT: a non-empty directory is never removed
// COMPLEXITY: O(1)/O(1)
const removeIfEmpty = (directory: string): Effect.Effect<RemovalResult, never, FileSystemService | TransferLog> =>
  pipe(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystemService)
      const log = yield* _(TransferLog)
      const empty = yield* _(fs.isEmptyDirectory(directory))
      if (!empty) {
        return "kept" as const
      }
      yield* _(fs.removeEmptyDirectory(directory))
      yield* _(log.report(TransferEvent.DirectoryRemoved({ path: directory })))
      return "removed" as const
    }),
    Effect.catchAll((error) => pipe(skip(error), Effect.as("failed" as const)))
  )

const walkUpward = (
  ancestors: ReadonlyArray<string>
): Effect.Effect<ReadonlyArray<string>, never, FileSystemService | TransferLog> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const [ancestor, ...rest] = ancestors
    if (ancestor === undefined) {
      return []
    }
    const present = yield* _(
      pipe(
        fs.exists(ancestor),
        Effect.catchAll((error) => pipe(skip(error), Effect.as(false)))
      )
    )
    if (!present) {
      return []
    }
    const result = yield* _(removeIfEmpty(ancestor))
    if (result !== "removed") {
      return []
    }
    return [ancestor, ...(yield* _(walkUpward(rest)))]
  })

/**
 * Removes directories emptied by a move, deepest first, then walks upward
 * until a non-empty ancestor or the root boundary.
 *
 * @param rootBoundary - Directory that is never removed nor crossed.
 * @param scope - Directory whose subtree and ancestors are cleaned.
 * @returns Paths removed, in removal order.
 *
 * @pure false - reads and removes directories
 * @effect FileSystemService, TransferLog, Path
 * @invariant forall d in result: d is strictly inside rootBoundary
 * @complexity O(n) where n = directories under scope plus its depth
 */
// CHANGE: prune empty source directories after each confirmed delete
// WHY: moves leave empty folders behind
// SOURCE: n/a
// FORMAT THEOREM: forall d in removed: strictlyInside(root, d)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, never, FileSystemService | TransferLog | Path>
// INVARIANT: every failure is logged as PruneSkipped and the remaining steps still run
// COMPLEXITY: O(n log n)/O(n)
export const pruneEmptyDirectories = (
  rootBoundary: string,
  scope: string
): Effect.Effect<ReadonlyArray<string>, never, PrunerEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const path = yield* _(Path.Path)
    const root = path.resolve(rootBoundary)
    const target = path.resolve(scope)
    const boundary = buildBoundary(path, root)

    if (target !== root && !boundary.isStrictlyInside(target)) {
      yield* _(skip(migrationError(target, "Scope lies outside the root boundary")))
      return []
    }

    const present = yield* _(
      pipe(
        fs.exists(target),
        Effect.catchAll((error) => pipe(skip(error), Effect.as(false)))
      )
    )
    if (!present) {
      return []
    }

    const nested = yield* _(collectDirectories(target))

    const removed: Array<string> = []
    for (const directory of orderDeepestFirst(nested)) {
      if (boundary.isStrictlyInside(directory) && (yield* _(removeIfEmpty(directory))) === "removed") {
        removed.push(directory)
      }
    }

    if (boundary.isStrictlyInside(target) && (yield* _(removeIfEmpty(target))) === "removed") {
      removed.push(target)
    }

    const ancestors = ancestorsWithinBoundary(target, boundary, (value) => path.dirname(value))
    removed.push(...(yield* _(walkUpward(ancestors))))
    return removed
  })
