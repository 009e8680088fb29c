import * as Path from "@effect/platform/Path"
import { Clock, Effect, Either, Match } from "effect"

import { TransferEvent } from "../../core/events.js"
import {
  emptySummary,
  type FileOutcome,
  type MigrationSummary,
  recordOutcome,
  selectFiles,
  type TransferTask
} from "../../core/transfer.js"
import { CancellationSignal } from "../services/cancellation.js"
import { FileSystemService } from "../services/file-system.js"
import type { SyncStatusProbe } from "../services/sync-status-probe.js"
import { TransferLog } from "../services/transfer-log.js"
import { pruneEmptyDirectories } from "./directory-pruner.js"
import { awaitStableSync } from "./stability-monitor.js"
import type { MigrationError, MigrationOptions, MonitorPolicy } from "./types.js"

export type MigrationEnv =
  | FileSystemService
  | SyncStatusProbe
  | TransferLog
  | CancellationSignal
  | Path.Path

const forEach = Effect.forEach

// CHANGE: enumerate every regular file below the source root
// WHY: only regular files are migrated
// SOURCE: n/a
// FORMAT THEOREM: forall f in result: isFile(f)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, MigrationError, FileSystemService>
// INVARIANT: returned paths are absolute; links and special files are skipped
// COMPLEXITY: O(n)/O(n)
export const collectFiles = (
  root: string
): Effect.Effect<ReadonlyArray<string>, MigrationError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const entries = yield* _(fs.readDirectory(root))
    const chunks = yield* _(
      forEach(entries, (entry) =>
        Match.value(entry.kind).pipe(
          Match.when("directory", () => collectFiles(entry.path)),
          Match.when("file", () => Effect.succeed([entry.path])),
          Match.when("other", () => Effect.succeed([])),
          Match.exhaustive
        ))
    )
    return chunks.flat()
  })

// CHANGE: copy one file under the destination root, preserving its relative path
// WHY: the destination mirrors the source layout
// SOURCE: n/a
// FORMAT THEOREM: forall f: relative(dest(f)) = relative(f)
// PURITY: SHELL
// EFFECT: Effect<void, MigrationError, FileSystemService | Path>
// INVARIANT: parent chain of destPath exists after success; an existing file is overwritten
// COMPLEXITY: O(size)/O(1)
const copyToDestination = (
  task: TransferTask
): Effect.Effect<void, MigrationError, FileSystemService | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const path = yield* _(Path.Path)
    yield* _(fs.makeDirectory(path.dirname(task.destPath)))
    yield* _(fs.copyFile(task.sourcePath, task.destPath))
  })

/**
 * Runs copy, confirmation, delete and prune for a single file.
 *
 * @returns Terminal outcome; every failure is logged and absorbed.
 *
 * @pure false
 * @invariant the source is removed only after awaitStableSync yields Success
 */
// CHANGE: per-file confirm-then-delete pipeline
// WHY: a source is deleted only after its copy is confirmed synced
// SOURCE: n/a
// FORMAT THEOREM: forall f: deleted(f) -> confirmed(copy(f))
// PURITY: SHELL
// EFFECT: Effect<FileOutcome, never, MigrationEnv>
// INVARIANT: TimedOut -> source untouched
// COMPLEXITY: O(size + polls)/O(1)
export const processFile = (
  task: TransferTask,
  options: MigrationOptions,
  policy: MonitorPolicy
): Effect.Effect<FileOutcome, never, MigrationEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const log = yield* _(TransferLog)
    const path = yield* _(Path.Path)

    const copied = yield* _(Effect.either(copyToDestination(task)))
    if (Either.isLeft(copied)) {
      yield* _(log.report(TransferEvent.CopyFailed({ task, reason: copied.left.reason })))
      return "Failed" as const
    }
    yield* _(log.report(TransferEvent.FileCopied({ task })))

    const confirmation = yield* _(awaitStableSync(task, policy))
    if (confirmation._tag === "TimedOut") {
      yield* _(log.report(TransferEvent.SyncTimedOut({ task, polls: confirmation.polls })))
      return "Preserved" as const
    }
    yield* _(log.report(TransferEvent.SyncConfirmed({ task, polls: confirmation.polls })))

    const deleted = yield* _(Effect.either(fs.removeFile(task.sourcePath)))
    if (Either.isLeft(deleted)) {
      yield* _(log.report(TransferEvent.DeleteFailed({ task, reason: deleted.left.reason })))
      return "Failed" as const
    }
    yield* _(log.report(TransferEvent.SourceDeleted({ task })))

    if (options.pruneEmptyDirectories) {
      const scope = options.pruneWholeSourceTree
        ? options.sourceRoot
        : path.dirname(task.sourcePath)
      yield* _(pruneEmptyDirectories(options.sourceRoot, scope))
    }
    return "Deleted" as const
  })

/**
 * Migrates the selected files one at a time, honoring the stop request only
 * between files.
 *
 * @param options - Resolved roots, cap, poll policy and prune switches.
 * @returns Per-outcome tally of the run.
 *
 * @pure false - copies, deletes and polls
 * @effect FileSystemService, SyncStatusProbe, TransferLog, CancellationSignal, Path
 * @invariant at most one file is between copy and terminal outcome at any time
 * @complexity O(n) files, each O(size + polls)
 */
// CHANGE: sequential migration loop with a single cancellation checkpoint per file
// WHY: at most one file is in flight
// SOURCE: n/a
// FORMAT THEOREM: forall i: started(i + 1) -> finished(i)
// PURITY: SHELL
// EFFECT: Effect<MigrationSummary, MigrationError, MigrationEnv>
// INVARIANT: files are started in ascending path order; only enumeration failure is fatal
// COMPLEXITY: O(n log n + sum(size + polls))/O(n)
export const runMigration = (
  options: MigrationOptions
): Effect.Effect<MigrationSummary, MigrationError, MigrationEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path.Path)
    const log = yield* _(TransferLog)
    const signal = yield* _(CancellationSignal)
    const sourceRoot = path.resolve(options.sourceRoot)
    const destinationRoot = path.resolve(options.destinationRoot)
    const resolved: MigrationOptions = { ...options, sourceRoot, destinationRoot }
    const runStartedAt = yield* _(Clock.currentTimeMillis)

    const discovered = yield* _(collectFiles(sourceRoot))
    const selected = selectFiles(discovered, options.maxFiles)
    yield* _(
      log.report(
        TransferEvent.RunStarted({
          sourceRoot,
          destinationRoot,
          discovered: discovered.length,
          selected: selected.length
        })
      )
    )

    const policy: MonitorPolicy = {
      pollInterval: options.pollInterval,
      timeout: options.timeout,
      stablePollsRequired: options.stablePollsRequired,
      matchers: options.matchers,
      runStartedAt
    }

    let summary = emptySummary(selected.length)
    for (const [index, sourcePath] of selected.entries()) {
      if (yield* _(signal.isRequested)) {
        yield* _(log.report(TransferEvent.CancellationObserved({ remaining: selected.length - index })))
        summary = { ...summary, cancelled: true }
        break
      }
      const task: TransferTask = {
        sourcePath,
        destPath: path.join(destinationRoot, path.relative(sourceRoot, sourcePath)),
        startedAt: yield* _(Clock.currentTimeMillis)
      }
      yield* _(log.report(TransferEvent.FileStarted({ task, position: index + 1, total: selected.length })))
      const outcome = yield* _(processFile(task, resolved, policy))
      summary = recordOutcome(summary, outcome)
    }

    yield* _(log.report(TransferEvent.RunFinished({ summary })))
    return summary
  })
