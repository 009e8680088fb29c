import { Match, Option } from "effect"

import type { TransferEvent } from "./events.js"

export type LogLevel = "INFO" | "WARN" | "ERROR" | "POLL"

const pad2 = (value: number): string => value.toString().padStart(2, "0")

/**
 * Renders a duration as hh:mm:ss; hours are not wrapped.
 *
 * @pure true
 * @invariant formatElapsed(3_723_000) = "01:02:03"
 */
export const formatElapsed = (millis: number): string => {
  const totalSeconds = Math.max(0, Math.floor(millis / 1000))
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`
}

export const eventLevel = (event: TransferEvent): LogLevel =>
  Match.value(event).pipe(
    Match.tag("PollTick", (): LogLevel => "POLL"),
    Match.tag("CopyFailed", "DeleteFailed", (): LogLevel => "ERROR"),
    Match.tag("SyncTimedOut", "PruneSkipped", (): LogLevel => "WARN"),
    Match.orElse((): LogLevel => "INFO")
  )

const describePoll = (event: Extract<TransferEvent, { readonly _tag: "PollTick" }>): string => {
  const flags = [
    `blank=${event.classification === "Blank"}`,
    `inProgress=${event.classification === "InProgress"}`,
    `done=${event.classification === "Done"}`
  ].join(" ")
  const failure = Option.match(event.probeFailure, {
    onNone: () => "",
    onSome: (reason) => ` probeError=${JSON.stringify(reason)}`
  })
  return `status=${JSON.stringify(event.rawStatus)} ${flags} ` +
    `stable=${event.stableCount}/${event.stableRequired} ` +
    `elapsed=${formatElapsed(event.runElapsedMillis)} path=${event.destPath}${failure}`
}

/**
 * Human-readable message for a pipeline event, without timestamp or level.
 *
 * @pure true
 * @complexity O(|message|)
 */
// CHANGE: keep wording of every log record in one exhaustive match
// WHY: a new event kind cannot ship without a log line
// SOURCE: n/a
// FORMAT THEOREM: forall e: describe(e) is defined
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every TransferEvent tag yields exactly one line
// COMPLEXITY: O(1)/O(1)
export const describeEvent = (event: TransferEvent): string =>
  Match.value(event).pipe(
    Match.tag("RunStarted", (e) =>
      `Run started: ${e.selected} of ${e.discovered} files from ${e.sourceRoot} to ${e.destinationRoot}`),
    Match.tag("FileStarted", (e) => `[${e.position}/${e.total}] Copying ${e.task.sourcePath} -> ${e.task.destPath}`),
    Match.tag("FileCopied", (e) => `Copied ${e.task.sourcePath} -> ${e.task.destPath}; waiting for sync`),
    Match.tag("CopyFailed", (e) => `Copy failed for ${e.task.sourcePath}: ${e.reason}`),
    Match.tag("PollTick", describePoll),
    Match.tag("SyncConfirmed", (e) => `Sync confirmed for ${e.task.destPath} after ${e.polls} polls`),
    Match.tag("SyncTimedOut", (e) =>
      `Timed out after ${e.polls} polls waiting for ${e.task.destPath}; source preserved at ${e.task.sourcePath}`),
    Match.tag("SourceDeleted", (e) => `Deleted source ${e.task.sourcePath}`),
    Match.tag("DeleteFailed", (e) => `Could not delete source ${e.task.sourcePath}: ${e.reason}`),
    Match.tag("DirectoryRemoved", (e) => `Removed empty directory ${e.path}`),
    Match.tag("PruneSkipped", (e) => `Skipped pruning ${e.path}: ${e.reason}`),
    Match.tag("CancellationObserved", (e) => `Stop requested; ${e.remaining} files not started`),
    Match.tag("RunFinished", ({ summary }) =>
      `Run finished: deleted=${summary.deleted} preserved=${summary.preserved} ` +
      `failed=${summary.failed} of ${summary.selected}${summary.cancelled ? " (stopped early)" : ""}`),
    Match.exhaustive
  )

// CHANGE: single record format shared by file and console sinks
// WHY: console and file output must read the same
// SOURCE: n/a
// FORMAT THEOREM: forall t, e: line(t, e) = prefix(t, e) + describe(e)
// PURITY: CORE
// INVARIANT: formatLogLine(t, e) = "[" iso(t) "][" level(e) "] " describe(e)
export const formatLogLine = (timestampMillis: number, event: TransferEvent): string =>
  `[${new Date(timestampMillis).toISOString()}][${eventLevel(event)}] ${describeEvent(event)}`

export const defaultLogFileName = (timestampMillis: number): string =>
  `synced-move-${new Date(timestampMillis).toISOString().replace(/[:.]/g, "-")}.log`
