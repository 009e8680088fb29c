import { Data } from "effect"
import type { Option } from "effect"

import type { SyncStatusClass } from "./status.js"
import type { MigrationSummary, TransferTask } from "./transfer.js"

export type TransferEvent = Data.TaggedEnum<{
  RunStarted: {
    readonly sourceRoot: string
    readonly destinationRoot: string
    readonly discovered: number
    readonly selected: number
  }
  FileStarted: {
    readonly task: TransferTask
    readonly position: number
    readonly total: number
  }
  FileCopied: { readonly task: TransferTask }
  CopyFailed: { readonly task: TransferTask; readonly reason: string }
  PollTick: {
    readonly destPath: string
    readonly rawStatus: string
    readonly classification: SyncStatusClass
    readonly stableCount: number
    readonly stableRequired: number
    readonly runElapsedMillis: number
    readonly probeFailure: Option.Option<string>
  }
  SyncConfirmed: { readonly task: TransferTask; readonly polls: number }
  SyncTimedOut: { readonly task: TransferTask; readonly polls: number }
  SourceDeleted: { readonly task: TransferTask }
  DeleteFailed: { readonly task: TransferTask; readonly reason: string }
  DirectoryRemoved: { readonly path: string }
  PruneSkipped: { readonly path: string; readonly reason: string }
  CancellationObserved: { readonly remaining: number }
  RunFinished: { readonly summary: MigrationSummary }
}>

// CHANGE: expose pipeline progress as plain tagged values for any presentation layer
// WHY: the pipeline does not format its own output
// SOURCE: n/a
// FORMAT THEOREM: forall t: one constructor per transition t
// PURITY: CORE
// INVARIANT: one constructor per observable pipeline transition
export const TransferEvent = Data.taggedEnum<TransferEvent>()
