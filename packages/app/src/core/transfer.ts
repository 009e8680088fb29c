import { Array as Arr, Order } from "effect"

export type MaxFiles = "all" | number

export interface TransferTask {
  readonly sourcePath: string
  readonly destPath: string
  readonly startedAt: number
}

export type FileOutcome = "Deleted" | "Preserved" | "Failed"

export interface MigrationSummary {
  readonly selected: number
  readonly deleted: number
  readonly preserved: number
  readonly failed: number
  readonly cancelled: boolean
}

/**
 * Sorts candidate files by full path and applies the file cap.
 *
 * @param files - Every eligible source file.
 * @param maxFiles - Positive cap or "all".
 * @returns The first maxFiles paths in ascending order.
 *
 * @pure true
 * @invariant result is a prefix of sort(files)
 * @complexity O(n log n) time / O(n) space
 */
// CHANGE: make the processing order deterministic before capping
// WHY: repeated runs with a cap pick the same files
// SOURCE: n/a
// FORMAT THEOREM: forall fs, n: select(fs, n) = take(sort(fs), n)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: |result| = min(|files|, maxFiles)
// COMPLEXITY: O(n log n)/O(n)
export const selectFiles = (
  files: ReadonlyArray<string>,
  maxFiles: MaxFiles
): ReadonlyArray<string> => {
  const sorted = Arr.sort(files, Order.string)
  return maxFiles === "all" ? sorted : Arr.take(sorted, maxFiles)
}

export const emptySummary = (selected: number): MigrationSummary => ({
  selected,
  deleted: 0,
  preserved: 0,
  failed: 0,
  cancelled: false
})

// CHANGE: tally terminal outcomes for the end-of-run report
// WHY: the summary must account for every started file
// SOURCE: n/a
// FORMAT THEOREM: forall s: deleted + preserved + failed = started
// PURITY: CORE
// INVARIANT: deleted + preserved + failed = number of files started
export const recordOutcome = (
  summary: MigrationSummary,
  outcome: FileOutcome
): MigrationSummary => {
  switch (outcome) {
    case "Deleted":
      return { ...summary, deleted: summary.deleted + 1 }
    case "Preserved":
      return { ...summary, preserved: summary.preserved + 1 }
    case "Failed":
      return { ...summary, failed: summary.failed + 1 }
  }
}
