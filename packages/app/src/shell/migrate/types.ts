import type { Duration } from "effect"

import type { StatusMatchers } from "../../core/status.js"
import type { MaxFiles } from "../../core/transfer.js"

export interface MigrationError {
  readonly _tag: "MigrationError"
  readonly path: string
  readonly reason: string
}

export interface MigrationOptions {
  readonly sourceRoot: string
  readonly destinationRoot: string
  readonly maxFiles: MaxFiles
  readonly pollInterval: Duration.Duration
  readonly timeout: Duration.Duration
  readonly stablePollsRequired: number
  readonly matchers: StatusMatchers
  readonly pruneEmptyDirectories: boolean
  readonly pruneWholeSourceTree: boolean
}

export interface MonitorPolicy {
  readonly pollInterval: Duration.Duration
  readonly timeout: Duration.Duration
  readonly stablePollsRequired: number
  readonly matchers: StatusMatchers
  readonly runStartedAt: number
}

export type MonitorOutcome =
  | { readonly _tag: "Success"; readonly polls: number }
  | { readonly _tag: "TimedOut"; readonly polls: number }

// CHANGE: one error shape for every filesystem step of the pipeline
// WHY: every log record names the path that failed
// SOURCE: n/a
// FORMAT THEOREM: forall e: MigrationError(e) -> path(e) != undefined
// PURITY: SHELL
// EFFECT: n/a
// INVARIANT: MigrationError contains path and reason for logging
// COMPLEXITY: O(1)/O(1)
export const migrationError = (pathValue: string, reason: string): MigrationError => ({
  _tag: "MigrationError",
  path: pathValue,
  reason
})

export const describeCause = (error: unknown, fallback: string): string =>
  error instanceof Error ? `${fallback} (${error.message})` : fallback
