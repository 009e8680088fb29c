import * as Path from "@effect/platform/Path"
import type * as Terminal from "@effect/platform/Terminal"
import type * as CommandExecutor from "@effect/platform/CommandExecutor"
import type * as FileSystem from "@effect/platform/FileSystem"
import { Console, Effect, Layer, pipe } from "effect"

import type { MigrationSummary } from "../../core/transfer.js"
import { CancellationSignalLive, listenForStopKeys } from "../services/cancellation.js"
import { FileSystemLive, FileSystemService } from "../services/file-system.js"
import { RuntimeEnv } from "../services/runtime-env.js"
import { makeStatusOracleLive } from "../services/status-oracle.js"
import { SyncStatusProbeLive } from "../services/sync-status-probe.js"
import { makeTransferLogLive } from "../services/transfer-log.js"
import { runMigration } from "./orchestrator.js"
import type { MigrationError, MigrationOptions } from "./types.js"

export interface MigrationConfig {
  readonly options: MigrationOptions
  readonly logFile: string
  readonly shell: string
}

type MigrationProgramEnv =
  | RuntimeEnv
  | FileSystem.FileSystem
  | Path.Path
  | CommandExecutor.CommandExecutor
  | Terminal.Terminal

// CHANGE: assemble the live services for one run from its configuration
// WHY: the field-index cache must not outlive the run
// SOURCE: n/a
// FORMAT THEOREM: forall run: |probe instances| = 1
// PURITY: SHELL
// EFFECT: Layer<MigrationEnv, never, FileSystem | Path | CommandExecutor>
// INVARIANT: one probe instance (and so one field-index cache) per run
// COMPLEXITY: O(1)/O(1)
export const migrationLayer = (config: MigrationConfig) =>
  pipe(
    Layer.mergeAll(
      CancellationSignalLive,
      makeTransferLogLive(config.logFile),
      pipe(SyncStatusProbeLive, Layer.provide(makeStatusOracleLive(config.shell)))
    ),
    Layer.provideMerge(FileSystemLive)
  )

/**
 * Runs one migration with the stop-key listener attached when interactive.
 *
 * @param config - Validated CLI configuration.
 * @returns Effect yielding the run summary.
 *
 * @pure false
 * @effect RuntimeEnv, FileSystem, Path, CommandExecutor, Terminal
 * @invariant the key listener is interrupted when the run ends
 */
// CHANGE: compose run, listener and live layers into a single Effect program
// WHY: the key listener must stop when the run ends
// SOURCE: n/a
// FORMAT THEOREM: forall run: end(run) -> interrupted(listener)
// PURITY: SHELL
// EFFECT: Effect<MigrationSummary, MigrationError, MigrationProgramEnv>
// INVARIANT: the log directory exists before the first event is reported
// COMPLEXITY: O(n)/O(n)
export const buildMigrationProgram = (
  config: MigrationConfig
): Effect.Effect<MigrationSummary, MigrationError, MigrationProgramEnv> =>
  pipe(
    Effect.scoped(
      Effect.gen(function*(_) {
        const env = yield* _(RuntimeEnv)
        const fs = yield* _(FileSystemService)
        const path = yield* _(Path.Path)
        yield* _(fs.makeDirectory(path.dirname(config.logFile)))
        if (yield* _(env.isInteractive)) {
          yield* _(Effect.forkScoped(listenForStopKeys))
          yield* _(Console.log("Press q or Esc to stop after the current file"))
        }
        yield* _(Console.log(`Logging to ${config.logFile}`))
        return yield* _(runMigration(config.options))
      })
    ),
    Effect.provide(migrationLayer(config))
  )
