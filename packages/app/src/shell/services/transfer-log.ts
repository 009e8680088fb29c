import { Clock, Console, Context, Effect, Layer, pipe } from "effect"

import type { TransferEvent } from "../../core/events.js"
import { eventLevel, formatLogLine } from "../../core/log-line.js"
import { FileSystemService } from "./file-system.js"

export class TransferLog extends Context.Tag("TransferLog")<
  TransferLog,
  {
    readonly report: (event: TransferEvent) => Effect.Effect<void>
  }
>() {}

const echo = (event: TransferEvent, line: string): Effect.Effect<void> => {
  const level = eventLevel(event)
  if (level === "POLL") {
    return Effect.void
  }
  return level === "ERROR" || level === "WARN" ? Console.error(line) : Console.log(line)
}

/**
 * Writes every event as one timestamped line to the log file and echoes
 * non-POLL lines to the console.
 *
 * @param logFile - Absolute path of the append-only log.
 */
// CHANGE: render pipeline events through one file + console sink
// WHY: the log file is the durable audit of every delete
// SOURCE: n/a
// FORMAT THEOREM: forall e: report(e) -> appended(line(e))
// PURITY: SHELL
// EFFECT: Effect<TransferLog, never, FileSystemService>
// INVARIANT: a failed append is reported on stderr and does not fail report
// COMPLEXITY: O(1)/O(1) per event
export const makeTransferLogLive = (logFile: string) =>
  Layer.effect(
    TransferLog,
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystemService)

      const report = (event: TransferEvent): Effect.Effect<void> =>
        Effect.gen(function*(_) {
          const now = yield* _(Clock.currentTimeMillis)
          const line = formatLogLine(now, event)
          yield* _(
            pipe(
              fs.appendFileString(logFile, `${line}\n`),
              Effect.catchAll((error) => Console.error(`Log write failed: ${error.reason}`))
            )
          )
          yield* _(echo(event, line))
        })

      return { report }
    })
  )
