import { Clock, Duration, Effect, Option, pipe } from "effect"

import { TransferEvent } from "../../core/events.js"
import {
  advanceStability,
  decideTick,
  initialStability,
  type StabilityPolicy,
  type StabilityState
} from "../../core/stability.js"
import { classifyStatus } from "../../core/status.js"
import type { TransferTask } from "../../core/transfer.js"
import { SyncStatusProbe } from "../services/sync-status-probe.js"
import { TransferLog } from "../services/transfer-log.js"
import type { MonitorOutcome, MonitorPolicy } from "./types.js"

interface Observation {
  readonly rawStatus: string
  readonly probeFailure: Option.Option<string>
}

const succeeded = (polls: number): MonitorOutcome => ({ _tag: "Success", polls })

const timedOut = (polls: number): MonitorOutcome => ({ _tag: "TimedOut", polls })

// CHANGE: fold probe failures into a blank observation
// WHY: a failed status query is not evidence of sync
// SOURCE: n/a
// FORMAT THEOREM: forall e: ProbeError(e) -> classify = Blank
// PURITY: SHELL
// EFFECT: Effect<Observation, never, SyncStatusProbe>
// INVARIANT: ProbeError -> rawStatus = ""
// COMPLEXITY: O(1)/O(1)
const observe = (destPath: string): Effect.Effect<Observation, never, SyncStatusProbe> =>
  Effect.gen(function*(_) {
    const probe = yield* _(SyncStatusProbe)
    return yield* _(
      pipe(
        probe.status(destPath),
        Effect.match({
          onFailure: (error): Observation => ({ rawStatus: "", probeFailure: Option.some(error.reason) }),
          onSuccess: (rawStatus): Observation => ({ rawStatus, probeFailure: Option.none() })
        })
      )
    )
  })

/**
 * Polls the destination until it has been Done for the required number of
 * consecutive ticks, or until the file's own timeout has elapsed.
 *
 * @param task - Transfer whose destination is watched; startedAt anchors the timeout.
 * @param policy - Interval, timeout, threshold, matchers and run start.
 * @returns Success or TimedOut with the number of polls taken.
 *
 * @pure false - queries the oracle and sleeps between ticks
 * @effect SyncStatusProbe, TransferLog, Clock
 * @invariant the sleep between ticks is never shortened by the timeout
 * @complexity O(timeout / pollInterval) probes
 */
// CHANGE: drive the stability state machine one probe per tick
// WHY: sync is confirmed only by consecutive observations
// SOURCE: n/a
// FORMAT THEOREM: forall t: Success(t) -> done(t - N + 1 .. t)
// PURITY: SHELL
// EFFECT: Effect<MonitorOutcome, never, SyncStatusProbe | TransferLog>
// INVARIANT: Success iff stablePollsRequired consecutive Done ticks were observed
// COMPLEXITY: O(t/i)/O(1)
export const awaitStableSync = (
  task: TransferTask,
  policy: MonitorPolicy
): Effect.Effect<MonitorOutcome, never, SyncStatusProbe | TransferLog> =>
  Effect.gen(function*(_) {
    const log = yield* _(TransferLog)
    const limits: StabilityPolicy = {
      stablePollsRequired: policy.stablePollsRequired,
      timeoutMillis: Duration.toMillis(policy.timeout)
    }

    const tick = (
      state: StabilityState,
      polls: number
    ): Effect.Effect<MonitorOutcome, never, SyncStatusProbe> =>
      Effect.gen(function*(_) {
        const observation = yield* _(observe(task.destPath))
        const classification = classifyStatus(observation.rawStatus, policy.matchers)
        const next = advanceStability(state, classification)
        const now = yield* _(Clock.currentTimeMillis)
        yield* _(
          log.report(
            TransferEvent.PollTick({
              destPath: task.destPath,
              rawStatus: observation.rawStatus,
              classification,
              stableCount: next.consecutiveDoneCount,
              stableRequired: policy.stablePollsRequired,
              runElapsedMillis: now - policy.runStartedAt,
              probeFailure: observation.probeFailure
            })
          )
        )
        const decision = decideTick(next, limits, now)
        if (decision === "Success") {
          return succeeded(polls + 1)
        }
        if (decision === "TimedOut") {
          return timedOut(polls + 1)
        }
        yield* _(Effect.sleep(policy.pollInterval))
        return yield* _(tick(next, polls + 1))
      })

    return yield* _(tick(initialStability(task.startedAt), 0))
  })
