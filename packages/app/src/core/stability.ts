import type { SyncStatusClass } from "./status.js"

export interface StabilityState {
  readonly consecutiveDoneCount: number
  /** Start of the file's transfer; the timeout is measured from here. */
  readonly pollStartedAt: number
}

export interface StabilityPolicy {
  readonly stablePollsRequired: number
  readonly timeoutMillis: number
}

export type StabilityDecision = "Success" | "TimedOut" | "Continue"

export const initialStability = (pollStartedAt: number): StabilityState => ({
  consecutiveDoneCount: 0,
  pollStartedAt
})

/**
 * Folds one classified poll into the stability counter.
 *
 * @pure true
 * @invariant classification !== "Done" -> consecutiveDoneCount = 0
 * @complexity O(1) time / O(1) space
 */
// CHANGE: count only uninterrupted runs of Done observations
// WHY: a single Done report can be transient or stale
// SOURCE: n/a
// FORMAT THEOREM: forall s, c: c != Done -> advance(s, c).count = 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: count' = Done ? count + 1 : 0
// COMPLEXITY: O(1)/O(1)
export const advanceStability = (
  state: StabilityState,
  classification: SyncStatusClass
): StabilityState => ({
  ...state,
  consecutiveDoneCount: classification === "Done" ? state.consecutiveDoneCount + 1 : 0
})

/**
 * Decides the outcome of a tick after the counter has been advanced.
 *
 * @param state - Counter after the current poll.
 * @param policy - Threshold and timeout.
 * @param nowMillis - Clock reading taken at this tick.
 *
 * @pure true
 * @invariant Success takes precedence over TimedOut on the same tick
 */
// CHANGE: evaluate threshold first, then the coarse timeout
// WHY: a file confirmed on its last allowed tick must still count as synced
// SOURCE: n/a
// FORMAT THEOREM: forall s, t: count(s) >= N -> decide(s, t) = Success
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: count >= N -> Success; now - pollStartedAt >= timeout -> TimedOut
// COMPLEXITY: O(1)/O(1)
export const decideTick = (
  state: StabilityState,
  policy: StabilityPolicy,
  nowMillis: number
): StabilityDecision => {
  if (state.consecutiveDoneCount >= policy.stablePollsRequired) {
    return "Success"
  }
  if (nowMillis - state.pollStartedAt >= policy.timeoutMillis) {
    return "TimedOut"
  }
  return "Continue"
}
