import * as Terminal from "@effect/platform/Terminal"
import { Console, Context, Effect, Layer, pipe, Ref } from "effect"

export class CancellationSignal extends Context.Tag("CancellationSignal")<
  CancellationSignal,
  {
    readonly request: Effect.Effect<void>
    readonly isRequested: Effect.Effect<boolean>
  }
>() {}

// CHANGE: model the stop request as a set-once flag instead of a signal handler
// WHY: a started file must reach a terminal outcome
// SOURCE: n/a
// FORMAT THEOREM: forall t1 < t2: requested(t1) -> requested(t2)
// PURITY: SHELL
// EFFECT: Effect<CancellationSignal, never, never>
// INVARIANT: once isRequested yields true it never yields false again
// COMPLEXITY: O(1)/O(1)
export const CancellationSignalLive = Layer.effect(
  CancellationSignal,
  Effect.gen(function*(_) {
    const flag = yield* _(Ref.make(false))
    return {
      request: Ref.set(flag, true),
      isRequested: Ref.get(flag)
    }
  })
)

const stopKeys: ReadonlySet<string> = new Set(["q", "escape"])

export const isStopKey = (input: Terminal.UserInput): boolean =>
  stopKeys.has(input.key.name.toLowerCase()) || (input.key.ctrl && input.key.name === "c")

/**
 * Reads key presses until a stop key arrives, then raises the cancellation flag.
 *
 * @pure false - reads the terminal in raw mode
 * @effect Terminal, CancellationSignal
 * @invariant the flag is raised at most by one key press; other keys are ignored
 */
// CHANGE: translate stop keys into a cooperative request instead of interrupting the run
// WHY: interrupting mid-file could leave a copy unconfirmed
// SOURCE: n/a
// FORMAT THEOREM: forall k: isStopKey(k) -> requested
// PURITY: SHELL
// EFFECT: Effect<void, never, Terminal | CancellationSignal>
// INVARIANT: Ctrl+C surfaces as QuitException and is treated as a stop key
// COMPLEXITY: O(k) where k = keys pressed
export const listenForStopKeys: Effect.Effect<void, never, Terminal.Terminal | CancellationSignal> = Effect.gen(
  function*(_) {
    const terminal = yield* _(Terminal.Terminal)
    const signal = yield* _(CancellationSignal)
    const stop = pipe(
      signal.request,
      Effect.zipRight(Console.log("Stop requested; the current file will finish before the run ends"))
    )

    const loop = (): Effect.Effect<void> =>
      pipe(
        terminal.readInput,
        Effect.flatMap((input) => isStopKey(input) ? stop : loop()),
        Effect.catchTag("QuitException", () => stop)
      )

    yield* _(loop())
  }
)
