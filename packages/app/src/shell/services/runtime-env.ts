import { Context, Effect, Layer } from "effect"

export class RuntimeEnv extends Context.Tag("RuntimeEnv")<
  RuntimeEnv,
  {
    readonly argv: Effect.Effect<ReadonlyArray<string>>
    readonly cwd: Effect.Effect<string>
    readonly isInteractive: Effect.Effect<boolean>
  }
>() {}

const readProcess = (): NodeJS.Process | undefined => typeof process === "undefined" ? undefined : process

// CHANGE: wrap process access behind a typed Effect service
// WHY: tests substitute argv, cwd and interactivity
// SOURCE: n/a
// FORMAT THEOREM: forall env: argv(env) = process.argv
// PURITY: SHELL
// EFFECT: Effect<RuntimeEnv, never, never>
// INVARIANT: isInteractive is true only when stdin is a TTY
// COMPLEXITY: O(1)/O(1)
export const RuntimeEnvLive = Layer.succeed(RuntimeEnv, {
  argv: Effect.sync(() => {
    const proc = readProcess()
    return proc === undefined ? [] : [...proc.argv]
  }),
  cwd: Effect.sync(() => readProcess()?.cwd() ?? "."),
  isInteractive: Effect.sync(() => readProcess()?.stdin.isTTY === true)
})
