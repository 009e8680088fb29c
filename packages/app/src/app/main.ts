#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, pipe } from "effect"

import { RuntimeEnvLive } from "../shell/services/runtime-env.js"
import { program } from "./program.js"

// CHANGE: run the migration program through the Node runtime with all live layers
// WHY: runMain owns process exit codes and interruption
// SOURCE: n/a
// FORMAT THEOREM: forall run: exit(run) = 0 <-> success(program)
// PURITY: SHELL
// EFFECT: Effect<void, CliError | MigrationError, RuntimeEnv | NodeContext>
// INVARIANT: program executed with NodeContext + RuntimeEnvLive
// COMPLEXITY: O(1)/O(1)
const main = pipe(
  program,
  Effect.provide(Layer.merge(RuntimeEnvLive, NodeContext.layer))
)

NodeRuntime.runMain(main, { disableErrorReporting: true })
