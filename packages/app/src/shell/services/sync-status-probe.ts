import * as Path from "@effect/platform/Path"
import { Context, Effect, HashMap, Layer, Option, pipe, Ref } from "effect"

import { findStatusFieldIndex } from "../../core/status.js"
import { type ProbeError, StatusOracle } from "./status-oracle.js"

export class SyncStatusProbe extends Context.Tag("SyncStatusProbe")<
  SyncStatusProbe,
  {
    readonly status: (pathValue: string) => Effect.Effect<string, ProbeError>
  }
>() {}

export interface ProbeSettings {
  readonly fieldScanLimit: number
  readonly defaultFieldIndex: number
}

export const defaultProbeSettings: ProbeSettings = {
  fieldScanLimit: 320,
  defaultFieldIndex: 303
}

/**
 * Builds a probe whose field-index cache lives as long as the layer.
 *
 * @param settings - Scan bound and fallback index.
 * @returns Layer requiring the oracle backend.
 *
 * @pure false - spawns oracle queries
 * @invariant after one successful scan, fieldNames is never requested again for that directory
 */
// CHANGE: cache the status column per containing directory in an explicit Ref
// WHY: a header scan spawns a shell query per folder; a failed scan says nothing about the folder
// SOURCE: n/a
// FORMAT THEOREM: forall d: scanOk(d) -> cache(d) = (found(d) ? index(d) : defaultFieldIndex)
// PURITY: SHELL
// EFFECT: Effect<SyncStatusProbe, never, StatusOracle | Path>
// INVARIANT: a failed scan falls back to defaultFieldIndex for that poll only and is retried next time
// COMPLEXITY: O(1) amortized oracle scans per directory
export const makeSyncStatusProbe = (settings: ProbeSettings) =>
  Layer.effect(
    SyncStatusProbe,
    Effect.gen(function*(_) {
      const oracle = yield* _(StatusOracle)
      const path = yield* _(Path.Path)
      const cache = yield* _(Ref.make(HashMap.empty<string, number>()))

      const discoverFieldIndex = (directory: string): Effect.Effect<number> =>
        pipe(
          oracle.fieldNames(directory, settings.fieldScanLimit),
          Effect.map((names) => {
            const index = findStatusFieldIndex(names)
            return index < 0 ? settings.defaultFieldIndex : index
          }),
          Effect.tap((index) => Ref.update(cache, HashMap.set(directory, index))),
          Effect.orElseSucceed(() => settings.defaultFieldIndex)
        )

      const fieldIndexFor = (directory: string): Effect.Effect<number> =>
        Effect.gen(function*(_) {
          const known = HashMap.get(yield* _(Ref.get(cache)), directory)
          if (Option.isSome(known)) {
            return known.value
          }
          return yield* _(discoverFieldIndex(directory))
        })

      const status = (pathValue: string): Effect.Effect<string, ProbeError> =>
        Effect.gen(function*(_) {
          const directory = path.dirname(pathValue)
          const fieldIndex = yield* _(fieldIndexFor(directory))
          return yield* _(oracle.readField(directory, path.basename(pathValue), fieldIndex))
        })

      return { status }
    })
  )

export const SyncStatusProbeLive = makeSyncStatusProbe(defaultProbeSettings)
