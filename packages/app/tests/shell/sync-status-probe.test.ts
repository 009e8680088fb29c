import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer, pipe, Ref } from "effect"

import { probeError, type ProbeError, StatusOracle } from "../../src/shell/services/status-oracle.js"
import { SyncStatusProbe, SyncStatusProbeLive } from "../../src/shell/services/sync-status-probe.js"

const makeOracle = (names: Effect.Effect<ReadonlyArray<string>, ProbeError>) =>
  Effect.gen(function*(_) {
    const calls = yield* _(Ref.make<ReadonlyArray<string>>([]))
    const record = (call: string) => Ref.update(calls, (current) => [...current, call])
    const layer = Layer.succeed(StatusOracle, {
      fieldNames: (directory, limit) => pipe(record(`scan ${directory} ${limit}`), Effect.zipRight(names)),
      readField: (directory, itemName, fieldIndex) =>
        pipe(
          record(`read ${directory} ${itemName} ${fieldIndex}`),
          Effect.as(itemName === "missing.txt" ? "" : "Always available on this device")
        )
    })
    return { calls, layer }
  })

const probeWith = <A, E>(
  names: Effect.Effect<ReadonlyArray<string>, ProbeError>,
  use: Effect.Effect<A, E, SyncStatusProbe>
) =>
  Effect.gen(function*(_) {
    const oracle = yield* _(makeOracle(names))
    const result = yield* _(
      pipe(use, Effect.provide(pipe(SyncStatusProbeLive, Layer.provide(Layer.merge(oracle.layer, Path.layer)))))
    )
    return { result, calls: yield* _(Ref.get(oracle.calls)) }
  })

const statusesOf = (paths: ReadonlyArray<string>) =>
  Effect.gen(function*(_) {
    const probe = yield* _(SyncStatusProbe)
    return yield* _(Effect.forEach(paths, (pathValue) => probe.status(pathValue)))
  })

describe("SyncStatusProbe", () => {
  it.effect("discovers the status column once per directory", () =>
    Effect.gen(function*(_) {
      const { calls, result } = yield* _(
        probeWith(Effect.succeed(["Name", "Size", "Availability status"]), statusesOf(["/d/a.txt", "/d/b.txt"]))
      )
      expect(result).toEqual(["Always available on this device", "Always available on this device"])
      expect(calls).toEqual(["scan /d 320", "read /d a.txt 2", "read /d b.txt 2"])
    }))

  it.effect("scans each containing directory separately", () =>
    Effect.gen(function*(_) {
      const { calls } = yield* _(
        probeWith(Effect.succeed(["Name", "Status"]), statusesOf(["/d/a.txt", "/e/b.txt", "/d/c.txt"]))
      )
      expect(calls).toEqual(["scan /d 320", "read /d a.txt 1", "scan /e 320", "read /e b.txt 1", "read /d c.txt 1"])
    }))

  it.effect("falls back to the default column when no header matches", () =>
    Effect.gen(function*(_) {
      const { calls } = yield* _(probeWith(Effect.succeed(["Name", "Size"]), statusesOf(["/d/a.txt"])))
      expect(calls).toEqual(["scan /d 320", "read /d a.txt 303"])
    }))

  it.effect("retries the scan after a failed one instead of caching the fallback", () =>
    Effect.gen(function*(_) {
      const scans = yield* _(Ref.make(0))
      const flakyNames = pipe(
        Ref.getAndUpdate(scans, (count) => count + 1),
        Effect.flatMap((count): Effect.Effect<ReadonlyArray<string>, ProbeError> =>
          count === 0 ? Effect.fail(probeError("/d", "Status query timed out")) : Effect.succeed(["Status"])
        )
      )
      const { calls } = yield* _(probeWith(flakyNames, statusesOf(["/d/a.txt", "/d/b.txt", "/d/c.txt"])))
      expect(calls).toEqual([
        "scan /d 320",
        "read /d a.txt 303",
        "scan /d 320",
        "read /d b.txt 0",
        "read /d c.txt 0"
      ])
    }))

  it.effect("caches the default column after a scan that finds no status header", () =>
    Effect.gen(function*(_) {
      const { calls } = yield* _(probeWith(Effect.succeed(["Name", "Size"]), statusesOf(["/d/a.txt", "/d/b.txt"])))
      expect(calls).toEqual(["scan /d 320", "read /d a.txt 303", "read /d b.txt 303"])
    }))

  it.effect("returns the raw value of the status column", () =>
    Effect.gen(function*(_) {
      const { result } = yield* _(probeWith(Effect.succeed(["Status"]), statusesOf(["/d/missing.txt"])))
      expect(result).toEqual([""])
    }))
})
