import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { isSameOrInside, isStrictlyInside } from "../../src/shell/migrate/path-boundary.js"

describe("path boundary", () => {
  it.effect("treats only descendants as strictly inside", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      expect(isStrictlyInside(path, "/data", "/data/a/b")).toBe(true)
      expect(isStrictlyInside(path, "/data", "/data")).toBe(false)
      expect(isStrictlyInside(path, "/data", "/data/")).toBe(false)
      expect(isStrictlyInside(path, "/data", "/data-cloud")).toBe(false)
      expect(isStrictlyInside(path, "/data", "/")).toBe(false)
      expect(isStrictlyInside(path, "/data", "/data/../other")).toBe(false)
    }).pipe(Effect.provide(Path.layer)))

  it.effect("counts the root itself as same-or-inside", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      expect(isSameOrInside(path, "/data", "/data")).toBe(true)
      expect(isSameOrInside(path, "/data", "/data/cloud")).toBe(true)
      expect(isSameOrInside(path, "/data", "/data-cloud")).toBe(false)
      expect(isSameOrInside(path, "/data", "/")).toBe(false)
    }).pipe(Effect.provide(Path.layer)))
})
