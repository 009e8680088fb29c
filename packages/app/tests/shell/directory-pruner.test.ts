import { NodeContext } from "@effect/platform-node"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer, pipe, Ref } from "effect"

import { pruneEmptyDirectories } from "../../src/shell/migrate/directory-pruner.js"
import { FileSystemLive, FileSystemService } from "../../src/shell/services/file-system.js"
import { makeCapturingLog } from "../support/fakes.js"
import { buildTestPaths, exists, makeDirectory, makeTempDir, writeFile } from "../support/fs-helpers.js"

const testPaths = buildTestPaths(new URL(import.meta.url), "synced-move-tests")

const withTempDir = Effect.gen(function*(_) {
  const { tempBase } = yield* _(testPaths)
  return yield* _(makeTempDir(tempBase, "prune-"))
})

const runPrune = (
  root: string,
  scope: string,
  fileSystem: Layer.Layer<FileSystemService, never, FileSystem.FileSystem | Path.Path> = FileSystemLive
) =>
  Effect.gen(function*(_) {
    const { events, layer } = yield* _(makeCapturingLog)
    const removed = yield* _(
      pipe(pruneEmptyDirectories(root, scope), Effect.provide(Layer.merge(fileSystem, layer)))
    )
    return { removed, events: yield* _(Ref.get(events)) }
  })

// A file lands in `target` right after its emptiness check reports true.
const fillAfterEmptinessCheck = (target: string) =>
  pipe(
    Layer.effect(
      FileSystemService,
      Effect.gen(function*(_) {
        const live = yield* _(FileSystemService)
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        return {
          ...live,
          isEmptyDirectory: (pathValue: string) =>
            pipe(
              live.isEmptyDirectory(pathValue),
              Effect.tap((empty) =>
                empty && pathValue === target
                  ? Effect.orDie(fs.writeFileString(path.join(pathValue, "late.txt"), "late"))
                  : Effect.void
              )
            )
        }
      })
    ),
    Layer.provide(FileSystemLive)
  )

describe("pruneEmptyDirectories", () => {
  it.scopedLive("removes an emptied chain up to, but not including, the root", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const root = path.join(yield* _(withTempDir), "src")
      yield* _(makeDirectory(path.join(root, "a", "b", "c")))

      const { removed } = yield* _(runPrune(root, path.join(root, "a", "b", "c")))

      expect(removed).toEqual([
        path.join(root, "a", "b", "c"),
        path.join(root, "a", "b"),
        path.join(root, "a")
      ])
      expect(yield* _(exists(root))).toBe(true)
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scopedLive("stops at the first ancestor that still holds a file", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const root = path.join(yield* _(withTempDir), "src")
      yield* _(makeDirectory(path.join(root, "a", "b", "c")))
      yield* _(writeFile(path.join(root, "a", "keep.txt"), "keep"))

      const { removed } = yield* _(runPrune(root, path.join(root, "a", "b", "c")))

      expect(removed).toEqual([path.join(root, "a", "b", "c"), path.join(root, "a", "b")])
      expect(yield* _(exists(path.join(root, "a", "keep.txt")))).toBe(true)
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scopedLive("handles non-ASCII directory names", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const root = path.join(yield* _(withTempDir), "src")
      const inner = path.join(root, "фото", "日本 2024")
      yield* _(makeDirectory(inner))

      const { removed } = yield* _(runPrune(root, inner))

      expect(removed).toEqual([inner, path.join(root, "фото")])
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scopedLive("does nothing when the scope no longer exists", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const root = path.join(yield* _(withTempDir), "src")
      yield* _(makeDirectory(root))

      const { events, removed } = yield* _(runPrune(root, path.join(root, "gone", "deeper")))

      expect(removed).toEqual([])
      expect(events).toEqual([])
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scopedLive("refuses a scope outside the root", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const base = yield* _(withTempDir)
      const root = path.join(base, "src")
      const elsewhere = path.join(base, "elsewhere")
      yield* _(makeDirectory(root))
      yield* _(makeDirectory(elsewhere))

      const { events, removed } = yield* _(runPrune(root, elsewhere))

      expect(removed).toEqual([])
      expect(events.map((event) => event._tag === "PruneSkipped" ? event.reason : event._tag)).toEqual([
        "Scope lies outside the root boundary"
      ])
      expect(yield* _(exists(elsewhere))).toBe(true)
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scopedLive("sweeps the whole tree when scoped to the root", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const root = path.join(yield* _(withTempDir), "src")
      yield* _(makeDirectory(path.join(root, "x", "y")))
      yield* _(makeDirectory(path.join(root, "w")))
      yield* _(writeFile(path.join(root, "z", "file.txt"), "still here"))

      const { events, removed } = yield* _(runPrune(root, root))

      expect(removed).toEqual([path.join(root, "x", "y"), path.join(root, "x"), path.join(root, "w")])
      expect(events.map((event) => event._tag)).toEqual(["DirectoryRemoved", "DirectoryRemoved", "DirectoryRemoved"])
      expect(yield* _(exists(path.join(root, "z", "file.txt")))).toBe(true)
      expect(yield* _(exists(root))).toBe(true)
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scopedLive("keeps a directory that gains an entry between the check and the removal", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const root = path.join(yield* _(withTempDir), "src")
      const target = path.join(root, "a", "b")
      yield* _(makeDirectory(target))

      const { events, removed } = yield* _(runPrune(root, target, fillAfterEmptinessCheck(target)))

      expect(removed).toEqual([])
      expect(events.map((event) => event._tag)).toEqual(["PruneSkipped"])
      expect(yield* _(exists(path.join(target, "late.txt")))).toBe(true)
      expect(yield* _(exists(path.join(root, "a")))).toBe(true)
    }).pipe(Effect.provide(NodeContext.layer)))
})
