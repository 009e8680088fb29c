import type { PlatformError as PlatformErrorType } from "@effect/platform/Error"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { Context, Effect, Layer, pipe } from "effect"
import { rmdir } from "node:fs/promises"

import { describeCause, type MigrationError, migrationError } from "../migrate/types.js"

export type DirectoryEntryKind = "file" | "directory" | "other"

export interface DirectoryEntry {
  readonly path: string
  readonly kind: DirectoryEntryKind
}

export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readDirectory: (
      pathValue: string
    ) => Effect.Effect<ReadonlyArray<DirectoryEntry>, MigrationError>
    readonly isEmptyDirectory: (pathValue: string) => Effect.Effect<boolean, MigrationError>
    readonly makeDirectory: (pathValue: string) => Effect.Effect<void, MigrationError>
    readonly copyFile: (
      sourcePath: string,
      destinationPath: string
    ) => Effect.Effect<void, MigrationError>
    readonly exists: (pathValue: string) => Effect.Effect<boolean, MigrationError>
    readonly removeFile: (pathValue: string) => Effect.Effect<void, MigrationError>
    readonly removeEmptyDirectory: (pathValue: string) => Effect.Effect<void, MigrationError>
    readonly appendFileString: (
      pathValue: string,
      content: string
    ) => Effect.Effect<void, MigrationError>
  }
>() {}

const forEach = Effect.forEach

const entryKindFromInfo = (
  info: FileSystem.File.Info
): DirectoryEntryKind => {
  if (info.type === "Directory") {
    return "directory"
  }
  if (info.type === "File") {
    return "file"
  }
  return "other"
}

const toDirectoryEntry = (
  entryPath: string,
  info: FileSystem.File.Info
): DirectoryEntry => ({
  path: entryPath,
  kind: entryKindFromInfo(info)
})

const otherEntry = (entryPath: string): DirectoryEntry => ({
  path: entryPath,
  kind: "other"
})

const isNotFoundError = (error: PlatformErrorType): boolean =>
  error._tag === "SystemError" && error.reason === "NotFound"

const withReason = (pathValue: string, reason: string) => (error: PlatformErrorType): MigrationError =>
  migrationError(pathValue, `${reason} (${error.message})`)

// CHANGE: tolerate entries that vanish between readdir and stat; never follow links
// WHY: the source tree can change while it is read
// SOURCE: n/a
// FORMAT THEOREM: forall e: link(e) -> kind(e) = other
// PURITY: SHELL
// EFFECT: Effect<DirectoryEntry, MigrationError, FileSystem>
// INVARIANT: NotFound entries and symbolic links are classified as kind="other"
// COMPLEXITY: O(1)/O(1)
const readEntry = (
  fs: FileSystem.FileSystem,
  entryPath: string
): Effect.Effect<DirectoryEntry, MigrationError> =>
  pipe(
    fs.readLink(entryPath),
    Effect.map(() => otherEntry(entryPath)),
    Effect.orElse(() =>
      pipe(
        fs.stat(entryPath),
        Effect.map((info) => toDirectoryEntry(entryPath, info)),
        Effect.catchIf(isNotFoundError, () => Effect.succeed(otherEntry(entryPath)))
      )
    ),
    Effect.mapError(withReason(entryPath, "Cannot read directory entry"))
  )

// CHANGE: remove a directory only if it has no entries at the moment of the call
// WHY: emptiness can change between the check and the removal
// SOURCE: n/a
// FORMAT THEOREM: forall d: removed(d) -> empty(d) at removal
// PURITY: SHELL
// EFFECT: Effect<void, MigrationError, never>
// INVARIANT: a directory that gained an entry concurrently fails with ENOTEMPTY and is kept
// COMPLEXITY: O(1)/O(1)
const removeEmptyDirectory = (pathValue: string): Effect.Effect<void, MigrationError> =>
  Effect.tryPromise({
    try: () => rmdir(pathValue),
    catch: (error) => migrationError(pathValue, describeCause(error, "Cannot remove directory"))
  })

// CHANGE: wrap filesystem access behind a service for typed errors and testing
// WHY: every step reports a path and reason on failure
// SOURCE: n/a
// FORMAT THEOREM: forall op: fail(op) -> MigrationError(path, reason)
// PURITY: SHELL
// EFFECT: Effect<FileSystemService, never, FileSystem | Path>
// INVARIANT: readDirectory returns absolute entry paths
// COMPLEXITY: O(n)/O(n)
export const FileSystemLive = Layer.effect(
  FileSystemService,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)

    const readDirectory = (
      pathValue: string
    ): Effect.Effect<ReadonlyArray<DirectoryEntry>, MigrationError> =>
      pipe(
        fs.readDirectory(pathValue),
        Effect.mapError(withReason(pathValue, "Cannot read directory")),
        Effect.flatMap((entries) => forEach(entries, (entry) => readEntry(fs, path.join(pathValue, entry))))
      )

    const isEmptyDirectory = (pathValue: string): Effect.Effect<boolean, MigrationError> =>
      pipe(
        fs.readDirectory(pathValue),
        Effect.map((entries) => entries.length === 0),
        Effect.mapError(withReason(pathValue, "Cannot read directory"))
      )

    const makeDirectory = (pathValue: string): Effect.Effect<void, MigrationError> =>
      pipe(
        fs.makeDirectory(pathValue, { recursive: true }),
        Effect.mapError(withReason(pathValue, "Cannot create destination directory structure"))
      )

    const copyFile = (
      sourcePath: string,
      destinationPath: string
    ): Effect.Effect<void, MigrationError> =>
      pipe(
        fs.copyFile(sourcePath, destinationPath),
        Effect.mapError(withReason(sourcePath, "Cannot copy file into destination"))
      )

    const exists = (pathValue: string): Effect.Effect<boolean, MigrationError> =>
      pipe(
        fs.exists(pathValue),
        Effect.mapError(withReason(pathValue, "Cannot check path existence"))
      )

    const removeFile = (pathValue: string): Effect.Effect<void, MigrationError> =>
      pipe(
        fs.remove(pathValue),
        Effect.mapError(withReason(pathValue, "Cannot delete file"))
      )

    const appendFileString = (
      pathValue: string,
      content: string
    ): Effect.Effect<void, MigrationError> =>
      pipe(
        fs.writeFileString(pathValue, content, { flag: "a" }),
        Effect.mapError(withReason(pathValue, "Cannot append to file"))
      )

    return {
      readDirectory,
      isEmptyDirectory,
      makeDirectory,
      copyFile,
      exists,
      removeFile,
      removeEmptyDirectory,
      appendFileString
    }
  })
)
