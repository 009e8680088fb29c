import * as Command from "@effect/platform/Command"
import * as CommandExecutor from "@effect/platform/CommandExecutor"
import { Context, Duration, Effect, Layer, pipe, Stream } from "effect"

export interface ProbeError {
  readonly _tag: "ProbeError"
  readonly path: string
  readonly reason: string
}

export const probeError = (pathValue: string, reason: string): ProbeError => ({
  _tag: "ProbeError",
  path: pathValue,
  reason
})

/**
 * Out-of-process source of per-item folder metadata.
 *
 * Field positions are those of the host shell's folder details view; the
 * header row (item = none) names each position.
 */
export class StatusOracle extends Context.Tag("StatusOracle")<
  StatusOracle,
  {
    readonly fieldNames: (
      directory: string,
      limit: number
    ) => Effect.Effect<ReadonlyArray<string>, ProbeError>
    readonly readField: (
      directory: string,
      itemName: string,
      fieldIndex: number
    ) => Effect.Effect<string, ProbeError>
  }
>() {}

const probeTimeout = Duration.seconds(30)

const quoteLiteral = (value: string): string => `'${value.replaceAll("'", "''")}'`

const openFolder = (directory: string): ReadonlyArray<string> => [
  "$ErrorActionPreference = 'Stop'",
  "[Console]::OutputEncoding = [System.Text.Encoding]::UTF8",
  `$folder = (New-Object -ComObject Shell.Application).Namespace(${quoteLiteral(directory)})`,
  "if ($null -eq $folder) { exit 2 }"
]

export const fieldNamesScript = (directory: string, limit: number): string =>
  [
    ...openFolder(directory),
    `for ($i = 0; $i -lt ${limit}; $i++) { $folder.GetDetailsOf($null, $i) }`
  ].join("; ")

export const readFieldScript = (directory: string, itemName: string, fieldIndex: number): string =>
  [
    ...openFolder(directory),
    `$item = $folder.ParseName(${quoteLiteral(itemName)})`,
    "if ($null -eq $item) { exit 3 }",
    `$folder.GetDetailsOf($item, ${fieldIndex})`
  ].join("; ")

const exitReason = (exitCode: number): string => {
  if (exitCode === 2) {
    return "Cannot resolve containing folder"
  }
  if (exitCode === 3) {
    return "Cannot resolve item in folder"
  }
  return `Status query exited with code ${exitCode}`
}

const splitLines = (output: string): ReadonlyArray<string> => output.split(/\r?\n/)

// CHANGE: run one shell query and collect its stdout as text
// WHY: status is only readable through the host shell
// SOURCE: n/a
// FORMAT THEOREM: forall q: exit(q) != 0 -> ProbeError
// PURITY: SHELL
// EFFECT: Effect<string, ProbeError, CommandExecutor>
// INVARIANT: non-zero exit code -> ProbeError
// COMPLEXITY: O(n)/O(n) where n = |stdout|
const runQuery = (
  shell: string,
  pathValue: string,
  script: string
): Effect.Effect<string, ProbeError, CommandExecutor.CommandExecutor> =>
  pipe(
    Effect.scoped(
      Effect.gen(function*(_) {
        const command = Command.make(shell, "-NoProfile", "-NonInteractive", "-Command", script)
        const proc = yield* _(Command.start(command))
        const [output, exitCode] = yield* _(
          Effect.all([
            pipe(proc.stdout, Stream.decodeText(), Stream.runFold("", (acc, chunk) => acc + chunk)),
            proc.exitCode
          ], { concurrency: 2 })
        )
        if (Number(exitCode) !== 0) {
          return yield* _(Effect.fail(probeError(pathValue, exitReason(Number(exitCode)))))
        }
        return output
      })
    ),
    Effect.mapError((error) => error._tag === "ProbeError" ? error : probeError(pathValue, error.message)),
    Effect.timeoutFail({
      duration: probeTimeout,
      onTimeout: () => probeError(pathValue, "Status query timed out")
    })
  )

/**
 * Live oracle backed by the Windows shell folder details (`GetDetailsOf`).
 *
 * @param shell - PowerShell executable name or path.
 */
// CHANGE: query cloud-sync availability through the host shell's folder metadata
// WHY: the sync client publishes availability only as a folder details column
// SOURCE: n/a
// FORMAT THEOREM: forall d, n: |fieldNames(d, n)| <= n
// PURITY: SHELL
// EFFECT: Effect<StatusOracle, never, CommandExecutor>
// INVARIANT: fieldNames(d, n) returns at most n names, index-aligned with field positions
// COMPLEXITY: O(1) process spawns per call
export const makeStatusOracleLive = (shell: string) =>
  Layer.effect(
    StatusOracle,
    Effect.gen(function*(_) {
      const executor = yield* _(CommandExecutor.CommandExecutor)
      const run = (pathValue: string, script: string) =>
        Effect.provideService(runQuery(shell, pathValue, script), CommandExecutor.CommandExecutor, executor)

      return {
        fieldNames: (directory, limit) =>
          pipe(
            run(directory, fieldNamesScript(directory, limit)),
            Effect.map((output) => splitLines(output).slice(0, limit))
          ),
        readField: (directory, itemName, fieldIndex) =>
          pipe(
            run(directory, readFieldScript(directory, itemName, fieldIndex)),
            Effect.map((output) => output.replace(/\r?\n$/, ""))
          )
      }
    })
  )
