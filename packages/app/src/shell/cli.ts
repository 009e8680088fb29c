import * as Path from "@effect/platform/Path"
import * as Schema from "@effect/schema/Schema"
import { Clock, Duration, Effect, pipe } from "effect"

import { defaultLogFileName } from "../core/log-line.js"
import { defaultDonePattern, defaultInProgressPattern, matcherFromPattern, type StatusMatcher } from "../core/status.js"
import type { MigrationConfig } from "./migrate/index.js"
import { isSameOrInside } from "./migrate/path-boundary.js"
import { RuntimeEnv } from "./services/runtime-env.js"

export interface CliError {
  readonly _tag: "CliError"
  readonly reason: string
}

export const cliError = (reason: string): CliError => ({
  _tag: "CliError",
  reason
})

export const usage = [
  "Usage: synced-move --source <dir> --dest <dir> [options]",
  "",
  "  -s, --source <dir>              directory whose files are moved",
  "  -d, --dest <dir>                cloud-synced directory that receives them",
  "  -n, --max-files <n|all>         number of files to move (default: all)",
  "      --poll-interval <seconds>   delay between status checks, 1-300 (default: 5)",
  "      --timeout <seconds>         wait per file before keeping the source, 5-86400 (default: 600)",
  "      --stable-polls <n>          consecutive synced checks required, 1-20 (default: 2)",
  "      --done-pattern <regex>      status meaning fully synced",
  "      --in-progress-pattern <regex>  status meaning still syncing",
  "      --log-file <path>           log destination (default: ./synced-move-<time>.log)",
  "      --prune-empty-dirs          remove emptied source directories (default)",
  "      --no-prune-empty-dirs       keep emptied source directories",
  "      --prune-whole-tree          prune the whole source tree instead of the file's folder",
  "      --shell <exe>               PowerShell used for status queries (default: powershell)"
].join("\n")

type ValueKey =
  | "source"
  | "dest"
  | "maxFiles"
  | "pollInterval"
  | "timeout"
  | "stablePolls"
  | "donePattern"
  | "inProgressPattern"
  | "logFile"
  | "shell"

type SwitchKey = "pruneEmptyDirs" | "pruneWholeTree"

const valueFlags = new Map<string, ValueKey>([
  ["--source", "source"],
  ["-s", "source"],
  ["--dest", "dest"],
  ["-d", "dest"],
  ["--max-files", "maxFiles"],
  ["-n", "maxFiles"],
  ["--poll-interval", "pollInterval"],
  ["--timeout", "timeout"],
  ["--stable-polls", "stablePolls"],
  ["--done-pattern", "donePattern"],
  ["--in-progress-pattern", "inProgressPattern"],
  ["--log-file", "logFile"],
  ["--shell", "shell"]
])

const switchFlags = new Map<string, readonly [SwitchKey, boolean]>([
  ["--prune-empty-dirs", ["pruneEmptyDirs", true]],
  ["--no-prune-empty-dirs", ["pruneEmptyDirs", false]],
  ["--prune-whole-tree", ["pruneWholeTree", true]]
])

export type RawCliOptions = Readonly<Partial<Record<ValueKey, string> & Record<SwitchKey, boolean>>>

const bounded = (min: number, max: number) =>
  Schema.NumberFromString.pipe(Schema.int(), Schema.between(min, max))

const CliOptionsSchema = Schema.Struct({
  source: Schema.NonEmptyString,
  dest: Schema.NonEmptyString,
  maxFiles: Schema.optionalWith(
    Schema.Union(Schema.Literal("all"), Schema.NumberFromString.pipe(Schema.int(), Schema.positive())),
    { default: () => "all" as const }
  ),
  pollInterval: Schema.optionalWith(bounded(1, 300), { default: () => 5 }),
  timeout: Schema.optionalWith(bounded(5, 86_400), { default: () => 600 }),
  stablePolls: Schema.optionalWith(bounded(1, 20), { default: () => 2 }),
  donePattern: Schema.optionalWith(Schema.NonEmptyString, { default: () => defaultDonePattern }),
  inProgressPattern: Schema.optionalWith(Schema.NonEmptyString, { default: () => defaultInProgressPattern }),
  logFile: Schema.optional(Schema.NonEmptyString),
  shell: Schema.optionalWith(Schema.NonEmptyString, { default: () => "powershell" }),
  pruneEmptyDirs: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  pruneWholeTree: Schema.optionalWith(Schema.Boolean, { default: () => false })
})

export type CliOptions = Schema.Schema.Type<typeof CliOptionsSchema>

/**
 * Maps argv tokens onto raw option values; unknown tokens are ignored.
 *
 * @pure true
 * @invariant a value flag without a following token is ignored
 * @complexity O(n) where n = |args|
 */
export const parseArgs = (args: ReadonlyArray<string>): RawCliOptions => {
  let result: RawCliOptions = {}

  let index = 0
  while (index < args.length) {
    const arg = args[index]
    if (arg === undefined) {
      index += 1
      continue
    }
    const toggle = switchFlags.get(arg)
    if (toggle !== undefined) {
      result = { ...result, [toggle[0]]: toggle[1] }
      index += 1
      continue
    }
    const key = valueFlags.get(arg)
    if (key === undefined) {
      index += 1
      continue
    }

    const value = args[index + 1]
    if (value !== undefined) {
      result = { ...result, [key]: key === "maxFiles" ? value.trim().toLowerCase() : value }
      index += 2
      continue
    }
    index += 1
  }

  return result
}

// CHANGE: validate bounds and defaults in one schema decode
// WHY: out-of-range timing values must fail before any file is touched
// SOURCE: n/a
// FORMAT THEOREM: forall raw: decode(raw) = ok -> inBounds(raw)
// PURITY: SHELL
// EFFECT: Effect<CliOptions, CliError, never>
// INVARIANT: decoded numbers are integers inside their documented bounds
// COMPLEXITY: O(1)/O(1)
export const decodeCliOptions = (raw: RawCliOptions): Effect.Effect<CliOptions, CliError> =>
  pipe(
    Schema.decodeUnknown(CliOptionsSchema)(raw),
    Effect.mapError((error) => cliError(error.message))
  )

const compilePattern = (flag: string, pattern: string): Effect.Effect<StatusMatcher, CliError> =>
  Effect.try({
    try: () => matcherFromPattern(pattern),
    catch: () => cliError(`${flag} is not a valid regular expression: ${pattern}`)
  })

/**
 * Turns decoded options into a run configuration with absolute paths.
 *
 * @param options - Decoded CLI options.
 * @param cwd - Base for relative paths.
 *
 * @pure false - reads the clock for the default log name
 * @invariant destination and log file never lie inside the source root
 */
// CHANGE: resolve roots and reject layouts that would migrate the destination into itself
// WHY: a destination inside the source would be enumerated as source files
// SOURCE: n/a
// FORMAT THEOREM: forall s, d: inside(s, d) -> CliError
// PURITY: SHELL
// EFFECT: Effect<MigrationConfig, CliError, Path>
// INVARIANT: resolved roots are absolute
// COMPLEXITY: O(1)/O(1)
export const buildMigrationConfig = (
  options: CliOptions,
  cwd: string
): Effect.Effect<MigrationConfig, CliError, Path.Path> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path.Path)
    const sourceRoot = path.resolve(cwd, options.source)
    const destinationRoot = path.resolve(cwd, options.dest)
    if (isSameOrInside(path, sourceRoot, destinationRoot)) {
      return yield* _(Effect.fail(cliError(`Destination ${destinationRoot} must not be inside source ${sourceRoot}`)))
    }
    const logFile = options.logFile === undefined
      ? path.join(cwd, defaultLogFileName(yield* _(Clock.currentTimeMillis)))
      : path.resolve(cwd, options.logFile)
    if (isSameOrInside(path, sourceRoot, logFile)) {
      return yield* _(Effect.fail(cliError(`Log file ${logFile} must not be inside source ${sourceRoot}`)))
    }
    const done = yield* _(compilePattern("--done-pattern", options.donePattern))
    const inProgress = yield* _(compilePattern("--in-progress-pattern", options.inProgressPattern))

    return {
      options: {
        sourceRoot,
        destinationRoot,
        maxFiles: options.maxFiles,
        pollInterval: Duration.seconds(options.pollInterval),
        timeout: Duration.seconds(options.timeout),
        stablePollsRequired: options.stablePolls,
        matchers: { done, inProgress },
        pruneEmptyDirectories: options.pruneEmptyDirs,
        pruneWholeSourceTree: options.pruneWholeTree
      },
      logFile,
      shell: options.shell
    }
  })

/**
 * Reads CLI arguments and builds the run configuration.
 *
 * @returns Effect with resolved MigrationConfig.
 *
 * @pure false - reads process argv/cwd via RuntimeEnv
 * @effect RuntimeEnv, Path
 * @invariant unknown flags are ignored; missing roots fail with CliError
 * @complexity O(n) where n = |args|
 */
export const readMigrationConfig: Effect.Effect<MigrationConfig, CliError, RuntimeEnv | Path.Path> = Effect.gen(
  function*(_) {
    const env = yield* _(RuntimeEnv)
    const argv = yield* _(env.argv)
    const cwd = yield* _(env.cwd)
    const options = yield* _(decodeCliOptions(parseArgs(argv.slice(2))))
    return yield* _(buildMigrationConfig(options, cwd))
  }
)
