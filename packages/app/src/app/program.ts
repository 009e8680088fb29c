import { Console, Effect, Match, pipe } from "effect"

import { readMigrationConfig, usage } from "../shell/cli.js"
import { buildMigrationProgram } from "../shell/migrate/index.js"

/**
 * Compose the migration CLI as a single effect.
 *
 * @returns Effect that parses argv and runs one sequential migration.
 *
 * @pure false - reads argv and performs filesystem and shell IO
 * @effect RuntimeEnv, FileSystem, Path, CommandExecutor, Terminal
 * @invariant per-file failures never reach the error channel
 * @postcondition files are moved, preserved or skipped with logs
 * @complexity O(n) where n = number of files selected
 * @throws Never - configuration and enumeration errors are typed in the Effect error channel
 */
// CHANGE: parse, validate, then run the confirm-then-delete migration
// WHY: configuration errors and enumeration errors are the only fatal paths
// SOURCE: n/a
// FORMAT THEOREM: forall argv: valid(argv) -> migrate(config(argv))
// PURITY: SHELL
// EFFECT: Effect<void, CliError | MigrationError, RuntimeEnv | FileSystem | Path | CommandExecutor | Terminal>
// INVARIANT: a fatal error is printed once before the process exits non-zero
// COMPLEXITY: O(n)
export const program = pipe(
  readMigrationConfig,
  Effect.flatMap((config) => buildMigrationProgram(config)),
  Effect.asVoid,
  Effect.tapError((error) =>
    Match.value(error).pipe(
      Match.tag("CliError", (cliError) => Console.error(`${cliError.reason}\n\n${usage}`)),
      Match.tag("MigrationError", (migrationError) =>
        Console.error(`Cannot read ${migrationError.path}: ${migrationError.reason}`)),
      Match.exhaustive
    )
  )
)
