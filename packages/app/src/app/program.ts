import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Console, Effect, Logger } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { AppConfig } from "../core/config.js"
import { appConfig } from "../core/config.js"
import { type AppError, configError, documentError, type JsonError, renderAppError } from "../core/errors.js"
import { parseTokens } from "../core/parser.js"
import { renderTokenListing } from "../core/report.js"
import { serialize } from "../core/serialize.js"
import { tokenize } from "../core/tokenize.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate read → tokenize → parse → serialize for one file
// WHY: single entrypoint with typed errors and deterministic output
// QUOTE(TZ): "on read failure or parse failure, prints a diagnostic and exits nonzero"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output is emitted only after the whole document parsed
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly tokenListing: string | undefined
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const fromDocument = <A>(
  file: string,
  either: Either.Either<A, JsonError>
): Effect.Effect<A, AppError> => fromEither(Either.mapLeft(either, (error) => documentError(file, error)))

const loadConfig: Effect.Effect<AppConfig, AppError> = appConfig.pipe(
  Effect.mapError((error) => configError(String(error)))
)

const renderDocument = (
  cli: CliArgs,
  config: AppConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const bytes = yield* _(readSourceFile(cli.filePath))
    const tokens = yield* _(fromDocument(cli.filePath, tokenize(bytes)))
    yield* _(Effect.logDebug(`tokenized ${tokens.length} tokens`))
    const tokenListing = config.dumpTokens ? renderTokenListing(tokens) : undefined
    if (tokenListing !== undefined && tokenListing.length > 0) {
      yield* _(writeStdout(tokenListing))
    }
    const value = yield* _(fromDocument(cli.filePath, parseTokens(tokens)))
    yield* _(Effect.logDebug(`parsed ${value._tag}`))
    const output = serialize(value)
    yield* _(writeStdout(output))
    return { output, tokenListing, exitCode: 0 }
  }).pipe(Effect.annotateLogs("file", cli.filePath))

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with serialized output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant the tree is written only after the whole document parsed
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const config = yield* _(loadConfig)
    return yield* _(renderDocument(cli, config).pipe(Logger.withMinimumLogLevel(config.logLevel)))
  })

/**
 * Run the CLI and turn any AppError into a stderr diagnostic with exit code 1.
 *
 * @pure false
 * @effect FileSystem, Console
 */
export const runCliWithDiagnostics = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, FileSystemService> =>
  runCli(argv).pipe(
    Effect.catchAll((error) =>
      Console.error(renderAppError(error)).pipe(Effect.as({ output: "", tokenListing: undefined, exitCode: 1 }))
    )
  )
