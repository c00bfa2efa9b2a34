import * as Either from "effect/Either"

// CHANGE: decode the single file-path argument of json-tree
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "nonzero exit with a usage message if argument count ≠ 1; expects a .json extension"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.filePath ends with ".json"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: exactly one positional argument is accepted
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly filePath: string
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const USAGE = "usage: json-tree <file.json>"

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const hasJsonExtension = (path: string): boolean => path.toLowerCase().endsWith(".json")

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the file path has a .json extension
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const [filePath] = rawArgs
  if (rawArgs.length !== 1 || filePath === undefined) {
    return Either.left(cliError(`please supply one argument being the file path (${USAGE})`))
  }
  if (!hasJsonExtension(filePath)) {
    return Either.left(cliError(`expected a .json file, got ${filePath}`))
  }
  return Either.right({ filePath })
}
