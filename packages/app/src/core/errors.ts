import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for tokenizer, parser and CLI
// WHY: malformed documents must surface as typed values, never as thrown exceptions
// QUOTE(TZ): "replace every such assertion with a typed, recoverable error value"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type UnterminatedString = { readonly _tag: "UnterminatedString"; readonly offset: number }
export type DanglingEscape = { readonly _tag: "DanglingEscape"; readonly offset: number }
export type InvalidEscapeSequence = {
  readonly _tag: "InvalidEscapeSequence"
  readonly offset: number
  readonly sequence: string
}
export type UnterminatedEscape = { readonly _tag: "UnterminatedEscape"; readonly offset: number }
export type UnescapedControlCharacter = {
  readonly _tag: "UnescapedControlCharacter"
  readonly offset: number
  readonly code: number
}
export type InvalidUtf8 = { readonly _tag: "InvalidUtf8" }

export type TokenizeError =
  | UnterminatedString
  | DanglingEscape
  | InvalidEscapeSequence
  | UnterminatedEscape
  | UnescapedControlCharacter
  | InvalidUtf8

export type UnexpectedToken = {
  readonly _tag: "UnexpectedToken"
  readonly token: string
  readonly position: number
  readonly expected: string
}
export type UnexpectedEndOfInput = {
  readonly _tag: "UnexpectedEndOfInput"
  readonly position: number
  readonly expected: string
}
export type MalformedNumber = {
  readonly _tag: "MalformedNumber"
  readonly text: string
  readonly position: number
}

export type ParseError = UnexpectedToken | UnexpectedEndOfInput | MalformedNumber

export type JsonError = TokenizeError | ParseError

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type DocumentError = {
  readonly _tag: "DocumentError"
  readonly file: string
  readonly error: JsonError
}

export type AppError = CliError | ConfigError | FileError | DocumentError

export const unterminatedString = (offset: number): UnterminatedString => ({
  _tag: "UnterminatedString",
  offset
})

export const danglingEscape = (offset: number): DanglingEscape => ({
  _tag: "DanglingEscape",
  offset
})

export const invalidEscapeSequence = (offset: number, sequence: string): InvalidEscapeSequence => ({
  _tag: "InvalidEscapeSequence",
  offset,
  sequence
})

export const unterminatedEscape = (offset: number): UnterminatedEscape => ({
  _tag: "UnterminatedEscape",
  offset
})

export const unescapedControlCharacter = (offset: number, code: number): UnescapedControlCharacter => ({
  _tag: "UnescapedControlCharacter",
  offset,
  code
})

export const invalidUtf8: InvalidUtf8 = { _tag: "InvalidUtf8" }

export const unexpectedToken = (token: string, position: number, expected: string): UnexpectedToken => ({
  _tag: "UnexpectedToken",
  token,
  position,
  expected
})

export const unexpectedEndOfInput = (position: number, expected: string): UnexpectedEndOfInput => ({
  _tag: "UnexpectedEndOfInput",
  position,
  expected
})

export const malformedNumber = (text: string, position: number): MalformedNumber => ({
  _tag: "MalformedNumber",
  text,
  position
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const documentError = (file: string, error: JsonError): DocumentError => ({
  _tag: "DocumentError",
  file,
  error
})

const formatCode = (code: number): string => code.toString(16).toUpperCase().padStart(4, "0")

/**
 * Render a tokenizer or parser failure as a single diagnostic line.
 *
 * @pure true
 * @invariant output contains no newline
 */
export const renderJsonError = (error: JsonError): string =>
  Match.value(error).pipe(
    Match.tag("UnterminatedString", (e) => `unterminated string starting before offset ${e.offset}`),
    Match.tag("DanglingEscape", (e) => `dangling escape at offset ${e.offset}`),
    Match.tag(
      "InvalidEscapeSequence",
      (e) => `invalid escape sequence ${JSON.stringify(e.sequence)} at offset ${e.offset}`
    ),
    Match.tag("UnterminatedEscape", (e) => `whitespace after backslash at offset ${e.offset}`),
    Match.tag(
      "UnescapedControlCharacter",
      (e) => `unescaped control character U+${formatCode(e.code)} in string at offset ${e.offset}`
    ),
    Match.tag("InvalidUtf8", () => "input is not valid UTF-8"),
    Match.tag(
      "UnexpectedToken",
      (e) => `unexpected token ${JSON.stringify(e.token)} at token ${e.position}, expected ${e.expected}`
    ),
    Match.tag(
      "UnexpectedEndOfInput",
      (e) => `unexpected end of input at token ${e.position}, expected ${e.expected}`
    ),
    Match.tag("MalformedNumber", (e) => `malformed number ${JSON.stringify(e.text)} at token ${e.position}`),
    Match.exhaustive
  )

export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (e) => `ERROR: ${e.message}`),
    Match.tag("ConfigError", (e) => `ERROR: invalid configuration: ${e.message}`),
    Match.tag("FileError", (e) => `ERROR: ${e.message}`),
    Match.tag("DocumentError", (e) => `ERROR: ${e.file}: ${renderJsonError(e.error)}`),
    Match.exhaustive
  )
