import * as Either from "effect/Either"

import type { TokenizeError } from "./errors.js"
import {
  danglingEscape,
  invalidEscapeSequence,
  invalidUtf8,
  unescapedControlCharacter,
  unterminatedEscape,
  unterminatedString
} from "./errors.js"
import type { Token } from "./token.js"
import { isStructuralChar, literal, quote, structural } from "./token.js"

// CHANGE: single-pass tokenizer state machine for JSON text
// WHY: split raw input into structural, quote and literal tokens with escapes already resolved
// QUOTE(TZ): "single-pass state machine turning raw bytes into an ordered sequence of lexical tokens"
// REF: req-tokenize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: tokenize(s) = Right(ts) → ∀t ∈ ts: tokenText(t) ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: escape mode is only entered from string mode
// COMPLEXITY: O(n) where n = input length

type ScanMode = "outside" | "string" | "escape"

interface ScanState {
  readonly mode: ScanMode
  readonly current: string
  readonly currentStart: number
  readonly stringStart: number
  readonly escapeStart: number
}

interface ScanStep {
  readonly state: ScanState
  readonly emitted: ReadonlyArray<Token>
}

const WHITESPACE: ReadonlySet<string> = new Set([" ", "\t", "\r", "\n"])

const ESCAPES: Readonly<Record<string, string>> = {
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  "\"": "\"",
  "\\": "\\",
  "/": "/"
}

const initialState: ScanState = {
  mode: "outside",
  current: "",
  currentStart: 0,
  stringStart: 0,
  escapeStart: 0
}

// Below U+0020, only the whitespace characters may appear raw inside a string.
const isControl = (char: string): boolean => char < " " && !WHITESPACE.has(char)

const isDigit = (char: string | undefined): boolean => char !== undefined && char >= "0" && char <= "9"

const pending = (state: ScanState): ReadonlyArray<Token> =>
  state.current.length > 0 ? [literal(state.current, state.currentStart)] : []

const append = (state: ScanState, chunk: string, offset: number): ScanState => ({
  ...state,
  current: state.current + chunk,
  currentStart: state.current.length === 0 ? offset : state.currentStart
})

// Flushes the pending literal, then emits `token` (if any) and switches mode.
const flushWith = (
  state: ScanState,
  token: Token | undefined,
  mode: ScanMode
): ScanStep => ({
  state: { ...state, mode, current: "" },
  emitted: token === undefined ? pending(state) : [...pending(state), token]
})

const stay = (state: ScanState): ScanStep => ({ state, emitted: [] })

const consumeEscaped = (
  state: ScanState,
  char: string,
  offset: number
): Either.Either<ScanStep, TokenizeError> => {
  if (WHITESPACE.has(char)) {
    return Either.left(unterminatedEscape(offset))
  }
  if (char === "u") {
    // \uXXXX is kept undecoded
    return Either.right(stay({ ...append(state, "\\u", state.escapeStart), mode: "string" }))
  }
  const decoded = ESCAPES[char]
  if (decoded === undefined) {
    return Either.left(invalidEscapeSequence(state.escapeStart, `\\${char}`))
  }
  return Either.right(stay({ ...append(state, decoded, state.escapeStart), mode: "string" }))
}

const consumeInString = (
  state: ScanState,
  char: string,
  offset: number
): Either.Either<ScanStep, TokenizeError> => {
  if (char === "\\") {
    return Either.right(stay({ ...state, mode: "escape", escapeStart: offset }))
  }
  if (char === "\"") {
    return Either.right(flushWith(state, quote(offset), "outside"))
  }
  if (isControl(char)) {
    return Either.left(unescapedControlCharacter(offset, char.charCodeAt(0)))
  }
  return Either.right(stay(append(state, char, offset)))
}

const consumeOutside = (
  state: ScanState,
  char: string,
  offset: number
): Either.Either<ScanStep, TokenizeError> => {
  if (WHITESPACE.has(char)) {
    return Either.right(flushWith(state, undefined, "outside"))
  }
  if (char === "\"") {
    const step = flushWith(state, quote(offset), "string")
    return Either.right({ ...step, state: { ...step.state, stringStart: offset } })
  }
  if (isStructuralChar(char)) {
    return Either.right(flushWith(state, structural(char, offset), "outside"))
  }
  if (char === "+" || char === "-") {
    return Either.right(flushWith(state, literal(char, offset), "outside"))
  }
  if ((char === "e" || char === "E") && isDigit(state.current.at(-1))) {
    return Either.right(flushWith(state, literal(char, offset), "outside"))
  }
  if (char === "\\") {
    return Either.left(invalidEscapeSequence(offset, "\\"))
  }
  return Either.right(stay(append(state, char, offset)))
}

const consume = (
  state: ScanState,
  char: string,
  offset: number
): Either.Either<ScanStep, TokenizeError> => {
  switch (state.mode) {
    case "escape":
      return consumeEscaped(state, char, offset)
    case "string":
      return consumeInString(state, char, offset)
    case "outside":
      return consumeOutside(state, char, offset)
  }
}

/**
 * Decode raw input into text. Byte input must be well-formed UTF-8.
 *
 * @pure true
 */
export const decodeInput = (input: Uint8Array | string): Either.Either<string, TokenizeError> =>
  typeof input === "string"
    ? Either.right(input)
    : Either.try({
      try: () => new TextDecoder("utf-8", { fatal: true }).decode(input),
      catch: () => invalidUtf8
    })

/**
 * Split a JSON document into tokens.
 *
 * @param input - Raw bytes or already decoded text.
 * @returns Either with the ordered token sequence or the first TokenizeError.
 *
 * @pure true
 * @invariant no empty literal is emitted
 * @complexity O(n)
 */
export const tokenize = (
  input: Uint8Array | string
): Either.Either<ReadonlyArray<Token>, TokenizeError> => {
  const decoded = decodeInput(input)
  if (Either.isLeft(decoded)) {
    return Either.left(decoded.left)
  }
  const text = decoded.right
  const tokens: Array<Token> = []
  let state = initialState
  for (let offset = 0; offset < text.length; offset++) {
    const step = consume(state, text.charAt(offset), offset)
    if (Either.isLeft(step)) {
      return Either.left(step.left)
    }
    tokens.push(...step.right.emitted)
    state = step.right.state
  }
  if (state.mode === "escape") {
    return Either.left(danglingEscape(state.escapeStart))
  }
  if (state.mode === "string") {
    return Either.left(unterminatedString(state.stringStart))
  }
  tokens.push(...pending(state))
  return Either.right(tokens)
}
