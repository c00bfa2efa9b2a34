import * as Either from "effect/Either"

import type { Cursor } from "./cursor.js"
import { advance, expectStructural, isAtEnd, makeCursor, peek } from "./cursor.js"
import type { JsonError, ParseError } from "./errors.js"
import { malformedNumber, unexpectedEndOfInput, unexpectedToken } from "./errors.js"
import type { JsonValue } from "./json.js"
import { jsonArray, jsonBoolean, jsonNull, jsonNumber, jsonObject, jsonString } from "./json.js"
import type { Token } from "./token.js"
import { isStructural, tokenText } from "./token.js"
import { tokenize } from "./tokenize.js"

// CHANGE: recursive-descent parser over a shared forward-only cursor
// WHY: one procedure per grammar production keeps the tree a direct mirror of the document
// QUOTE(TZ): "recursive-descent procedures, one per JSON grammar production"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ts: parseTokens(ts) = Right(v) → cursor ends at ts.length
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no partial tree is ever returned; open containers are tracked on an explicit stack
// COMPLEXITY: O(n) where n = token count

const MANTISSA_SIGNS: ReadonlyArray<string> = ["-"]
const EXPONENT_SIGNS: ReadonlyArray<string> = ["-", "+"]

const MANTISSA = /^(?:0|[1-9]\d*)(?:\.\d+)?$/
const DIGITS = /^\d+$/

const isExponentMarker = (token: Token | undefined): boolean =>
  token !== undefined && token._tag === "Literal" && (token.text === "e" || token.text === "E")

const unexpected = (cursor: Cursor, expected: string): ParseError => {
  const token = peek(cursor)
  return token === undefined
    ? unexpectedEndOfInput(cursor.position, expected)
    : unexpectedToken(tokenText(token), cursor.position, expected)
}

/**
 * Parse `"…"`, the opening quote already consumed.
 */
export const parseString = (cursor: Cursor): Either.Either<string, ParseError> => {
  const token = peek(cursor)
  if (token === undefined) {
    return Either.left(unexpectedEndOfInput(cursor.position, "string content"))
  }
  if (token._tag === "Quote") {
    advance(cursor)
    return Either.right("")
  }
  if (token._tag !== "Literal") {
    return Either.left(unexpectedToken(tokenText(token), cursor.position, "string content"))
  }
  advance(cursor)
  const closing = peek(cursor)
  if (closing === undefined || closing._tag !== "Quote") {
    return Either.left(unexpected(cursor, "closing quote"))
  }
  advance(cursor)
  return Either.right(token.text)
}

const takeDigits = (cursor: Cursor, pattern: RegExp, start: number): Either.Either<string, ParseError> => {
  const token = peek(cursor)
  if (token === undefined) {
    return Either.left(unexpectedEndOfInput(cursor.position, "digits"))
  }
  if (token._tag !== "Literal" || !pattern.test(token.text)) {
    return Either.left(malformedNumber(tokenText(token), start))
  }
  advance(cursor)
  return Either.right(token.text)
}

const takeSign = (cursor: Cursor, signs: ReadonlyArray<string>): string => {
  const token = peek(cursor)
  if (token !== undefined && token._tag === "Literal" && signs.includes(token.text)) {
    advance(cursor)
    return token.text
  }
  return ""
}

/**
 * Parse a number starting at the current token: optional minus, integer run
 * with optional fraction, optional exponent marker with its own sign and digits.
 */
export const parseNumber = (cursor: Cursor): Either.Either<number, ParseError> => {
  const start = cursor.position
  const sign = takeSign(cursor, MANTISSA_SIGNS)
  const mantissa = takeDigits(cursor, MANTISSA, start)
  if (Either.isLeft(mantissa)) {
    return Either.left(mantissa.left)
  }
  let text = sign + mantissa.right
  const marker = peek(cursor)
  if (marker !== undefined && marker._tag === "Literal" && isExponentMarker(marker)) {
    advance(cursor)
    const exponentSign = takeSign(cursor, EXPONENT_SIGNS)
    const exponent = takeDigits(cursor, DIGITS, start)
    if (Either.isLeft(exponent)) {
      return Either.left(exponent.left)
    }
    text = `${text}${marker.text}${exponentSign}${exponent.right}`
  }
  const value = Number(text)
  if (!Number.isFinite(value)) {
    return Either.left(malformedNumber(text, start))
  }
  return Either.right(value)
}

// A container whose closing token has not been reached yet.
type ArrayFrame = { readonly _tag: "ArrayFrame"; readonly items: Array<JsonValue> }
type ObjectFrame = { readonly _tag: "ObjectFrame"; readonly entries: Map<string, JsonValue>; key: string }
type Frame = ArrayFrame | ObjectFrame

// Outcome of reading the start of a value: a finished value, or a container left open.
type Step =
  | { readonly _tag: "Done"; readonly value: JsonValue }
  | { readonly _tag: "Open"; readonly frame: Frame }

const done = (value: JsonValue): Step => ({ _tag: "Done", value })
const open = (frame: Frame): Step => ({ _tag: "Open", frame })

const parseKey = (cursor: Cursor): Either.Either<string, ParseError> => {
  const token = peek(cursor)
  if (token === undefined || token._tag !== "Quote") {
    return Either.left(unexpected(cursor, "object key"))
  }
  advance(cursor)
  return parseString(cursor)
}

// Reads `"key" :` and leaves the cursor on the entry's value.
const parseEntryHead = (cursor: Cursor): Either.Either<string, ParseError> =>
  Either.flatMap(parseKey(cursor), (key) => Either.map(expectStructural(cursor, ":"), () => key))

const openArray = (cursor: Cursor): Step => {
  if (isStructural(peek(cursor), "]")) {
    advance(cursor)
    return done(jsonArray([]))
  }
  return open({ _tag: "ArrayFrame", items: [] })
}

const openObject = (cursor: Cursor): Either.Either<Step, ParseError> => {
  if (isStructural(peek(cursor), "}")) {
    advance(cursor)
    return Either.right(done(jsonObject(new Map<string, JsonValue>())))
  }
  return Either.map(
    parseEntryHead(cursor),
    (key) => open({ _tag: "ObjectFrame", entries: new Map<string, JsonValue>(), key })
  )
}

const parseLiteral = (cursor: Cursor, text: string): Either.Either<JsonValue, ParseError> => {
  switch (text) {
    case "true":
      advance(cursor)
      return Either.right(jsonBoolean(true))
    case "false":
      advance(cursor)
      return Either.right(jsonBoolean(false))
    case "null":
      advance(cursor)
      return Either.right(jsonNull)
    default:
      return Either.map(parseNumber(cursor), jsonNumber)
  }
}

const beginValue = (cursor: Cursor): Either.Either<Step, ParseError> => {
  const token = peek(cursor)
  if (token === undefined) {
    return Either.left(unexpectedEndOfInput(cursor.position, "value"))
  }
  switch (token._tag) {
    case "Quote":
      advance(cursor)
      return Either.map(parseString(cursor), (text) => done(jsonString(text)))
    case "Literal":
      return Either.map(parseLiteral(cursor, token.text), done)
    case "Structural":
      if (token.char === "{") {
        advance(cursor)
        return openObject(cursor)
      }
      if (token.char === "[") {
        advance(cursor)
        return Either.right(openArray(cursor))
      }
      return Either.left(unexpectedToken(token.char, cursor.position, "value"))
  }
}

// Adding a finished value to an open container, then reading its separator, gives
// Right(container) when the container closed and Right(undefined) when another element follows.
const attachItem = (
  cursor: Cursor,
  frame: ArrayFrame,
  value: JsonValue
): Either.Either<JsonValue | undefined, ParseError> => {
  frame.items.push(value)
  const separator = peek(cursor)
  if (isStructural(separator, "]")) {
    advance(cursor)
    return Either.right(jsonArray(frame.items))
  }
  if (!isStructural(separator, ",")) {
    return Either.left(unexpected(cursor, "\",\" or \"]\""))
  }
  advance(cursor)
  return Either.right(undefined)
}

const attachEntry = (
  cursor: Cursor,
  frame: ObjectFrame,
  value: JsonValue
): Either.Either<JsonValue | undefined, ParseError> => {
  frame.entries.set(frame.key, value)
  const separator = peek(cursor)
  if (isStructural(separator, "}")) {
    advance(cursor)
    return Either.right(jsonObject(frame.entries))
  }
  if (!isStructural(separator, ",")) {
    return Either.left(unexpected(cursor, "\",\" or \"}\""))
  }
  advance(cursor)
  return Either.map(parseEntryHead(cursor), (key) => {
    frame.key = key
    return undefined
  })
}

// Nesting lives on an explicit stack of frames, so depth is not limited by the call stack.
const run = (cursor: Cursor, first: Either.Either<Step, ParseError>): Either.Either<JsonValue, ParseError> => {
  const stack: Array<Frame> = []
  let step = first
  for (;;) {
    if (Either.isLeft(step)) {
      return Either.left(step.left)
    }
    if (step.right._tag === "Open") {
      stack.push(step.right.frame)
      step = beginValue(cursor)
      continue
    }
    let value: JsonValue | undefined = step.right.value
    while (value !== undefined) {
      const frame = stack.at(-1)
      if (frame === undefined) {
        return Either.right(value)
      }
      const attached: Either.Either<JsonValue | undefined, ParseError> = frame._tag === "ArrayFrame"
        ? attachItem(cursor, frame, value)
        : attachEntry(cursor, frame, value)
      if (Either.isLeft(attached)) {
        return Either.left(attached.left)
      }
      value = attached.right
      if (value !== undefined) {
        stack.pop()
      }
    }
    step = beginValue(cursor)
  }
}

/**
 * Parse `[ value (, value)* ]`, the opening bracket already consumed.
 */
export const parseArray = (cursor: Cursor): Either.Either<JsonValue, ParseError> =>
  run(cursor, Either.right(openArray(cursor)))

/**
 * Parse `{ "key": value (, "key": value)* }`, the opening brace already
 * consumed. Later duplicates overwrite earlier ones.
 */
export const parseObject = (cursor: Cursor): Either.Either<JsonValue, ParseError> =>
  run(cursor, openObject(cursor))

/**
 * Parse any JSON value at the cursor.
 *
 * @pure false
 * @effect advances the cursor past the consumed value
 * @invariant nesting depth is bounded by memory, not by the call stack
 */
export const parseValue = (cursor: Cursor): Either.Either<JsonValue, ParseError> =>
  run(cursor, beginValue(cursor))

/**
 * Parse a complete token sequence into a value tree.
 *
 * @param tokens - Output of {@link tokenize}.
 * @returns Either with the value tree or the first ParseError.
 *
 * @pure true
 * @invariant every token is consumed on success
 * @complexity O(n)
 */
export const parseTokens = (tokens: ReadonlyArray<Token>): Either.Either<JsonValue, ParseError> => {
  const cursor = makeCursor(tokens)
  const value = parseValue(cursor)
  if (Either.isLeft(value)) {
    return value
  }
  if (!isAtEnd(cursor)) {
    return Either.left(unexpected(cursor, "end of input"))
  }
  return value
}

/**
 * Tokenize and parse a JSON document.
 *
 * @pure true
 * @complexity O(n)
 */
export const parse = (input: Uint8Array | string): Either.Either<JsonValue, JsonError> =>
  Either.flatMap(tokenize(input), (tokens): Either.Either<JsonValue, JsonError> => parseTokens(tokens))
