import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import { unexpectedEndOfInput, unexpectedToken } from "./errors.js"
import type { StructuralChar, Token } from "./token.js"
import { isStructural, tokenText } from "./token.js"

// CHANGE: explicit read position over the token sequence
// WHY: every recursive parse call shares one forward-only position without hidden aliasing
// QUOTE(TZ): "advanced forward only, never reset"
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: position(c) after ≥ position(c) before
// PURITY: CORE
// EFFECT: mutates the cursor it is given
// INVARIANT: position never decreases
// COMPLEXITY: O(1)/O(1)

export interface Cursor {
  readonly tokens: ReadonlyArray<Token>
  position: number
}

export const makeCursor = (tokens: ReadonlyArray<Token>): Cursor => ({ tokens, position: 0 })

export const peek = (cursor: Cursor): Token | undefined => cursor.tokens[cursor.position]

export const isAtEnd = (cursor: Cursor): boolean => cursor.position >= cursor.tokens.length

export const advance = (cursor: Cursor): void => {
  cursor.position += 1
}

/** Consume one structural token, failing on anything else. */
export const expectStructural = (
  cursor: Cursor,
  char: StructuralChar
): Either.Either<void, ParseError> => {
  const token = peek(cursor)
  if (token === undefined) {
    return Either.left(unexpectedEndOfInput(cursor.position, `"${char}"`))
  }
  if (!isStructural(token, char)) {
    return Either.left(unexpectedToken(tokenText(token), cursor.position, `"${char}"`))
  }
  advance(cursor)
  return Either.right(undefined)
}
