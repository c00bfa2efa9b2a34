import { Match } from "effect"

// CHANGE: define the lexical token alphabet shared by tokenizer and parser
// WHY: a quote delimiter must stay distinguishable from string content equal to `"`
// QUOTE(TZ): "a minimal lexical unit"
// REF: req-token-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t ∈ Token: tokenText(t).length ≥ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Literal.text is never empty
// COMPLEXITY: O(1)/O(1)

export type StructuralChar = "{" | "}" | "[" | "]" | ":" | ","

export type StructuralToken = {
  readonly _tag: "Structural"
  readonly char: StructuralChar
  readonly offset: number
}
export type QuoteToken = { readonly _tag: "Quote"; readonly offset: number }
export type LiteralToken = {
  readonly _tag: "Literal"
  readonly text: string
  readonly offset: number
}

export type Token = StructuralToken | QuoteToken | LiteralToken

export const structural = (char: StructuralChar, offset: number): StructuralToken => ({
  _tag: "Structural",
  char,
  offset
})

export const quote = (offset: number): QuoteToken => ({ _tag: "Quote", offset })

export const literal = (text: string, offset: number): LiteralToken => ({
  _tag: "Literal",
  text,
  offset
})

export const isStructuralChar = (char: string): char is StructuralChar =>
  char === "{" || char === "}" || char === "[" || char === "]" || char === ":" || char === ","

export const isStructural = (token: Token | undefined, char: StructuralChar): boolean =>
  token !== undefined && token._tag === "Structural" && token.char === char

export const tokenText = (token: Token): string =>
  Match.value(token).pipe(
    Match.tag("Structural", (t) => t.char),
    Match.tag("Quote", () => "\""),
    Match.tag("Literal", (t) => t.text),
    Match.exhaustive
  )
