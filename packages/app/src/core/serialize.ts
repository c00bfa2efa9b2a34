import { Match } from "effect"

import type { JsonValue } from "./json.js"

// CHANGE: render a value tree back to indented JSON text
// WHY: serialized output must parse back into the same tree
// QUOTE(TZ): "Serializer renders indented text"
// REF: req-serialize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v produced by parse: parse(serialize(v)) ≅ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: quotes, backslashes and every character below U+0020 are escaped
// COMPLEXITY: O(n) where n = tree size; nesting depth is bounded by memory, not the call stack

const INDENT = "    "

const STRING_ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

const unicodeEscape = (char: string): string => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`

export const quoteString = (value: string): string => {
  let result = "\""
  for (const char of value) {
    result += STRING_ESCAPES[char] ?? (char < " " ? unicodeEscape(char) : char)
  }
  return `${result}"`
}

const formatNumber = (value: number): string => Number.isFinite(value) ? String(value) : "null"

// A pending piece of output: literal text, or a value still to be rendered at a depth.
type Work = string | { readonly value: JsonValue; readonly depth: number }

const block = (
  open: string,
  close: string,
  children: ReadonlyArray<readonly [string, JsonValue]>,
  depth: number
): ReadonlyArray<Work> => {
  if (children.length === 0) {
    return [open + close]
  }
  const inner = INDENT.repeat(depth + 1)
  const pieces: Array<Work> = [open]
  children.forEach(([prefix, child], index) => {
    pieces.push(`${index === 0 ? "\n" : ",\n"}${inner}${prefix}`, { value: child, depth: depth + 1 })
  })
  pieces.push(`\n${INDENT.repeat(depth)}${close}`)
  return pieces
}

const expand = (value: JsonValue, depth: number): ReadonlyArray<Work> =>
  Match.value(value).pipe(
    Match.tag("JsonObject", (v) =>
      block(
        "{",
        "}",
        [...v.entries].map(([key, entry]): readonly [string, JsonValue] => [`${quoteString(key)}: `, entry]),
        depth
      )),
    Match.tag("JsonArray", (v) =>
      block(
        "[",
        "]",
        v.items.map((item): readonly [string, JsonValue] => ["", item]),
        depth
      )),
    Match.tag("JsonString", (v): ReadonlyArray<Work> => [quoteString(v.value)]),
    Match.tag("JsonNumber", (v): ReadonlyArray<Work> => [formatNumber(v.value)]),
    Match.tag("JsonBoolean", (v): ReadonlyArray<Work> => [v.value ? "true" : "false"]),
    Match.tag("JsonNull", (): ReadonlyArray<Work> => ["null"]),
    Match.exhaustive
  )

/**
 * Serialize a value tree as indented JSON text.
 *
 * @param value - Tree to render.
 * @returns Text with four-space indentation and no trailing newline.
 *
 * @pure true
 * @invariant empty containers render as `{}` and `[]`
 * @complexity O(n)
 */
export const serialize = (value: JsonValue): string => {
  const output: Array<string> = []
  const stack: Array<Work> = [{ value, depth: 0 }]
  for (let work = stack.pop(); work !== undefined; work = stack.pop()) {
    if (typeof work === "string") {
      output.push(work)
    } else {
      const pieces = expand(work.value, work.depth)
      for (let index = pieces.length - 1; index >= 0; index--) {
        const piece = pieces[index]
        if (piece !== undefined) {
          stack.push(piece)
        }
      }
    }
  }
  return output.join("")
}
