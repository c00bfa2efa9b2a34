import { Match } from "effect"

// CHANGE: introduce the JSON value tree as a closed tagged union
// WHY: parser and serializer must handle every JSON type exhaustively
// QUOTE(TZ): "closed tagged union representing the six JSON types"
// REF: req-value-tree-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: fromNative(toNative(v)) ≅ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: JsonValue is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1) per constructor, O(n) for conversions

export type JsonObject = {
  readonly _tag: "JsonObject"
  readonly entries: ReadonlyMap<string, JsonValue>
}
export type JsonArray = { readonly _tag: "JsonArray"; readonly items: ReadonlyArray<JsonValue> }
export type JsonString = { readonly _tag: "JsonString"; readonly value: string }
export type JsonNumber = { readonly _tag: "JsonNumber"; readonly value: number }
export type JsonBoolean = { readonly _tag: "JsonBoolean"; readonly value: boolean }
export type JsonNull = { readonly _tag: "JsonNull" }

export type JsonValue = JsonObject | JsonArray | JsonString | JsonNumber | JsonBoolean | JsonNull

/** Plain JavaScript rendition of a JSON document. */
export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export const jsonObject = (entries: ReadonlyMap<string, JsonValue>): JsonObject => ({
  _tag: "JsonObject",
  entries
})

export const jsonArray = (items: ReadonlyArray<JsonValue>): JsonArray => ({
  _tag: "JsonArray",
  items
})

export const jsonString = (value: string): JsonString => ({ _tag: "JsonString", value })

export const jsonNumber = (value: number): JsonNumber => ({ _tag: "JsonNumber", value })

export const jsonBoolean = (value: boolean): JsonBoolean => ({ _tag: "JsonBoolean", value })

export const jsonNull: JsonNull = { _tag: "JsonNull" }

const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

/**
 * Convert a value tree into plain JavaScript data.
 *
 * @pure true
 * @complexity O(n)
 */
export const toNative = (value: JsonValue): Json =>
  Match.value(value).pipe(
    // fromEntries defines own properties, so a "__proto__" key stays data
    Match.tag("JsonObject", (v): Json =>
      Object.fromEntries(
        [...v.entries].map(([key, entry]): readonly [string, Json] => [key, toNative(entry)])
      )),
    Match.tag("JsonArray", (v): Json => v.items.map(toNative)),
    Match.tag("JsonString", (v): Json => v.value),
    Match.tag("JsonNumber", (v): Json => v.value),
    Match.tag("JsonBoolean", (v): Json => v.value),
    Match.tag("JsonNull", (): Json => null),
    Match.exhaustive
  )

/**
 * Build a value tree from plain JavaScript data.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromNative = (value: Json): JsonValue => {
  if (value === null) {
    return jsonNull
  }
  if (typeof value === "boolean") {
    return jsonBoolean(value)
  }
  if (typeof value === "number") {
    return jsonNumber(value)
  }
  if (typeof value === "string") {
    return jsonString(value)
  }
  if (isJsonArray(value)) {
    return jsonArray(value.map(fromNative))
  }
  const entries = new Map<string, JsonValue>()
  for (const [key, entry] of Object.entries(value)) {
    entries.set(key, fromNative(entry))
  }
  return jsonObject(entries)
}
