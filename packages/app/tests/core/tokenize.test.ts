import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { TokenizeError } from "../../src/core/errors.js"
import type { Token } from "../../src/core/token.js"
import { tokenText } from "../../src/core/token.js"
import { tokenize } from "../../src/core/tokenize.js"

const texts = (input: Uint8Array | string): ReadonlyArray<string> | undefined => {
  const result = tokenize(input)
  return Either.isRight(result) ? result.right.map(tokenText) : undefined
}

const tokens = (input: string): ReadonlyArray<Token> | undefined => {
  const result = tokenize(input)
  return Either.isRight(result) ? result.right : undefined
}

const failure = (input: string): TokenizeError | undefined => {
  const result = tokenize(input)
  return Either.isLeft(result) ? result.left : undefined
}

describe("tokenize", () => {
  it.effect("splits a small object into punctuation, quotes and literals", () =>
    Effect.sync(() => {
      expect(texts(`{"a":1}`)).toEqual(["{", "\"", "a", "\"", ":", "1", "}"])
    }))

  it.effect("decodes escapes inside string content", () =>
    Effect.sync(() => {
      expect(tokens(`"a\\nb"`)).toEqual([
        { _tag: "Quote", offset: 0 },
        { _tag: "Literal", text: "a\nb", offset: 1 },
        { _tag: "Quote", offset: 5 }
      ])
    }))

  it.effect("keeps an escaped quote as content", () =>
    Effect.sync(() => {
      const result = tokens(`"say \\"hi\\""`)
      expect(result?.map((token) => token._tag)).toEqual(["Quote", "Literal", "Quote"])
      expect(result?.[1]).toEqual({ _tag: "Literal", text: "say \"hi\"", offset: 1 })
    }))

  it.effect("resolves every named escape", () =>
    Effect.sync(() => {
      expect(texts(`"\\b\\f\\r\\t\\/\\\\/"`)).toEqual(["\"", "\b\f\r\t/\\/", "\""])
    }))

  it.effect("passes \\u sequences through undecoded", () =>
    Effect.sync(() => {
      expect(texts(`"\\u0041"`)).toEqual(["\"", "\\u0041", "\""])
    }))

  it.effect("splits the exponent marker after a digit", () =>
    Effect.sync(() => {
      expect(texts("1e10")).toEqual(["1", "e", "10"])
      expect(texts("-3E+2")).toEqual(["-", "3", "E", "+", "2"])
    }))

  it.effect("does not split keywords containing e", () =>
    Effect.sync(() => {
      expect(texts("[true,false]")).toEqual(["[", "true", ",", "false", "]"])
    }))

  it.effect("discards whitespace outside strings", () =>
    Effect.sync(() => {
      expect(texts(" [ 1 ,\n\t2 ]\r\n")).toEqual(["[", "1", ",", "2", "]"])
    }))

  it.effect("keeps punctuation and spaces inside strings", () =>
    Effect.sync(() => {
      expect(texts(`"{a: [b], c}"`)).toEqual(["\"", "{a: [b], c}", "\""])
    }))

  it.effect("emits no literal for an empty string", () =>
    Effect.sync(() => {
      expect(texts(`""`)).toEqual(["\"", "\""])
      expect(texts("")).toEqual([])
    }))

  it.effect("decodes byte input as UTF-8", () =>
    Effect.sync(() => {
      const bytes = new TextEncoder().encode(`{"k":"é"}`)
      expect(texts(bytes)).toEqual(["{", "\"", "k", "\"", ":", "\"", "é", "\"", "}"])
    }))

  it.effect("keeps raw whitespace inside strings", () =>
    Effect.sync(() => {
      expect(texts("\"a\tb\nc\"")).toEqual(["\"", "a\tb\nc", "\""])
    }))

  it.effect("fails on a raw control character inside a string", () =>
    Effect.sync(() => {
      expect(failure("\"a\u0001b\"")).toEqual({ _tag: "UnescapedControlCharacter", offset: 2, code: 1 })
    }))

  it.effect("fails on bytes that are not UTF-8", () =>
    Effect.sync(() => {
      const result = tokenize(new Uint8Array([0x22, 0xff, 0x22]))
      expect(Either.isLeft(result) ? result.left : undefined).toEqual({ _tag: "InvalidUtf8" })
    }))

  it.effect("fails on an unterminated string", () =>
    Effect.sync(() => {
      expect(failure(`["abc`)).toEqual({ _tag: "UnterminatedString", offset: 1 })
    }))

  it.effect("fails on a backslash at end of input", () =>
    Effect.sync(() => {
      expect(failure(`"abc\\`)).toEqual({ _tag: "DanglingEscape", offset: 4 })
    }))

  it.effect("fails on an unknown escape", () =>
    Effect.sync(() => {
      expect(failure(`"\\x"`)).toEqual({ _tag: "InvalidEscapeSequence", offset: 1, sequence: "\\x" })
    }))

  it.effect("fails on a backslash outside a string", () =>
    Effect.sync(() => {
      expect(failure("1\\")).toEqual({ _tag: "InvalidEscapeSequence", offset: 1, sequence: "\\" })
    }))

  it.effect("fails on whitespace after a backslash", () =>
    Effect.sync(() => {
      expect(failure(`"a\\ b"`)).toEqual({ _tag: "UnterminatedEscape", offset: 3 })
    }))
})
