import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

describe("parseCliArgs", () => {
  it.effect("accepts a single .json path", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "json-tree", "data/doc.json"])
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right).toEqual({ filePath: "data/doc.json" })
      }
    }))

  it.effect("accepts an upper-case extension", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "json-tree", "DOC.JSON"])
      expect(Either.isRight(parsed)).toBe(true)
    }))

  it.effect("rejects a missing argument", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "json-tree"])
      expect(Either.isLeft(parsed)).toBe(true)
      if (Either.isLeft(parsed)) {
        expect(parsed.left).toEqual({
          _tag: "CliError",
          message: "please supply one argument being the file path (usage: json-tree <file.json>)"
        })
      }
    }))

  it.effect("rejects extra arguments", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "json-tree", "a.json", "b.json"])
      expect(Either.isLeft(parsed)).toBe(true)
    }))

  it.effect("rejects a path without the .json extension", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(["node", "json-tree", "notes.txt"])
      expect(Either.isLeft(parsed)).toBe(true)
      if (Either.isLeft(parsed)) {
        expect(parsed.left.message).toBe("expected a .json file, got notes.txt")
      }
    }))
})
