import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli, runCliWithDiagnostics } from "../../src/app/program.js"
import { provideNodeContext, withSettings, withTempDir } from "./test-helpers.js"

describe("runCli", () => {
  it.effect("prints the serialized tree of a file", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const filePath = yield* _(writeFixture("doc.json", `{"b": [1, "two"], "a": null}\n`))
        const result = yield* _(runCli(["node", "json-tree", filePath]).pipe(withSettings()))

        expect(result.exitCode).toBe(0)
        expect(result.tokenListing).toBeUndefined()
        expect(result.output).toBe(
          [
            "{",
            "    \"b\": [",
            "        1,",
            "        \"two\"",
            "    ],",
            "    \"a\": null",
            "}"
          ].join("\n")
        )
      })
    ).pipe(provideNodeContext))

  it.effect("dumps tokens when configured", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const filePath = yield* _(writeFixture("list.json", "[true]"))
        const result = yield* _(
          runCli(["node", "json-tree", filePath]).pipe(withSettings([["JSON_TREE_DUMP_TOKENS", "true"]]))
        )

        expect(result.tokenListing).toBe("Token 000: [\nToken 001: true\nToken 002: ]")
        expect(result.output).toBe("[\n    true\n]")
      })
    ).pipe(provideNodeContext))

  it.effect("reports a malformed document with its path", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const filePath = yield* _(writeFixture("bad.json", `{"a":}`))
        const error = yield* _(Effect.flip(runCli(["node", "json-tree", filePath]).pipe(withSettings())))

        expect(error).toEqual({
          _tag: "DocumentError",
          file: filePath,
          error: { _tag: "UnexpectedToken", token: "}", position: 5, expected: "value" }
        })
      })
    ).pipe(provideNodeContext))

  it.effect("reports an unreadable file", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const filePath = path.join(tempDir, "missing.json")
        const error = yield* _(Effect.flip(runCli(["node", "json-tree", filePath]).pipe(withSettings())))

        expect(error._tag).toBe("FileError")
      })
    ).pipe(provideNodeContext))

  it.effect("rejects a non-json path before reading", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runCli(["node", "json-tree", "notes.txt"]).pipe(withSettings())))

      expect(error).toEqual({ _tag: "CliError", message: "expected a .json file, got notes.txt" })
    }).pipe(provideNodeContext))
})

describe("runCliWithDiagnostics", () => {
  it.effect("turns failures into exit code 1", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runCliWithDiagnostics(["node", "json-tree"]).pipe(withSettings()))

      expect(result).toEqual({ output: "", tokenListing: undefined, exitCode: 1 })
    }).pipe(provideNodeContext))
})
