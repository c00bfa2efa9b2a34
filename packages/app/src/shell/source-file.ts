import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read the input document through the Effect file system service
// WHY: isolate disk IO from the pure tokenizer and parser
// QUOTE(TZ): "reads file bytes and passes them to parse"
// REF: req-source-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(bytes) → bytes = contents(p)
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, AppError, FileSystem>
// INVARIANT: read failures are reported as FileError
// COMPLEXITY: O(n)

export const readSourceFile = (
  path: string
): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const bytes = yield* _(
      fs.readFile(path).pipe(
        Effect.mapError((error) => fileError(`could not read file ${path}: ${String(error)}`))
      )
    )
    yield* _(Effect.logDebug(`read ${bytes.length} bytes`).pipe(Effect.annotateLogs("file", path)))
    return bytes
  })
