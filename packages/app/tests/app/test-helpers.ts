import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { ConfigProvider, Effect } from "effect"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
  readonly writeFixture: (name: string, contents: string) => Effect.Effect<string, PlatformError>
}

export const withTempDir = <A, E, R>(
  use: (context: TempContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const tempDir = yield* _(fs.makeTempDirectory())
    const writeFixture = (name: string, contents: string) => {
      const filePath = path.join(tempDir, name)
      return fs.writeFileString(filePath, contents).pipe(Effect.as(filePath))
    }
    return yield* _(use({ fs, path, tempDir, writeFixture }))
  })

// Isolates tests from JSON_TREE_* variables set in the calling shell.
export const withSettings = (entries: ReadonlyArray<readonly [string, string]> = []) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))
