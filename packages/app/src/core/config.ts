import { Config, LogLevel } from "effect"

// CHANGE: describe environment-driven settings for the CLI
// WHY: logging verbosity and the token dump are switched without extra arguments
// QUOTE(TZ): n/a
// REF: req-config-1
// SOURCE: n/a
// FORMAT THEOREM: ∀env: load(env).logLevel = env.JSON_TREE_LOG_LEVEL ?? Info
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every setting has a default
// COMPLEXITY: O(1)/O(1)

export interface AppConfig {
  readonly logLevel: LogLevel.LogLevel
  readonly dumpTokens: boolean
}

export const appConfig: Config.Config<AppConfig> = Config.all({
  logLevel: Config.logLevel("JSON_TREE_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
  dumpTokens: Config.boolean("JSON_TREE_DUMP_TOKENS").pipe(Config.withDefault(false))
})
