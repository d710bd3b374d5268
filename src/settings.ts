// Run settings read from the environment through effect/Config.
// Every value has a default, so an empty environment is a valid one.

import { Config, type ConfigError, Duration, Effect } from "effect";

// --- Types ---

export interface FetchPolicy {
  readonly maxAttempts: number;
  readonly attemptTimeout: Duration.Duration;
  readonly retryDelay: Duration.Duration;
}

export type ProviderName = "yahoo" | "test";

export interface Settings {
  readonly provider: ProviderName;
  readonly fetch: FetchPolicy;
  /** Pause after each symbol, to stay under the upstream rate limit. */
  readonly symbolDelay: Duration.Duration;
}

export const defaultFetchPolicy: FetchPolicy = {
  maxAttempts: 3,
  attemptTimeout: Duration.seconds(20),
  retryDelay: Duration.seconds(2),
};

// --- Config ---

const fetchPolicyConfig: Config.Config<FetchPolicy> = Config.all({
  maxAttempts: Config.integer("FETCH_MAX_ATTEMPTS").pipe(
    Config.validate({
      message: "FETCH_MAX_ATTEMPTS must be at least 1",
      validation: (n) => n >= 1,
    }),
    Config.withDefault(defaultFetchPolicy.maxAttempts),
  ),
  attemptTimeout: Config.duration("FETCH_TIMEOUT").pipe(
    Config.withDefault(defaultFetchPolicy.attemptTimeout),
  ),
  retryDelay: Config.duration("FETCH_RETRY_DELAY").pipe(
    Config.withDefault(defaultFetchPolicy.retryDelay),
  ),
});

const settingsConfig: Config.Config<Settings> = Config.all({
  provider: Config.literal("yahoo", "test")("QUOTE_PROVIDER").pipe(
    Config.withDefault<ProviderName>("yahoo"),
  ),
  fetch: fetchPolicyConfig,
  symbolDelay: Config.duration("SYMBOL_DELAY").pipe(
    Config.withDefault(Duration.seconds(2)),
  ),
});

export const loadSettings: Effect.Effect<Settings, ConfigError.ConfigError> =
  Effect.gen(function* () {
    return yield* settingsConfig;
  });
