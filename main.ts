import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { ConfigError, Console, Effect, Layer } from "effect";
import type { QuoteSource } from "./src/quote-source.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { QuoteSourceTestLive } from "./src/providers/quote-source-mock.ts";
import {
  aggregateNow,
  collectAll,
  summarize,
  writeAggregate,
} from "./src/collector.ts";
import { formatBanner, formatError, formatSummary } from "./src/format.ts";
import { loadSettings, type ProviderName } from "./src/settings.ts";
import { loadSymbols } from "./src/symbols.ts";

// --- CLI ---

const output = Options.file("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Where to write the aggregate JSON"),
  Options.withDefault("stock-analysis-data.json"),
);

const command = Command.make("stock-snapshot", { output }).pipe(
  Command.withHandler(({ output }) =>
    Effect.gen(function* () {
      const settings = yield* loadSettings;
      const symbols = yield* loadSymbols;

      yield* Console.log(formatBanner(symbols.length));

      const outcomes = yield* collectAll(symbols, {
        fetch: settings.fetch,
        symbolDelay: settings.symbolDelay,
      }).pipe(Effect.provide(quoteSourceLayer(settings.provider)));

      const aggregate = yield* aggregateNow(outcomes);
      const bytes = yield* writeAggregate(output, aggregate);
      yield* Console.log(formatSummary(summarize(outcomes), output, bytes));
    }).pipe(
      Effect.catchIf(ConfigError.isConfigError, (e) =>
        Console.error(formatError("Invalid configuration", String(e))),
      ),
      Effect.catchTags({
        ParseError: (e) =>
          Console.error(formatError("Invalid symbol list", e.message)),
        BadArgument: (e) =>
          Console.error(formatError("Could not write output", e.message)),
        SystemError: (e) =>
          Console.error(formatError("Could not write output", e.message)),
      }),
    )
  ),
);

// --- Layers ---
// Set QUOTE_PROVIDER to "yahoo" (default) or "test".

function quoteSourceLayer(
  provider: ProviderName,
): Layer.Layer<QuoteSource, ConfigError.ConfigError> {
  switch (provider) {
    case "test":
      return QuoteSourceTestLive;
    case "yahoo":
      return YahooFinanceLive.pipe(Layer.provide(FetchHttpClient.layer));
  }
}

// --- Run ---

const cli = Command.run(command, {
  name: "stock-snapshot",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
