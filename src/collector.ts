// Collector: walks the symbol list and accumulates completed records.
//
// One symbol at a time, with a fixed pause after each, so the upstream
// service sees a steady trickle of requests. A symbol that cannot be
// fetched or completed is counted as failed and left out of the result.

import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Clock, Console, Duration, Effect, Either, Option } from "effect";
import {
  type AggregateResult,
  type CompletedRecord,
  DATA_SOURCE,
  DATA_VERSION,
} from "./domain.ts";
import {
  describeFailure,
  formatFailure,
  formatProgress,
  formatRecordLine,
  type RunSummary,
} from "./format.ts";
import type { QuoteSource } from "./quote-source.ts";
import { completeRecordWithTrace } from "./record-completer.ts";
import { fetchRawQuote } from "./resilient-fetcher.ts";
import type { FetchPolicy } from "./settings.ts";

// --- Types ---

export interface SymbolOutcome {
  readonly symbol: string;
  readonly record: Option.Option<CompletedRecord>;
}

export interface CollectOptions {
  readonly fetch: FetchPolicy;
  readonly symbolDelay: Duration.DurationInput;
}

const currentIsoTime = Clock.currentTimeMillis.pipe(
  Effect.map((millis) => new Date(millis).toISOString()),
);

// --- Per symbol ---

export function collectSymbol(
  symbol: string,
  position: number,
  total: number,
  policy: FetchPolicy,
): Effect.Effect<SymbolOutcome, never, QuoteSource> {
  return Effect.gen(function* () {
    const progress = formatProgress(position, total, symbol);
    const raw = yield* fetchRawQuote(symbol, policy);

    if (Option.isNone(raw)) {
      yield* Console.log(`${progress} ${formatFailure("No data")}`);
      return { symbol, record: Option.none() };
    }

    const lastUpdated = yield* currentIsoTime;
    const completion = completeRecordWithTrace(symbol, raw.value, lastUpdated);

    if (Either.isLeft(completion)) {
      yield* Console.log(
        `${progress} ${formatFailure(describeFailure(completion.left))}`,
      );
      return { symbol, record: Option.none() };
    }

    const { record, derived } = completion.right;
    if (derived.length > 0) {
      yield* Effect.logDebug(`[complete] ${symbol} estimated: ${derived.join(", ")}`);
    }
    yield* Console.log(`${progress} ${formatRecordLine(record)}`);
    return { symbol, record: Option.some(record) };
  });
}

// --- Whole run ---

export function collectAll(
  symbols: readonly string[],
  options: CollectOptions,
): Effect.Effect<readonly SymbolOutcome[], never, QuoteSource> {
  return Effect.forEach(symbols, (symbol, index) =>
    collectSymbol(symbol, index + 1, symbols.length, options.fetch).pipe(
      Effect.zipLeft(Effect.sleep(options.symbolDelay)),
    ),
  );
}

export function summarize(outcomes: readonly SymbolOutcome[]): RunSummary {
  const successful = outcomes.filter((o) => Option.isSome(o.record)).length;
  return {
    total: outcomes.length,
    successful,
    failed: outcomes.length - successful,
  };
}

export function buildAggregate(
  outcomes: readonly SymbolOutcome[],
  lastUpdated: string,
): AggregateResult {
  const stocks: Record<string, CompletedRecord> = {};
  for (const { symbol, record } of outcomes) {
    if (Option.isSome(record)) stocks[symbol] = record.value;
  }
  return {
    lastUpdated,
    totalStocks: Object.keys(stocks).length,
    dataVersion: DATA_VERSION,
    dataSource: DATA_SOURCE,
    dataQuality: "Complete - no errors, no blank fields",
    stocks,
  };
}

export const aggregateNow = (outcomes: readonly SymbolOutcome[]) =>
  currentIsoTime.pipe(Effect.map((now) => buildAggregate(outcomes, now)));

// --- Output ---

/** Write the aggregate as indented JSON. Returns the size in bytes. */
export function writeAggregate(
  path: string,
  aggregate: AggregateResult,
): Effect.Effect<number, PlatformError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = JSON.stringify(aggregate, null, 2);
    yield* fs.writeFileString(path, text);
    return new TextEncoder().encode(text).byteLength;
  });
}
