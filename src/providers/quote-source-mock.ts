// QuoteSourceTest: in-memory QuoteSource for tests and offline runs.
//
// The sample quotes are deliberately uneven: one is nearly complete, the
// others leave out most of what the completer would like to read.

import { Effect, Layer } from "effect";
import type { RawQuote } from "../domain.ts";
import { QuoteSource, SymbolNotFound } from "../quote-source.ts";

// --- Sample data ---

export const sampleQuotes: Readonly<Record<string, RawQuote>> = {
  AAPL: {
    symbol: "AAPL",
    longName: "Apple Inc.",
    currency: "USD",
    fullExchangeName: "NasdaqGS",
    regularMarketPrice: 225.3,
    regularMarketChange: 3.45,
    regularMarketChangePercent: 1.55,
    regularMarketVolume: 48_210_300,
    marketCap: 3_400_000_000_000,
    sharesOutstanding: 15_100_000_000,
    trailingPE: 34.2,
    trailingEps: 6.59,
    bookValue: 4.4,
    totalRevenue: 391_000_000_000,
    profitMargins: 0.24,
    grossMargins: 0.46,
    dividendYield: 0.0044,
    beta: 1.24,
    fiftyTwoWeekHigh: 237.23,
    fiftyTwoWeekLow: 164.08,
  },
  BABA: {
    symbol: "BABA",
    shortName: "Alibaba Group",
    regularMarketPrice: 84.5,
    sharesOutstanding: 2_400_000_000,
  },
  NIO: {
    symbol: "NIO",
    currentPrice: 4.8,
    marketCap: 9_600_000_000,
  },
  DELIST: {
    symbol: "DELIST",
    regularMarketPrice: 0,
  },
};

// --- Mock layer ---

export const QuoteSourceTestLive = Layer.succeed(
  QuoteSource,
  QuoteSource.of({
    getRawQuote: (symbol: string) => {
      const quote = sampleQuotes[symbol.toUpperCase()];
      return quote !== undefined
        ? Effect.succeed(quote)
        : Effect.fail(new SymbolNotFound({ symbol }));
    },
  }),
);
