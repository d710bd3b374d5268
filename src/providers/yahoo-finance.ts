// Yahoo Finance v7 quote endpoint: implementation of QuoteSource.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Schema } from "effect";
import type { RawQuote } from "../domain.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  QuoteSource,
  ServiceError,
  SymbolNotFound,
} from "../quote-source.ts";

// --- Request ---

export const QUOTE_FIELDS = [
  "symbol",
  "longName",
  "regularMarketPrice",
  "regularMarketChange",
  "regularMarketChangePercent",
  "regularMarketVolume",
  "marketCap",
  "trailingPE",
  "forwardPE",
  "priceToBook",
  "dividendYield",
  "trailingEps",
  "bookValue",
  "fiftyTwoWeekHigh",
  "fiftyTwoWeekLow",
  "averageAnalystRating",
  "totalCash",
  "totalDebt",
  "revenueQuarterlyGrowth",
  "earningsQuarterlyGrowth",
  "profitMargins",
  "operatingMargins",
  "grossMargins",
  "returnOnAssets",
  "returnOnEquity",
  "freeCashflow",
  "operatingCashflow",
  "ebitda",
  "revenue",
  "totalRevenue",
  "sharesOutstanding",
  "beta",
  "currentPrice",
  "targetMeanPrice",
] as const;

/** Yahoo rejects requests that do not look like they come from a browser. */
export const REQUEST_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "*/*",
  "Accept-Language": "en-US,en;q=0.9",
};

export function quoteUrl(baseUrl: string, symbol: string): string {
  return `${baseUrl}?symbols=${encodeURIComponent(symbol)}&fields=${QUOTE_FIELDS.join(",")}`;
}

// --- Yahoo response schema ---

const YahooQuoteResponse = Schema.Struct({
  quoteResponse: Schema.Struct({
    result: Schema.NullOr(
      Schema.Array(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
    ),
    error: Schema.optional(
      Schema.NullOr(
        Schema.Struct({
          code: Schema.optional(Schema.String),
          description: Schema.optional(Schema.String),
        }),
      ),
    ),
  }),
});

type YahooQuoteResponseType = typeof YahooQuoteResponse.Type;

// --- Decode Yahoo response into RawQuote ---

export function decodeYahooQuoteResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<RawQuote, ParseError | SymbolNotFound | ServiceError> {
  return Schema.decodeUnknown(YahooQuoteResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => interpretYahooResponse(response, symbol)),
  );
}

function interpretYahooResponse(
  response: YahooQuoteResponseType,
  symbol: string,
): Effect.Effect<RawQuote, SymbolNotFound | ServiceError> {
  const { result, error } = response.quoteResponse;

  if (error !== null && error !== undefined) {
    return Effect.fail(
      new ServiceError({
        message: error.description ?? error.code ?? "Upstream error",
      }),
    );
  }

  const wanted = symbol.toUpperCase();
  const quote = (result ?? []).find(
    (entry) =>
      typeof entry.symbol === "string" && entry.symbol.toUpperCase() === wanted,
  );

  return quote === undefined
    ? Effect.fail(new SymbolNotFound({ symbol }))
    : Effect.succeed(quote);
}

// --- Yahoo Finance layer ---

export const YahooFinanceLive = Layer.effect(
  QuoteSource,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(HttpClientRequest.setHeaders(REQUEST_HEADERS)),
    );
    const baseUrl = yield* Config.string("YAHOO_QUOTE_URL").pipe(
      Config.withDefault("https://query2.finance.yahoo.com/v7/finance/quote"),
    );

    return QuoteSource.of({
      getRawQuote: (symbol: string) =>
        Effect.gen(function* () {
          const response = yield* client.get(quoteUrl(baseUrl, symbol));
          const json = yield* response.json;
          return yield* decodeYahooQuoteResponse(json, symbol);
        }).pipe(
          Effect.scoped,
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new NetworkError({ message: e.message })),
            ResponseError: (e) =>
              e.reason === "StatusCode"
                ? Effect.fail(new HttpError({ status: e.response.status }))
                : Effect.fail(
                    new ParseError({
                      message: `JSON parse failed: ${e.message}`,
                    }),
                  ),
          }),
        ),
    });
  }),
);
