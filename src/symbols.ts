// Static symbol list, kept as data in data/symbols.json.

import { Effect, type ParseResult, Schema } from "effect";
import symbolData from "../data/symbols.json";

const Ticker = Schema.String.pipe(
  Schema.pattern(/^[A-Z0-9][A-Z0-9.^=-]*$/, {
    message: () => "Expected an upper-case ticker symbol",
  }),
);

const SymbolList = Schema.NonEmptyArray(Ticker);

export function decodeSymbols(
  json: unknown,
): Effect.Effect<readonly string[], ParseResult.ParseError> {
  return Schema.decodeUnknown(SymbolList)(json).pipe(
    // Order of first appearance, no repeats.
    Effect.map((symbols) => Array.from(new Set(symbols))),
  );
}

export const loadSymbols = decodeSymbols(symbolData);
