import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import {
  decodeYahooQuoteResponse,
  QUOTE_FIELDS,
  quoteUrl,
  REQUEST_HEADERS,
} from "./yahoo-finance.ts";
import type { ParseError, ServiceError, SymbolNotFound } from "../quote-source.ts";
import type { RawQuote } from "../domain.ts";

// --- Test data ---

const aaplEntry = {
  symbol: "AAPL",
  longName: "Apple Inc.",
  regularMarketPrice: 225.3,
  marketCap: 3_400_000_000_000,
  trailingPE: 34.2,
};

const validQuoteResponse = {
  quoteResponse: {
    result: [aaplEntry],
    error: null,
  },
};

// --- Helpers ---

type DecodeError = ParseError | SymbolNotFound | ServiceError;

function decode(json: unknown, symbol = "AAPL"): Promise<Either.Either<RawQuote, DecodeError>> {
  return Effect.runPromise(Effect.either(decodeYahooQuoteResponse(json, symbol)));
}

async function decodeSuccess(json: unknown, symbol = "AAPL"): Promise<RawQuote> {
  const result = await decode(json, symbol);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left._tag}`);
  return result.right;
}

async function decodeFailure(json: unknown, symbol = "AAPL"): Promise<DecodeError> {
  const result = await decode(json, symbol);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- quoteUrl ---

test("quoteUrl: encodes the symbol and lists every requested field", () => {
  const url = quoteUrl("https://example.test/v7/finance/quote", "BRK.B");
  expect(url).toBe(
    `https://example.test/v7/finance/quote?symbols=BRK.B&fields=${QUOTE_FIELDS.join(",")}`,
  );
  expect(quoteUrl("https://example.test/q", "^GSPC")).toContain("symbols=%5EGSPC&");
});

test("REQUEST_HEADERS: sends a browser-like user agent", () => {
  expect(REQUEST_HEADERS["User-Agent"]?.startsWith("Mozilla/5.0")).toBe(true);
  expect(REQUEST_HEADERS["Accept-Language"]).toBe("en-US,en;q=0.9");
});

// --- decodeYahooQuoteResponse ---

test("decodeYahooQuoteResponse: valid response yields the raw entry", async () => {
  const quote = await decodeSuccess(validQuoteResponse);
  expect(quote).toEqual(aaplEntry);
});

test("decodeYahooQuoteResponse: picks the entry for the requested symbol", async () => {
  const quote = await decodeSuccess(
    {
      quoteResponse: {
        result: [{ symbol: "MSFT", regularMarketPrice: 420 }, aaplEntry],
        error: null,
      },
    },
    "aapl",
  );
  expect(quote.symbol).toBe("AAPL");
});

test("decodeYahooQuoteResponse: sparse entries are passed through untouched", async () => {
  const quote = await decodeSuccess({
    quoteResponse: { result: [{ symbol: "AAPL", marketCap: null }] },
  });
  expect(quote).toEqual({ symbol: "AAPL", marketCap: null });
});

test("decodeYahooQuoteResponse: null input returns ParseError", async () => {
  const error = await decodeFailure(null);
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooQuoteResponse: missing quoteResponse returns ParseError", async () => {
  const error = await decodeFailure({ finance: { result: null } });
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooQuoteResponse: non-object entries return ParseError", async () => {
  const error = await decodeFailure({ quoteResponse: { result: ["AAPL"], error: null } });
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooQuoteResponse: empty result returns SymbolNotFound", async () => {
  const error = await decodeFailure({ quoteResponse: { result: [], error: null } });
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeYahooQuoteResponse: null result returns SymbolNotFound", async () => {
  const error = await decodeFailure({ quoteResponse: { result: null, error: null } });
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeYahooQuoteResponse: no entry for the symbol returns SymbolNotFound", async () => {
  const error = await decodeFailure(validQuoteResponse, "MSFT");
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeYahooQuoteResponse: upstream error returns ServiceError", async () => {
  const error = await decodeFailure({
    quoteResponse: {
      result: null,
      error: { code: "Unauthorized", description: "Invalid Crumb" },
    },
  });
  expect(error._tag).toBe("ServiceError");
  if (error._tag === "ServiceError") expect(error.message).toBe("Invalid Crumb");
});

test("decodeYahooQuoteResponse: upstream error without description uses its code", async () => {
  const error = await decodeFailure({
    quoteResponse: { result: null, error: { code: "Not Found" } },
  });
  expect(error._tag).toBe("ServiceError");
  if (error._tag === "ServiceError") expect(error.message).toBe("Not Found");
});
