import { Either } from "effect";
import { expect, test } from "vitest";
import {
  describeFailure,
  formatBanner,
  formatError,
  formatFailure,
  formatProgress,
  formatRecordLine,
  formatSummary,
} from "./format.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  ServiceError,
  SymbolNotFound,
} from "./quote-source.ts";
import { CompletionFault, completeRecord, MissingPrice } from "./record-completer.ts";
import type { CompletedRecord } from "./domain.ts";

const ANSI = /\x1b\[[0-9;]*m/g;

const plain = (text: string): string => text.replace(ANSI, "");

function sampleRecord(): CompletedRecord {
  const result = completeRecord(
    "GOOGL",
    { regularMarketPrice: 190.5, marketCap: 2_340_000_000_000, trailingPE: 23.46 },
    "2025-06-15T16:00:00.000Z",
  );
  if (Either.isLeft(result)) throw new Error("Expected a record");
  return result.right;
}

// --- Progress ---

test("formatProgress: position, total and symbol", () => {
  expect(formatProgress(3, 46, "NVDA")).toBe("[3/46] [NVDA]");
});

test("formatBanner: mentions the symbol count", () => {
  expect(plain(formatBanner(46)).split("\n")).toContain("Fetching 46 stocks");
});

test("formatRecordLine: price, P/E and market cap in billions", () => {
  expect(plain(formatRecordLine(sampleRecord()))).toBe("✓ $190.50 | PE: 23.5 | MCap: $2340.0B");
});

test("formatFailure: marks the reason as a failure", () => {
  expect(plain(formatFailure("No price"))).toBe("✗ No price");
});

// --- Summary ---

test("formatSummary: counts, output path and size", () => {
  const lines = plain(
    formatSummary({ total: 46, successful: 44, failed: 2 }, "stock-analysis-data.json", 1_572_864),
  ).split("\n");

  expect(lines).toContain("✓ Successfully fetched: 44/46 stocks");
  expect(lines).toContain("✗ Failed: 2 stocks");
  expect(lines).toContain("  Saved to: stock-analysis-data.json");
  expect(lines).toContain("  File size: 1.50 MB");
});

// --- describeFailure ---

test("describeFailure: transport errors", () => {
  expect(describeFailure(new NetworkError({ message: "reset" }))).toBe("Network error");
  expect(describeFailure(new ParseError({ message: "bad" }))).toBe("Unexpected response");
  expect(describeFailure(new SymbolNotFound({ symbol: "XYZ" }))).toBe("No data");
  expect(describeFailure(new ServiceError({ message: "Invalid Crumb" }))).toBe(
    "Service error: Invalid Crumb",
  );
});

test("describeFailure: HTTP status classes", () => {
  expect(describeFailure(new HttpError({ status: 404 }))).toBe("No data");
  expect(describeFailure(new HttpError({ status: 429 }))).toBe("Rate limited");
  expect(describeFailure(new HttpError({ status: 502 }))).toBe("Server error");
  expect(describeFailure(new HttpError({ status: 401 }))).toBe("HTTP 401");
});

test("describeFailure: completion errors", () => {
  expect(describeFailure(new MissingPrice({ symbol: "XYZ" }))).toBe("No price");
  expect(
    describeFailure(new CompletionFault({ symbol: "XYZ", message: "Expected number" })),
  ).toBe("Unusable quote: Expected number");
});

// --- formatError ---

test("formatError: title and hint on their own lines", () => {
  expect(plain(formatError("Invalid configuration", "FETCH_MAX_ATTEMPTS must be at least 1"))).toBe(
    "\n  ✗ Invalid configuration\n  FETCH_MAX_ATTEMPTS must be at least 1\n",
  );
});
