// Pure formatting functions: no I/O.

import type { CompletedRecord } from "./domain.ts";
import type { QuoteSourceError } from "./quote-source.ts";
import type { CompletionError } from "./record-completer.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

const RULE = "=".repeat(70);

// --- Run banner and progress ---

export function formatBanner(symbolCount: number): string {
  return [
    RULE,
    `${BOLD}STOCK SNAPSHOT${RESET}`,
    RULE,
    `Fetching ${symbolCount} stocks`,
    RULE,
  ].join("\n");
}

export function formatProgress(position: number, total: number, symbol: string): string {
  return `[${position}/${total}] [${symbol}]`;
}

export function formatRecordLine(record: CompletedRecord): string {
  const capBillions = record.marketCap / 1e9;
  return `${GREEN}✓${RESET} $${record.price.toFixed(2)} | PE: ${record.pe.toFixed(1)} | MCap: $${capBillions.toFixed(1)}B`;
}

export function formatFailure(reason: string): string {
  return `${RED}✗${RESET} ${reason}`;
}

// --- Summary ---

export interface RunSummary {
  readonly total: number;
  readonly successful: number;
  readonly failed: number;
}

export function formatSummary(
  summary: RunSummary,
  outputPath: string,
  bytes: number,
): string {
  return [
    "",
    RULE,
    `${BOLD}SUMMARY${RESET}`,
    RULE,
    `${GREEN}✓${RESET} Successfully fetched: ${summary.successful}/${summary.total} stocks`,
    `${RED}✗${RESET} Failed: ${summary.failed} stocks`,
    `  Saved to: ${outputPath}`,
    `  ${DIM}File size: ${(bytes / 1024 / 1024).toFixed(2)} MB${RESET}`,
    RULE,
  ].join("\n");
}

// --- Error formatting ---

export function describeFailure(error: QuoteSourceError | CompletionError): string {
  switch (error._tag) {
    case "NetworkError":
      return "Network error";
    case "HttpError":
      return describeHttpStatus(error.status);
    case "ParseError":
      return "Unexpected response";
    case "SymbolNotFound":
      return "No data";
    case "ServiceError":
      return `Service error: ${error.message}`;
    case "MissingPrice":
      return "No price";
    case "CompletionFault":
      return `Unusable quote: ${error.message}`;
  }
}

function describeHttpStatus(status: number): string {
  if (status === 404) return "No data";
  if (status === 429) return "Rate limited";
  if (status >= 500 && status < 600) return "Server error";
  return `HTTP ${status}`;
}

export function formatError(title: string, hint: string): string {
  return [
    "",
    `${RED}${BOLD}  ✗ ${title}${RESET}`,
    `  ${DIM}${hint}${RESET}`,
    "",
  ].join("\n");
}
