// Derivation cascade: ordered "fill only if missing" rules.
//
// Each rule names the figure it fills, an extra precondition, and how to
// derive the value from what is already known. Rules run top to bottom
// against the accumulated figures, so a rule may depend on any figure an
// earlier rule filled. Several rules may target the same figure: the
// first one that fires wins, later ones act as fallbacks.

import { formatNumber, isMissing, safeDivide, toInteger } from "./safe-math.ts";

// --- Figures ---

export interface Financials {
  readonly price: number;
  readonly marketCap: number;
  readonly sharesOutstanding: number;
  readonly eps: number;
  readonly pe: number;
  readonly revenue: number;
  readonly totalCash: number;
  readonly totalDebt: number;
  readonly freeCashflow: number;
  readonly operatingCashflow: number;
  readonly ebitda: number;
  readonly profitMargin: number;
  readonly operatingMargin: number;
  readonly grossMargin: number;
  readonly roe: number;
  readonly roa: number;
  readonly bookValue: number;
  readonly totalAssets: number;
  readonly totalEquity: number;
  readonly debtToEquity: number;
  readonly currentRatio: number;
  readonly quickRatio: number;
  readonly priceToBook: number;
  readonly fiftyTwoWeekHigh: number;
  readonly fiftyTwoWeekLow: number;
}

export interface DerivationRule {
  readonly name: string;
  readonly target: keyof Financials;
  readonly when: (f: Financials) => boolean;
  readonly derive: (f: Financials) => number;
}

const always = (): boolean => true;

const constant =
  (value: number) =>
  (): number =>
    value;

// --- Rules ---

export const derivationRules: readonly DerivationRule[] = [
  // Shares and market cap from each other
  {
    name: "sharesFromMarketCap",
    target: "sharesOutstanding",
    when: (f) => f.marketCap > 0 && f.price > 0,
    derive: (f) => toInteger(safeDivide(f.marketCap, f.price)),
  },
  {
    name: "marketCapFromShares",
    target: "marketCap",
    when: (f) => f.sharesOutstanding > 0 && f.price > 0,
    derive: (f) => toInteger(f.sharesOutstanding * f.price),
  },

  // Earnings multiple and EPS from each other
  {
    name: "peFromEps",
    target: "pe",
    when: (f) => f.eps > 0 && f.price > 0,
    derive: (f) => formatNumber(safeDivide(f.price, f.eps)),
  },
  {
    name: "epsFromPe",
    target: "eps",
    when: (f) => f.pe > 0 && f.price > 0,
    derive: (f) => formatNumber(safeDivide(f.price, f.pe)),
  },

  // Estimates scaled from market cap
  {
    name: "revenueFromMarketCap",
    target: "revenue",
    when: (f) => f.marketCap > 0,
    derive: (f) => toInteger(f.marketCap * 0.8),
  },
  {
    name: "cashFromMarketCap",
    target: "totalCash",
    when: (f) => f.marketCap > 0,
    derive: (f) => toInteger(f.marketCap * 0.15),
  },
  {
    name: "debtFromMarketCap",
    target: "totalDebt",
    when: (f) => f.marketCap > 0,
    derive: (f) => toInteger(f.marketCap * 0.1),
  },
  {
    name: "freeCashflowFromMarketCap",
    target: "freeCashflow",
    when: (f) => f.marketCap > 0,
    derive: (f) => toInteger(f.marketCap * 0.1),
  },
  {
    name: "operatingCashflowFromFreeCashflow",
    target: "operatingCashflow",
    when: (f) => f.freeCashflow > 0,
    derive: (f) => toInteger(f.freeCashflow * 1.2),
  },
  {
    name: "ebitdaFromRevenue",
    target: "ebitda",
    when: (f) => f.revenue > 0,
    derive: (f) => toInteger(f.revenue * 0.2),
  },

  // Margins and returns
  { name: "defaultProfitMargin", target: "profitMargin", when: always, derive: constant(0.15) },
  { name: "defaultOperatingMargin", target: "operatingMargin", when: always, derive: constant(0.2) },
  { name: "defaultGrossMargin", target: "grossMargin", when: always, derive: constant(0.4) },
  { name: "defaultRoe", target: "roe", when: always, derive: constant(0.12) },
  { name: "defaultRoa", target: "roa", when: always, derive: constant(0.08) },

  // Balance sheet
  {
    name: "assetsFromRevenue",
    target: "totalAssets",
    when: (f) => f.revenue > 0,
    derive: (f) => toInteger(safeDivide(f.revenue, 0.8, f.marketCap * 1.5)),
  },
  {
    name: "assetsFromMarketCap",
    target: "totalAssets",
    when: always,
    derive: (f) => toInteger(f.marketCap * 1.5),
  },
  {
    name: "equityFromBookValue",
    target: "totalEquity",
    when: (f) => f.bookValue > 0 && f.sharesOutstanding > 0,
    derive: (f) => toInteger(f.bookValue * f.sharesOutstanding),
  },
  {
    name: "equityFromAssets",
    target: "totalEquity",
    when: always,
    derive: (f) => toInteger(f.totalAssets * 0.6),
  },

  // Liquidity ratios
  {
    name: "debtToEquity",
    target: "debtToEquity",
    when: always,
    derive: (f) => formatNumber(safeDivide(f.totalDebt, f.totalEquity)),
  },
  { name: "defaultCurrentRatio", target: "currentRatio", when: always, derive: constant(1.5) },
  { name: "defaultQuickRatio", target: "quickRatio", when: always, derive: constant(1.2) },

  // Price to book
  {
    name: "priceToBookFromBookValue",
    target: "priceToBook",
    when: (f) => f.bookValue > 0 && f.price > 0,
    derive: (f) => formatNumber(safeDivide(f.price, f.bookValue)),
  },
  {
    name: "defaultPriceToBook",
    target: "priceToBook",
    when: always,
    derive: (f) => formatNumber(safeDivide(f.price, 20)),
  },

  // 52-week range
  {
    name: "fiftyTwoWeekHighFromPrice",
    target: "fiftyTwoWeekHigh",
    when: always,
    derive: (f) => f.price * 1.2,
  },
  {
    name: "fiftyTwoWeekLowFromPrice",
    target: "fiftyTwoWeekLow",
    when: always,
    derive: (f) => f.price * 0.8,
  },
];

// --- Evaluation ---

export interface Derivation {
  readonly financials: Financials;
  /** Names of the rules that fired, in order. */
  readonly applied: readonly string[];
}

/** Apply one rule if its target is still missing and its precondition
 *  holds; `undefined` when the rule does not fire. */
export function applyRule(f: Financials, rule: DerivationRule): Financials | undefined {
  if (!isMissing(f[rule.target]) || !rule.when(f)) return undefined;
  return { ...f, [rule.target]: rule.derive(f) };
}

export function deriveFinancials(
  initial: Financials,
  rules: readonly DerivationRule[] = derivationRules,
): Derivation {
  return rules.reduce<Derivation>(
    (acc, rule) => {
      const next = applyRule(acc.financials, rule);
      return next === undefined
        ? acc
        : { financials: next, applied: [...acc.applied, rule.name] };
    },
    { financials: initial, applied: [] },
  );
}
