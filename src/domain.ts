// Pure domain types: no framework dependency, no I/O.

/** One entry of the upstream quote list, exactly as received. */
export type RawQuote = Readonly<Record<string, unknown>>;

export interface CompletedRecord {
  // Identity
  readonly symbol: string;
  readonly name: string;
  readonly sector: string;
  readonly industry: string;

  // Price / trading
  readonly price: number;
  readonly change: number;
  readonly changePercent: number;
  readonly dayHigh: number;
  readonly dayLow: number;
  readonly volume: number;
  readonly previousClose: number;
  readonly currency: string;
  readonly exchange: string;

  // Valuation
  readonly marketCap: number;
  readonly enterpriseValue: number;
  readonly pe: number;
  readonly forwardPE: number;
  readonly pegRatio: number;
  readonly priceToBook: number;
  readonly priceToSales: number;
  readonly evToRevenue: number;
  readonly evToEbitda: number;

  // Growth
  readonly revenueGrowth: string;
  readonly earningsGrowth: string;

  // Profitability
  readonly revenue: number;
  readonly grossProfit: number;
  readonly ebitda: number;
  readonly netIncome: number;
  readonly eps: number;
  readonly epsRaw: number;
  readonly forwardEps: number;

  // Margins
  readonly grossMargin: string;
  readonly operatingMargin: string;
  readonly profitMargin: string;
  readonly ebitdaMargin: string;

  // Returns
  readonly roe: string;
  readonly roa: string;

  // Balance sheet
  readonly totalCash: number;
  readonly totalDebt: number;
  readonly netDebt: number;
  readonly totalAssets: number;
  readonly totalEquity: number;

  // Ratios
  readonly debtToEquity: number;
  readonly debtToAssets: number;
  readonly currentRatio: number;
  readonly quickRatio: number;

  // Cash flow
  readonly operatingCashflow: number;
  readonly freeCashflow: number;

  // Dividends
  readonly dividendRate: number;
  readonly dividendYield: string;
  readonly payoutRatio: string;

  // Share data
  readonly sharesOutstanding: number;
  readonly floatShares: number;

  // Risk
  readonly beta: number;
  readonly shortRatio: number;

  // 52-week range
  readonly fiftyTwoWeekHigh: number;
  readonly fiftyTwoWeekLow: number;

  // Metadata
  readonly lastUpdated: string; // ISO-8601
  readonly dataQuality: string;
  readonly dataSource: string;
}

export interface AggregateResult {
  readonly lastUpdated: string;
  readonly totalStocks: number;
  readonly dataVersion: string;
  readonly dataSource: string;
  readonly dataQuality: string;
  readonly stocks: Readonly<Record<string, CompletedRecord>>;
}

export const DATA_SOURCE = "Yahoo Finance v7 API";
export const DATA_VERSION = "4.0-robust";
