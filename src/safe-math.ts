// Total numeric helpers.
//
// Every partial operation the completer needs (lookup, division, numeric
// coercion) has a version here that returns a well-defined value instead
// of failing. Zero external dependencies. Data in, data out.

/** Value of `source[key]`, or `fallback` when the source or the value is
 *  null/undefined. */
export function safeGet<T extends object, K extends keyof T, D>(
  source: T | null | undefined,
  key: K,
  fallback: D,
): NonNullable<T[K]> | D {
  if (source === null || source === undefined) return fallback;
  const value = source[key];
  return value === null || value === undefined ? fallback : value;
}

/** `numerator / denominator`, or `fallback` whenever the quotient would
 *  not be a finite number. */
export function safeDivide(
  numerator: number,
  denominator: number | null | undefined,
  fallback = 0,
): number {
  if (
    denominator === null ||
    denominator === undefined ||
    denominator === 0 ||
    !Number.isFinite(denominator) ||
    !Number.isFinite(numerator)
  ) {
    return fallback;
  }
  const quotient = numerator / denominator;
  return Number.isFinite(quotient) ? quotient : fallback;
}

/** Round to `decimals` places. Anything that is not a finite number
 *  (after converting numeric strings) becomes 0, and so does 0 itself. */
export function formatNumber(value: unknown, decimals = 2): number {
  const n = toFiniteNumber(value);
  if (n === 0) return 0;
  const factor = 10 ** decimals;
  // `|| 0` folds -0 into 0.
  return roundHalfEven(n * factor) / factor || 0;
}

/** Nearest integer; exact halves go to the even neighbour (2.5 → 2,
 *  3.5 → 4). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

/** A ratio (0.153) as a percentage string ("15.30%"). */
export function formatPercent(ratio: number): string {
  return `${formatNumber(ratio * 100, 2).toFixed(2)}%`;
}

/** Truncate toward zero; 0 for non-finite input. */
export function toInteger(value: number): number {
  return Number.isFinite(value) ? Math.trunc(value) || 0 : 0;
}

/** Zero and absent are the same signal: no data. */
export function isMissing(value: number | null | undefined): boolean {
  return value === null || value === undefined || value === 0;
}

function toFiniteNumber(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}
