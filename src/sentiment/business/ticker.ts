import { InvalidTickerError } from "../domain/errors";

// Base symbol plus an optional share-class suffix, e.g. BRK.B or RDS-A
const TICKER_PATTERN = /^[A-Z0-9]{1,10}(?:[.-][A-Z0-9]{1,4})?$/;

/**
 * Trims and upper-cases a ticker, throwing InvalidTickerError when it is
 * not a short alphanumeric symbol.
 */
export function normalizeTicker(raw: unknown): string {
  const normalized = String(raw ?? "")
    .trim()
    .toUpperCase();
  if (!TICKER_PATTERN.test(normalized)) {
    throw new InvalidTickerError(String(raw ?? ""));
  }
  return normalized;
}
