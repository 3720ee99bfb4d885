import { BASE_CURRENCY, CURRENCY_RATES, type CurrencyRate } from "@shared/constants";

const BASE_RATE: CurrencyRate = { symbol: BASE_CURRENCY, factor: 1 };

/**
 * Round to cents, ties to the even cent: 0.125 gives 0.12, 0.375 gives 0.38.
 */
export function roundTo2Decimals(value: number): number {
  const cents = value * 100;
  const floor = Math.floor(cents);
  const fraction = cents - floor;
  if (fraction === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return (fraction > 0.5 ? floor + 1 : floor) / 100;
}

/**
 * First currency in detection order whose symbol occurs in the text.
 * Falls back to the base currency.
 */
export function detectCurrency(text: string): CurrencyRate {
  const haystack = text.toUpperCase();
  return CURRENCY_RATES.find(rate => haystack.includes(rate.symbol)) ?? BASE_RATE;
}

/**
 * Parse a money cell into AED.
 *
 * Numbers pass through untouched. Text is stripped to digits, `.`, `-` and
 * parentheses; a fully parenthesized amount is negative. Anything that still
 * doesn't parse is 0, so a bad cell never aborts a sheet.
 */
export function parseAmount(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }

  const text = value instanceof Date ? value.toISOString() : String(value);
  const currency = detectCurrency(text);

  let cleaned = text.replace(/[^\d.\-()]/g, "");
  if (cleaned.startsWith("(") && cleaned.endsWith(")")) {
    cleaned = `-${cleaned.slice(1, -1)}`;
  }

  // Number("") is 0 and Number("1-2") is NaN: both land on 0 below
  const amount = Number(cleaned);
  if (!Number.isFinite(amount)) {
    return 0;
  }
  return roundTo2Decimals(amount * currency.factor);
}
