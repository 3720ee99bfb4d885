/**
 * Shared Constants
 *
 * Static reference tables for the VAT box summary. Everything here is
 * immutable process-wide configuration; nothing mutates these at runtime.
 */

// ═══════════════════════════════════════════════════════════════════════════
// CANONICAL FIELDS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The nine columns every processed sheet ends up with. A sheet that lacks one
 * of them gets it as an empty column.
 */
export const CANONICAL_FIELDS = [
  'Supply Type',
  'Invoice Number',
  'Date',
  'Customer/supplier Name',
  'Supply/Purchase Value',
  'VAT Value',
  'Invoice Value',
  'Recoverable',
  'Box',
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

/**
 * Surface header → canonical field. Lookup is case-insensitive with internal
 * whitespace collapsed (see header-normalizer).
 */
export const HEADER_ALIASES: Readonly<Record<string, CanonicalField>> = {
  'Supply Type': 'Supply Type',
  '#': 'Invoice Number',
  'Invoice #': 'Invoice Number',
  'Invoice No.': 'Invoice Number',
  'Invoice Number': 'Invoice Number',
  'Date': 'Date',
  'Recoverable': 'Recoverable',
  'Customer/supplier Name': 'Customer/supplier Name',
  'Customer Name': 'Customer/supplier Name',
  'Supplier Name': 'Customer/supplier Name',
  'Net': 'Supply/Purchase Value',
  'Supply/Purchase Value': 'Supply/Purchase Value',
  'Tax': 'VAT Value',
  'VAT Value': 'VAT Value',
  'Gross': 'Invoice Value',
  'Invoice Value': 'Invoice Value',
  'Box': 'Box',
};

/** Keywords that mark a header row; a row needs two distinct hits. */
export const HEADER_KEYWORDS = ['supply', 'box', 'date', 'tax', 'gross', 'net'] as const;

// ═══════════════════════════════════════════════════════════════════════════
// CURRENCIES
// ═══════════════════════════════════════════════════════════════════════════

export const BASE_CURRENCY = 'AED';

export interface CurrencyRate {
  symbol: string;
  /** Multiplier into AED */
  factor: number;
}

const DECLARED_RATES: readonly CurrencyRate[] = [
  { symbol: 'AED', factor: 1 },
  { symbol: 'د.إ', factor: 1 },
  { symbol: 'DHS', factor: 1 },
  { symbol: 'US$', factor: 3.67 },
  { symbol: 'USD', factor: 3.67 },
  { symbol: '$', factor: 3.67 },
  { symbol: 'EUR', factor: 3.97 },
  { symbol: '€', factor: 3.97 },
  { symbol: 'GBP', factor: 4.65 },
  { symbol: '£', factor: 4.65 },
  { symbol: 'SAR', factor: 0.98 },
  { symbol: 'INR', factor: 0.044 },
  { symbol: '₹', factor: 0.044 },
];

/**
 * Detection order: longest symbol first, declaration order on ties.
 * `US$` is therefore tested before `$`, and every ISO code before a
 * single-character symbol.
 */
export const CURRENCY_RATES: readonly CurrencyRate[] = Object.freeze(
  [...DECLARED_RATES].sort((a, b) => b.symbol.length - a.symbol.length)
);

// ═══════════════════════════════════════════════════════════════════════════
// BOXES
// ═══════════════════════════════════════════════════════════════════════════

export const SUMMARY_BOXES = ['A', 'B', 'C', 'D'] as const;

export type SummaryBox = typeof SUMMARY_BOXES[number];

export const BOX_DESCRIPTIONS: Readonly<Record<SummaryBox, string>> = {
  A: 'Standard Rated Supplies (5%)',
  B: 'Zero Rated Supplies (0%)',
  C: 'Recoverable Input VAT',
  D: 'Net VAT Payable (BoxA_VAT - BoxC_VAT)',
};

// ═══════════════════════════════════════════════════════════════════════════
// MONTHS
// ═══════════════════════════════════════════════════════════════════════════

export const UNKNOWN_MONTH = 'Unknown';

export const MONTH_LABELS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

export type MonthLabel = typeof MONTH_LABELS[number];

/**
 * Month-name tokens searched for in a normalized sheet name, in this order.
 * `sept` is an alias for September.
 */
export const MONTH_TOKENS: ReadonlyArray<{ token: string; label: MonthLabel; number: number }> = [
  { token: 'jan', label: 'Jan', number: 1 },
  { token: 'feb', label: 'Feb', number: 2 },
  { token: 'mar', label: 'Mar', number: 3 },
  { token: 'apr', label: 'Apr', number: 4 },
  { token: 'may', label: 'May', number: 5 },
  { token: 'june', label: 'Jun', number: 6 },
  { token: 'jun', label: 'Jun', number: 6 },
  { token: 'july', label: 'Jul', number: 7 },
  { token: 'jul', label: 'Jul', number: 7 },
  { token: 'aug', label: 'Aug', number: 8 },
  { token: 'sept', label: 'Sep', number: 9 },
  { token: 'sep', label: 'Sep', number: 9 },
  { token: 'oct', label: 'Oct', number: 10 },
  { token: 'nov', label: 'Nov', number: 11 },
  { token: 'dec', label: 'Dec', number: 12 },
];

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

export const SUMMARY_COLUMNS = [
  'Period',
  'FTA Box',
  'Description',
  'Net Value',
  'VAT Value',
  'Net VAT Payable',
] as const;

export const VAT_SUMMARY_SHEET_NAME = 'VAT_Summary';

export const VAT_SUMMARY_TABLE = 'vat_summary';

export const PERIOD_GROUPINGS = ['month-year', 'month'] as const;

export type PeriodGrouping = typeof PERIOD_GROUPINGS[number];
