import type { Decimal } from 'decimal.js';

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const countFormatter = new Intl.NumberFormat('en-US');

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** "$1,234.56"; negative amounts as "-$1,234.56". */
export const formatCurrency = (amount: Decimal): string =>
  currencyFormatter.format(amount.toDecimalPlaces(2).toNumber());

/** "1,234" */
export const formatCount = (count: number): string => countFormatter.format(count);

/** "+60.0%", "-12.5%" */
export const formatPercent = (percent: Decimal): string => {
  const fixed = percent.toFixed(1);
  return percent.isNegative() ? `${fixed}%` : `+${fixed}%`;
};

/**
 * "March 05, 2024 at 02:07 PM", in UTC.
 */
export const formatGeneratedAt = (at: Date): string => {
  const hours24 = at.getUTCHours();
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  const meridiem = hours24 < 12 ? 'AM' : 'PM';
  const month = MONTH_NAMES[at.getUTCMonth()] ?? '';

  return `${month} ${pad2(at.getUTCDate())}, ${String(at.getUTCFullYear())} at ${pad2(hours12)}:${pad2(at.getUTCMinutes())} ${meridiem}`;
};

/** "20240305_140709", in UTC. */
export const fileTimestamp = (at: Date): string =>
  `${String(at.getUTCFullYear())}${pad2(at.getUTCMonth() + 1)}${pad2(at.getUTCDate())}` +
  `_${pad2(at.getUTCHours())}${pad2(at.getUTCMinutes())}${pad2(at.getUTCSeconds())}`;

/** Keeps file names header-safe: anything outside [A-Za-z0-9_.-] becomes "_". */
const fileNamePart = (value: string): string => value.replace(/[^A-Za-z0-9_.-]/g, '_');

export const csvFileName = (user: string, at: Date): string =>
  `finance_data_${fileNamePart(user)}_${fileTimestamp(at)}.csv`;

export const reportFileName = (user: string, at: Date): string =>
  `complete_dashboard_${fileNamePart(user)}_${fileTimestamp(at)}.html`;

const compactFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  notation: 'compact',
  minimumFractionDigits: 0,
  maximumFractionDigits: 1,
});

/** Axis labels: "$1.5K", "$2M". */
export const formatCompactCurrency = (value: number): string => compactFormatter.format(value);
