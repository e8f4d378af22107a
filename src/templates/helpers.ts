import { v4 as uuidv4 } from 'uuid';
import type { MergeOptions } from '../types';

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

export function yesno(value: unknown, yes = 'Yes', no = 'No'): string {
  return value ? yes : no;
}

export function joinNonEmpty(values: unknown, sep = ', '): string {
  if (!Array.isArray(values)) {
    return isBlank(values) ? '' : String(values);
  }
  return values.filter((v) => !isBlank(v)).map(String).join(sep);
}

/**
 * formatCurrency(1234.5) -> "$1,234.50"
 *
 * Values that are not numbers are returned as text.
 */
export function formatCurrency(value: unknown, symbol = '$', decimals = 2, thousands = ','): string {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (!Number.isFinite(n)) {
    return isBlank(value) ? '' : String(value);
  }

  const [integer, fraction] = n.toFixed(decimals).split('.');
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, thousands);
  return `${symbol}${fraction === undefined ? grouped : `${grouped}.${fraction}`}`;
}

export function pluralize(count: unknown, singular: string, plural?: string): string {
  const many = plural ?? `${singular}s`;
  const n = Number(count);
  if (isBlank(count) || !Number.isFinite(n)) {
    return many;
  }
  return Math.trunc(n) === 1 ? singular : many;
}

/**
 * Parse a JSON string carried in the merge data; other values pass through.
 * Malformed JSON throws, which fails the merge.
 */
export function loadJson(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'number') {
    // Unix seconds
    return new Date(value * 1000);
  }
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : new Date(parsed);
  }
  return null;
}

/**
 * Helpers exposed to templates, bound to the job's locale and timezone
 *
 * Usage inside a template: `{{ formatDate(invoice.issuedAt) }}`,
 * `{{ formatCurrency(total, '€') }}`, `{{ pluralize(items.length, 'item') }}`,
 * `{{ loadJson(order.linesJson).length }}`.
 *
 * `formatDate` takes a Date, an ISO 8601 string, or a number of Unix
 * seconds (not milliseconds).
 */
export function createMergeHelpers(options: MergeOptions) {
  const formatDate = (value: unknown, format: Intl.DateTimeFormatOptions = { dateStyle: 'medium' }): string => {
    if (isBlank(value)) {
      return '';
    }
    const date = toDate(value);
    if (!date || Number.isNaN(date.getTime())) {
      return String(value);
    }
    return new Intl.DateTimeFormat(options.locale, { timeZone: options.timezone, ...format }).format(date);
  };

  return {
    yesno,
    joinNonEmpty,
    loadJson,
    formatCurrency,
    pluralize,
    formatDate,
    now: (format: Intl.DateTimeFormatOptions = { dateStyle: 'medium', timeStyle: 'short' }) => formatDate(new Date(), format),
    today: () => formatDate(new Date()),
    uuid: () => uuidv4(),
  };
}

export type MergeHelpers = ReturnType<typeof createMergeHelpers>;
