// core/helpers.ts
// Number, currency and date formatting helpers for templates

import type Handlebars from 'handlebars';

export type Formatter = (value: unknown) => string;

/**
 * Coerce a template value to a number; non-numeric values give NaN
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value.trim());
  }
  return NaN;
}

/**
 * Number formatter - locale grouping, at most two decimals
 */
export function createNumberFormatter(locale: string): Formatter {
  const fmt = new Intl.NumberFormat(locale, { maximumFractionDigits: 2 });
  return (value) => {
    const num = toNumber(value);
    if (isNaN(num)) return value === undefined || value === null ? '' : String(value);
    return fmt.format(num);
  };
}

/**
 * Currency formatter - ISO currency code when given, plain two decimals otherwise
 */
export function createCurrencyFormatter(locale: string, currency?: string): Formatter {
  const fmt = currency
    ? new Intl.NumberFormat(locale, { style: 'currency', currency })
    : new Intl.NumberFormat(locale, { minimumFractionDigits: 2, maximumFractionDigits: 2 });
  return (value) => {
    const num = toNumber(value);
    if (isNaN(num)) return value === undefined || value === null ? '' : String(value);
    return fmt.format(num);
  };
}

/**
 * Date formatter - ISO date (YYYY-MM-DD) read as a local calendar date
 */
export function createDateFormatter(locale: string): Formatter {
  const fmt = new Intl.DateTimeFormat(locale, { year: 'numeric', month: '2-digit', day: '2-digit' });
  return (value) => {
    if (value === undefined || value === null || value === '') return '';
    const text = String(value);

    const match = text.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (match) {
      const [, year, month, day] = match;
      return fmt.format(new Date(Number(year), Number(month) - 1, Number(day)));
    }

    const date = new Date(text);
    if (isNaN(date.getTime())) {
      return text;
    }
    return fmt.format(date);
  };
}

/**
 * Sum a field over a list of records, or the product of two fields per record
 */
export function sumField(list: unknown, field: string, otherField?: string): number {
  if (!Array.isArray(list)) return 0;
  let total = 0;
  for (const item of list) {
    if (typeof item !== 'object' || item === null) continue;
    const entry = new Map(Object.entries(item));
    const value = toNumber(entry.get(field));
    const factor = otherField ? toNumber(entry.get(otherField)) : 1;
    if (!isNaN(value) && !isNaN(factor)) {
      total += value * factor;
    }
  }
  return total;
}

/**
 * Register the helpers on a Handlebars environment.
 * Handlebars passes its options object as the last argument.
 */
export function registerHelpers(hbs: typeof Handlebars, locale: string): void {
  const formatNumber = createNumberFormatter(locale);
  const formatDate = createDateFormatter(locale);
  const currencyFormatters = new Map<string, Formatter>();

  hbs.registerHelper('formatNumber', (value: unknown) => formatNumber(value));
  hbs.registerHelper('formatDate', (value: unknown) => formatDate(value));
  hbs.registerHelper('formatCurrency', (value: unknown, currency: unknown) => {
    const code = typeof currency === 'string' ? currency : '';
    let formatter = currencyFormatters.get(code);
    if (!formatter) {
      formatter = createCurrencyFormatter(locale, code || undefined);
      currencyFormatters.set(code, formatter);
    }
    return formatter(value);
  });
  hbs.registerHelper('multiply', (a: unknown, b: unknown) => {
    const product = toNumber(a) * toNumber(b);
    return isNaN(product) ? 0 : product;
  });
  hbs.registerHelper('sum', (list: unknown, field: unknown, otherField: unknown) => {
    if (typeof field !== 'string') return 0;
    return sumField(list, field, typeof otherField === 'string' ? otherField : undefined);
  });
  hbs.registerHelper('eq', (a: unknown, b: unknown) => a === b);
  hbs.registerHelper('json', (value: unknown) => JSON.stringify(value));
}
