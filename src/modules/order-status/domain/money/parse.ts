import { isRecord } from '@/common/utils/object.utils';
import type { Money } from './types';

/**
 * Parses an upstream total into Money.
 * Accepts a number, a numeric string ("1.250,50", "100 USD") or an
 * `{ amount, currency }` object. Bare amounts are tagged with `defaultCurrency`.
 * Returns undefined when no amount can be read.
 */
export function parseMoney(value: unknown, defaultCurrency: string): Money | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { amount: value, currency: defaultCurrency } : undefined;
  }

  if (typeof value === 'string') {
    const amount = parseLocalizedAmount(value);
    if (amount === null) {
      return undefined;
    }

    return { amount, currency: extractCurrencyTag(value) ?? defaultCurrency };
  }

  if (!isRecord(value)) {
    return undefined;
  }

  const currency =
    typeof value.currency === 'string' && value.currency.trim().length > 0
      ? value.currency.trim().toUpperCase()
      : defaultCurrency;

  let amount: number | null = null;
  if (typeof value.amount === 'number' && Number.isFinite(value.amount)) {
    amount = value.amount;
  } else if (typeof value.amount === 'string') {
    amount = parseLocalizedAmount(value.amount);
  }

  return amount === null ? undefined : { amount, currency };
}

function extractCurrencyTag(rawAmount: string): string | undefined {
  return rawAmount.match(/\b([A-Za-z]{3})\b/)?.[1]?.toUpperCase();
}

function parseLocalizedAmount(rawAmount: string): number | null {
  const numericToken = rawAmount.trim().match(/-?\d[\d.,]*/)?.[0];
  if (!numericToken) {
    return null;
  }

  const parsed = Number(normalizeNumberToken(numericToken));
  return Number.isFinite(parsed) ? parsed : null;
}

function normalizeNumberToken(token: string): string {
  const lastComma = token.lastIndexOf(',');
  const lastDot = token.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    return lastComma > lastDot
      ? token.replace(/\./g, '').replace(',', '.')
      : token.replace(/,/g, '');
  }

  if (lastComma >= 0) {
    return normalizeSingleSeparator(token, ',');
  }

  if (lastDot >= 0) {
    return normalizeSingleSeparator(token, '.');
  }

  return token;
}

/**
 * A lone separator followed by exactly three digits is a thousands separator
 * ("1.250" -> 1250); otherwise it is the decimal mark ("99,5" -> 99.5).
 */
function normalizeSingleSeparator(token: string, separator: ',' | '.'): string {
  const parts = token.split(separator);
  const isThousands = parts.length > 2 || parts[parts.length - 1].length === 3;

  return isThousands ? parts.join('') : parts.join('.');
}
