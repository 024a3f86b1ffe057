import { removeWhitespace } from '@/common/utils/string.utils';

/** Three letters, optional `-`/`_` separator, three digits (after normalization). */
export const ORDER_CODE_PATTERN = /^[A-Z]{3}[-_]?\d{3}$/;

/**
 * Finds an order-code-shaped token inside free text. Whitespace between the
 * letters, the separator and the digits is tolerated ("ped - 123").
 */
const ORDER_CODE_IN_TEXT_PATTERN = /(?<![\p{L}\p{N}])[A-Za-z]{3}\s*[-_]?\s*\d{3}(?![\p{L}\p{N}])/u;

/**
 * Canonical order code form shared by the classifier, the cache key and the
 * upstream match: trimmed, internal whitespace removed, uppercase.
 */
export function normalizeOrderCode(rawCode: string): string {
  return removeWhitespace(rawCode).toUpperCase();
}

export function isOrderCode(rawCode: string): boolean {
  return ORDER_CODE_PATTERN.test(normalizeOrderCode(rawCode));
}

/**
 * Returns the first order code found in `text`, normalized, or undefined.
 */
export function findOrderCode(text: string): string | undefined {
  const match = text.match(ORDER_CODE_IN_TEXT_PATTERN);
  return match ? normalizeOrderCode(match[0]) : undefined;
}
