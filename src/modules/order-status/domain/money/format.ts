import type { Money } from './types';

/**
 * Formats a Money value as "amount currency" (e.g. "100 USD").
 */
export function formatMoney(money: Money): string {
  return `${money.amount} ${money.currency}`.trim();
}
