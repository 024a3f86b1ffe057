import type { Money } from '../money';

/**
 * Order as reported by the upstream order API. Only ever built from a fully
 * parsed upstream response.
 */
export interface OrderRecord {
  code: string;
  status: string;
  updatedAt?: string;
  /** Line-item names joined with ", " in upstream order. */
  product: string;
  customer?: string;
  totalAmount?: Money;
}
