import type { OrderRecord } from '../../domain/order';

/**
 * Process-local order cache keyed by `buildOrderCacheKey`.
 * Every operation is synchronous.
 */
export interface OrderCachePort {
  get(key: string): OrderRecord | undefined;
  set(key: string, value: OrderRecord): void;
  /** Removes every expired entry and returns how many were removed. */
  sweepExpired(): number;
  size(): number;
  /** Drops every entry and returns how many were dropped. */
  clear(): number;
}
