/**
 * Ports for reading orders from the upstream order API.
 *
 * `OrderFetcherPort` is one upstream attempt: it resolves to null for a
 * definitive "not found" and throws on transient or malformed responses.
 * `OrderLookupPort` is the caller-facing contract: it never throws for
 * upstream failures, every failure resolves to null.
 */

import type { OrderRecord } from '../../domain/order';

export interface OrderLookupInput {
  requestId: string;
  orderCode: string;
  requesterId: string;
  /** Aborted when the inbound request's deadline passes. */
  signal?: AbortSignal;
}

export interface OrderFetcherPort {
  fetchOrder(input: OrderLookupInput): Promise<OrderRecord | null>;
}

export interface OrderLookupPort {
  lookupOrder(input: OrderLookupInput): Promise<OrderRecord | null>;
}
