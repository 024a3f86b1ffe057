import { removeWhitespace } from '@/common/utils/string.utils';
import { normalizeOrderCode } from '../order-code';

export function normalizeRequesterId(requesterId: string | undefined): string {
  return requesterId ? removeWhitespace(requesterId).toLowerCase() : '';
}

/**
 * Cache slot for an order as seen by one requester: `<requesterId>:<orderCode>`.
 * Used for both reads and writes so equivalent inputs share a slot.
 */
export function buildOrderCacheKey(input: { requesterId?: string; orderCode: string }): string {
  return `${normalizeRequesterId(input.requesterId)}:${normalizeOrderCode(input.orderCode)}`;
}
