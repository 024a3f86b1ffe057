import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '@/common/utils/logger';
import { buildOrderCacheKey } from '../../../domain/cache-key';
import { normalizeOrderCode } from '../../../domain/order-code';
import type { OrderRecord } from '../../../domain/order';
import type { MetricsPort } from '../../ports/metrics.port';
import type { OrderCachePort } from '../../ports/order-cache.port';
import type { OrderLookupPort } from '../../ports/order-lookup.port';
import { METRICS_PORT, ORDER_CACHE_PORT, ORDER_LOOKUP_PORT } from '../../ports/tokens';

export interface ResolveOrderInput {
  requestId: string;
  orderCode: string;
  requesterId: string;
  signal?: AbortSignal;
}

/**
 * Cache-first order resolution with write-through on success.
 * Absent results are not cached, and concurrent misses for the same key
 * each reach the lookup client.
 */
@Injectable()
export class ResolveOrderUseCase {
  private readonly logger = createLogger(ResolveOrderUseCase.name);

  constructor(
    @Inject(ORDER_CACHE_PORT)
    private readonly cache: OrderCachePort,
    @Inject(ORDER_LOOKUP_PORT)
    private readonly orderLookup: OrderLookupPort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
  ) {}

  async resolve(input: ResolveOrderInput): Promise<OrderRecord | null> {
    const orderCode = normalizeOrderCode(input.orderCode);
    const cacheKey = buildOrderCacheKey({ requesterId: input.requesterId, orderCode });

    try {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.metrics.incrementOrderResolution('cache_hit');
        this.logger.cache('order_cache_hit', {
          event: 'order_cache_hit',
          request_id: input.requestId,
          order_code: orderCode,
        });
        return cached;
      }

      const order = await this.orderLookup.lookupOrder({
        requestId: input.requestId,
        orderCode,
        requesterId: input.requesterId,
        signal: input.signal,
      });

      if (!order) {
        this.metrics.incrementOrderResolution('not_found');
        return null;
      }

      this.cache.set(cacheKey, order);
      this.metrics.incrementOrderResolution('found');
      return order;
    } catch (error: unknown) {
      this.logger.error(
        'order_resolution_failed',
        error instanceof Error ? error : undefined,
        {
          event: 'order_resolution_failed',
          request_id: input.requestId,
          order_code: orderCode,
          requester_id: input.requesterId,
        },
      );
      throw error;
    }
  }
}
