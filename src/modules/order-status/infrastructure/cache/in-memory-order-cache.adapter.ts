import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import type { OrderCachePort } from '@/modules/order-status/application/ports/order-cache.port';
import type { OrderRecord } from '@/modules/order-status/domain/order';
import { TtlCache } from './ttl-cache';

@Injectable()
export class InMemoryOrderCacheAdapter implements OrderCachePort, OnModuleDestroy {
  private readonly logger = createLogger(InMemoryOrderCacheAdapter.name);
  private readonly cache: TtlCache<OrderRecord>;

  constructor(private readonly configService: ConfigService) {
    const ttlSeconds = this.configService.get<number>('ORDER_CACHE_TTL_SECONDS') ?? 300;
    const sweepThreshold =
      this.configService.get<number>('ORDER_CACHE_SWEEP_THRESHOLD') ?? 1000;

    this.cache = new TtlCache<OrderRecord>({
      ttlMs: ttlSeconds * 1000,
      sweepThreshold,
    });
  }

  get(key: string): OrderRecord | undefined {
    return this.cache.get(key);
  }

  set(key: string, value: OrderRecord): void {
    const swept = this.cache.set(key, value);
    if (swept > 0) {
      this.logger.cache('order_cache_swept', {
        event: 'order_cache_swept',
        removed: swept,
        size: this.cache.size(),
      });
    }
  }

  sweepExpired(): number {
    return this.cache.sweepExpired();
  }

  size(): number {
    return this.cache.size();
  }

  clear(): number {
    return this.cache.clear();
  }

  onModuleDestroy(): void {
    this.cache.clear();
  }
}
