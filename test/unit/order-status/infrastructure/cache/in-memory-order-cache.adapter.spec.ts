import type { ConfigService } from '@nestjs/config';
import type { OrderRecord } from '@/modules/order-status/domain/order';
import { InMemoryOrderCacheAdapter } from '@/modules/order-status/infrastructure/cache';

describe('InMemoryOrderCacheAdapter', () => {
  const order: OrderRecord = { code: 'PED-123', status: 'pending', product: 'Widget' };

  afterEach(() => {
    jest.useRealTimers();
  });

  it('expires entries after ORDER_CACHE_TTL_SECONDS', () => {
    jest.useFakeTimers({ now: new Date('2026-01-10T12:00:00Z') });
    const cache = buildAdapter({ ORDER_CACHE_TTL_SECONDS: 60 });

    cache.set('15551234567:PED-123', order);
    jest.setSystemTime(new Date('2026-01-10T12:00:59Z'));
    expect(cache.get('15551234567:PED-123')).toEqual(order);

    jest.setSystemTime(new Date('2026-01-10T12:01:00Z'));
    expect(cache.get('15551234567:PED-123')).toBeUndefined();
  });

  it('clears every entry on module destroy', () => {
    const cache = buildAdapter({});

    cache.set('a:PED-123', order);
    cache.set('b:PED-123', order);
    cache.onModuleDestroy();

    expect(cache.size()).toBe(0);
  });
});

function buildAdapter(values: Record<string, unknown>): InMemoryOrderCacheAdapter {
  const configService: Pick<ConfigService, 'get'> = {
    get: (key: string) => values[key] as never,
  };

  return new InMemoryOrderCacheAdapter(configService as ConfigService);
}
