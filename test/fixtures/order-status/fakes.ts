import type { ConfigService } from '@nestjs/config';
import type { MetricsPort } from '@/modules/order-status/application/ports/metrics.port';
import type { OrderRecord } from '@/modules/order-status/domain/order';

export function buildConfigService(values: Record<string, unknown>): ConfigService {
  const configService: Pick<ConfigService, 'get'> = {
    get: (key: string) => values[key] as never,
  };

  return configService as ConfigService;
}

export function buildMetrics(): jest.Mocked<MetricsPort> {
  return {
    incrementMessage: jest.fn(),
    observeResponseLatency: jest.fn(),
    incrementOrderResolution: jest.fn(),
    incrementUpstreamAttempt: jest.fn(),
    incrementOutboundMessage: jest.fn(),
  };
}

export function buildOrder(overrides: Partial<OrderRecord> = {}): OrderRecord {
  return {
    code: 'PED-123',
    status: 'pending',
    product: 'Widget',
    totalAmount: { amount: 100, currency: 'USD' },
    ...overrides,
  };
}
