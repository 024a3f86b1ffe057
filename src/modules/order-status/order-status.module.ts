import { Module } from '@nestjs/common';
import {
  MESSAGE_SENDER_PORT,
  METRICS_PORT,
  ORDER_CACHE_PORT,
  ORDER_FETCHER_PORT,
  ORDER_LOOKUP_PORT,
} from './application/ports/tokens';
import { HandleIncomingMessageUseCase } from './application/use-cases/handle-incoming-message';
import { ResolveOrderUseCase } from './application/use-cases/resolve-order';
import { CacheAdminController } from './controllers/cache-admin.controller';
import { MetricsController } from './controllers/metrics.controller';
import { OrdersController } from './controllers/orders.controller';
import { WebhookController } from './controllers/webhook.controller';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import {
  OrdersHttpClient,
  RetryingOrderLookupClient,
} from './infrastructure/adapters/orders-http';
import { WhatsappCloudSenderAdapter } from './infrastructure/adapters/whatsapp';
import { InMemoryOrderCacheAdapter } from './infrastructure/cache';
import { AdminBasicAuthGuard, WhatsappSignatureGuard } from './infrastructure/security';

@Module({
  controllers: [WebhookController, OrdersController, CacheAdminController, MetricsController],
  providers: [
    WhatsappSignatureGuard,
    AdminBasicAuthGuard,
    HandleIncomingMessageUseCase,
    ResolveOrderUseCase,
    InMemoryOrderCacheAdapter,
    OrdersHttpClient,
    RetryingOrderLookupClient,
    WhatsappCloudSenderAdapter,
    PrometheusMetricsAdapter,
    {
      provide: ORDER_CACHE_PORT,
      useExisting: InMemoryOrderCacheAdapter,
    },
    {
      provide: ORDER_FETCHER_PORT,
      useExisting: OrdersHttpClient,
    },
    {
      provide: ORDER_LOOKUP_PORT,
      useExisting: RetryingOrderLookupClient,
    },
    {
      provide: MESSAGE_SENDER_PORT,
      useExisting: WhatsappCloudSenderAdapter,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
  ],
  exports: [ORDER_CACHE_PORT],
})
export class OrderStatusModule {}
