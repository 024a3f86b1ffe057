import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import type { MetricsPort } from '@/modules/order-status/application/ports/metrics.port';
import type {
  OrderFetcherPort,
  OrderLookupInput,
  OrderLookupPort,
} from '@/modules/order-status/application/ports/order-lookup.port';
import {
  METRICS_PORT,
  ORDER_FETCHER_PORT,
} from '@/modules/order-status/application/ports/tokens';
import {
  ExternalServiceError,
  MalformedOrderPayloadError,
} from '@/modules/order-status/domain/errors';
import type { OrderRecord } from '@/modules/order-status/domain/order';
import { executeWithRetry, type RetryPolicy } from '../shared';

/**
 * Wraps an `OrderFetcherPort` with bounded retry and exponential backoff and
 * collapses every upstream failure into null:
 * - 404 / no match: null after one attempt
 * - ExternalServiceError: retried, null once attempts run out
 * - MalformedOrderPayloadError: null, not retried
 * - request deadline passed: null, no further attempts
 * Anything else is an internal fault and propagates.
 */
@Injectable()
export class RetryingOrderLookupClient implements OrderLookupPort {
  private readonly logger = createLogger(RetryingOrderLookupClient.name);
  private readonly policy: RetryPolicy;

  constructor(
    @Inject(ORDER_FETCHER_PORT)
    private readonly fetcher: OrderFetcherPort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
    private readonly configService: ConfigService,
  ) {
    this.policy = {
      maxAttempts: Math.max(1, this.configService.get<number>('ORDER_LOOKUP_MAX_RETRIES') ?? 3),
      backoffUnitMs: Math.max(
        0,
        this.configService.get<number>('ORDER_LOOKUP_BACKOFF_UNIT_MS') ?? 1000,
      ),
    };
  }

  async lookupOrder(input: OrderLookupInput): Promise<OrderRecord | null> {
    try {
      const outcome = await executeWithRetry(
        async () => {
          try {
            const order = await this.fetcher.fetchOrder(input);
            this.metrics.incrementUpstreamAttempt(order ? 'success' : 'not_found');
            return order;
          } catch (error: unknown) {
            if (error instanceof ExternalServiceError) {
              this.metrics.incrementUpstreamAttempt('transient');
            }
            throw error;
          }
        },
        {
          policy: this.policy,
          isRetryable: (error) => error instanceof ExternalServiceError,
          signal: input.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn('order_lookup_retry', {
              event: 'order_lookup_retry',
              request_id: input.requestId,
              retry_count: attempt,
              backoff_ms: delayMs,
              ...describeExternalError(error),
            });
          },
        },
      );

      if (outcome.ok) {
        return outcome.value;
      }

      this.logger.warn('order_lookup_gave_up', {
        event: 'order_lookup_gave_up',
        request_id: input.requestId,
        reason: outcome.reason,
        attempts: outcome.attempts,
        ...describeExternalError(outcome.lastError),
      });
      return null;
    } catch (error: unknown) {
      if (error instanceof MalformedOrderPayloadError) {
        this.metrics.incrementUpstreamAttempt('malformed');
        this.logger.warn('order_lookup_malformed_payload', {
          event: 'order_lookup_malformed_payload',
          request_id: input.requestId,
          order_code: input.orderCode,
          reason: error.reason,
        });
        return null;
      }

      throw error;
    }
  }
}

function describeExternalError(error: unknown): Record<string, unknown> {
  if (!(error instanceof ExternalServiceError)) {
    return {};
  }

  return {
    error_code: error.errorCode,
    status_code: error.statusCode,
  };
}
