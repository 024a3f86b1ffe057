import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import type {
  OrderFetcherPort,
  OrderLookupInput,
} from '@/modules/order-status/application/ports/order-lookup.port';
import { ExternalServiceError } from '@/modules/order-status/domain/errors';
import type { OrderRecord } from '@/modules/order-status/domain/order';
import { fetchWithTimeout, parseJson } from '../shared';
import { parseOrderPayload } from './order-payload-parser';

const USER_AGENT = 'order-status-assistant/1.0';

/**
 * One attempt against the order API. No retries here; see
 * `RetryingOrderLookupClient`.
 */
@Injectable()
export class OrdersHttpClient implements OrderFetcherPort {
  private readonly logger = createLogger(OrdersHttpClient.name);
  private readonly apiUrl: string;
  private readonly apiToken?: string;
  private readonly currency: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.apiUrl = this.configService.get<string>('ORDERS_API_URL') ?? '';
    this.apiToken = this.configService.get<string>('ORDERS_API_TOKEN');
    this.currency = this.configService.get<string>('ORDERS_API_CURRENCY') ?? 'USD';
    this.timeoutMs = this.configService.get<number>('REQUEST_TIMEOUT_MS') ?? 10_000;
  }

  /**
   * @returns the order, or null when the API answers 404 or the body holds no
   *   matching order
   * @throws ExternalServiceError on network failure, timeout or a non-404 error status
   * @throws MalformedOrderPayloadError when the matching order cannot be fully read
   */
  async fetchOrder(input: OrderLookupInput): Promise<OrderRecord | null> {
    const startedAt = Date.now();
    let response: Response;

    try {
      response = await fetchWithTimeout(
        this.apiUrl,
        {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            'User-Agent': USER_AGENT,
            'X-Request-ID': input.requestId,
            ...(this.apiToken ? { Authorization: `Bearer ${this.apiToken}` } : {}),
          },
        },
        this.timeoutMs,
        input.signal,
      );
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ExternalServiceError('Order API timeout', 0, 'timeout', 'orders_api');
      }

      throw new ExternalServiceError('Order API network error', 0, 'network', 'orders_api');
    }

    this.logger.upstream('order_api_response', {
      event: 'order_api_response',
      request_id: input.requestId,
      status: response.status,
      duration: Date.now() - startedAt,
    });

    if (response.status === 404) {
      await response.body?.cancel();
      return null;
    }

    let body: unknown;
    try {
      body = await parseJson(response);
    } catch {
      throw new ExternalServiceError('Order API body read failed', response.status, 'network', 'orders_api');
    }

    if (!response.ok) {
      throw new ExternalServiceError(
        `Order API error ${response.status}`,
        response.status,
        'http',
        'orders_api',
        body,
      );
    }

    return parseOrderPayload(body, {
      orderCode: input.orderCode,
      requesterId: input.requesterId,
      defaultCurrency: this.currency,
    });
  }
}
