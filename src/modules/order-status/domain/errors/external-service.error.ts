export type ExternalServiceName = 'orders_api' | 'whatsapp';

/**
 * Thrown when an external service call fails in a way worth retrying:
 * network failure, timeout, or an HTTP error other than 404.
 */
export class ExternalServiceError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: 'network' | 'timeout' | 'http',
    public readonly service: ExternalServiceName,
    public readonly responseBody?: unknown,
  ) {
    super(message);
    this.name = 'ExternalServiceError';
  }
}
