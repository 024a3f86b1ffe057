import { Controller, Get, Inject, Req } from '@nestjs/common';
import type { Request } from 'express';
import { createLogger } from '@/common/utils/logger';
import type { OrderCachePort } from '../order-status/application/ports/order-cache.port';
import { ORDER_CACHE_PORT } from '../order-status/application/ports/tokens';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  cacheSize: number;
}

@Controller('health')
export class HealthController {
  private readonly logger = createLogger(HealthController.name);

  constructor(
    @Inject(ORDER_CACHE_PORT)
    private readonly cache: OrderCachePort,
  ) {}

  @Get()
  check(@Req() req: Request): HealthResponse {
    this.logger.http('health_check_request', {
      event: 'health_check_request',
      request_id: req.requestId,
    });

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      cacheSize: this.cache.size(),
    };
  }
}
