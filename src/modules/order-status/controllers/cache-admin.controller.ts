import { Controller, HttpCode, Inject, Post, Req, UseGuards } from '@nestjs/common';
import type { Request } from 'express';
import { createLogger } from '@/common/utils/logger';
import type { OrderCachePort } from '../application/ports/order-cache.port';
import { ORDER_CACHE_PORT } from '../application/ports/tokens';
import { AdminBasicAuthGuard } from '../infrastructure/security';

@Controller('cache')
export class CacheAdminController {
  private readonly logger = createLogger(CacheAdminController.name);

  constructor(
    @Inject(ORDER_CACHE_PORT)
    private readonly cache: OrderCachePort,
  ) {}

  @Post('clear')
  @HttpCode(200)
  @UseGuards(AdminBasicAuthGuard)
  clear(@Req() request: Request): { ok: true; cleared: number } {
    const cleared = this.cache.clear();

    this.logger.cache('order_cache_cleared', {
      event: 'order_cache_cleared',
      request_id: request.requestId,
      cleared,
    });

    return { ok: true, cleared };
  }
}
