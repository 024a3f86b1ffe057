import { BadRequestException, Controller, Get, NotFoundException, Param, Req } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import {
  INVALID_ORDER_CODE_MESSAGE,
  buildOrderNotFoundMessage,
} from '@/common/constants/error-messages.constants';
import { ResolveOrderUseCase } from '../application/use-cases/resolve-order';
import { PROFANITY_WARNING_REPLY } from '../application/use-cases/handle-incoming-message/responses';
import type { OrderRecord } from '../domain/order';
import { isOrderCode, normalizeOrderCode } from '../domain/order-code';
import { containsProfanity } from '../domain/profanity';
import { OrderLookupParamsDto } from '../dto/order-lookup-params.dto';

@Controller('api/v1/orders')
export class OrdersController {
  constructor(private readonly resolveOrder: ResolveOrderUseCase) {}

  @Get(':requesterId/:orderCode')
  async findOne(
    @Param() params: OrderLookupParamsDto,
    @Req() request: Request,
  ): Promise<OrderRecord> {
    if (containsProfanity(params.requesterId) || containsProfanity(params.orderCode)) {
      throw new BadRequestException(PROFANITY_WARNING_REPLY);
    }

    const orderCode = normalizeOrderCode(params.orderCode);
    if (!isOrderCode(orderCode)) {
      throw new BadRequestException(INVALID_ORDER_CODE_MESSAGE);
    }

    const order = await this.resolveOrder.resolve({
      requestId: request.requestId ?? randomUUID(),
      orderCode,
      requesterId: params.requesterId,
      signal: request.deadline,
    });

    if (!order) {
      throw new NotFoundException(buildOrderNotFoundMessage(orderCode));
    }

    return order;
  }
}
