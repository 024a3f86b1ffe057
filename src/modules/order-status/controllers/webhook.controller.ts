import {
  BadRequestException,
  Body,
  Controller,
  ForbiddenException,
  Get,
  Header,
  HttpCode,
  Post,
  Query,
  Req,
  UnprocessableEntityException,
  UseGuards,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import {
  EMPTY_MESSAGE_MESSAGE,
  INVALID_CREDENTIALS_MESSAGE,
  INVALID_MESSAGE_STRUCTURE_MESSAGE,
} from '@/common/constants/error-messages.constants';
import { createLogger } from '@/common/utils/logger';
import { resolveOptionalString } from '@/common/utils/string.utils';
import { HandleIncomingMessageUseCase } from '../application/use-cases/handle-incoming-message';
import { extractInboundMessage } from '../domain/inbound-message';
import { WebhookRequestDto } from '../dto/webhook-request.dto';
import type { WebhookResponse } from '../dto/webhook-response.dto';
import { WhatsappSignatureGuard } from '../infrastructure/security';

@Controller('webhook')
export class WebhookController {
  private readonly logger = createLogger(WebhookController.name);

  constructor(
    private readonly handleIncomingMessage: HandleIncomingMessageUseCase,
    private readonly configService: ConfigService,
  ) {}

  @Post()
  @HttpCode(200)
  @UseGuards(WhatsappSignatureGuard)
  async receive(@Body() body: WebhookRequestDto, @Req() request: Request): Promise<WebhookResponse> {
    const requestId = request.requestId ?? randomUUID();
    const extraction = extractInboundMessage(body);

    if (extraction.kind === 'no_message') {
      this.logger.webhook('webhook_ignored', {
        event: 'webhook_ignored',
        request_id: requestId,
      });
      return { ok: true, ignored: true };
    }

    if (extraction.kind === 'invalid') {
      this.logger.warn('webhook_invalid_message', {
        event: 'webhook_invalid_message',
        request_id: requestId,
        reason: extraction.reason,
      });

      if (extraction.reason === 'empty_text') {
        throw new UnprocessableEntityException(EMPTY_MESSAGE_MESSAGE);
      }
      throw new BadRequestException(INVALID_MESSAGE_STRUCTURE_MESSAGE);
    }

    const result = await this.handleIncomingMessage.execute({
      requestId,
      senderId: extraction.message.senderId,
      text: extraction.message.text,
      signal: request.deadline,
    });

    return { ok: true, intent: result.intent, delivered: result.delivered };
  }

  /** Meta subscription handshake: echoes `hub.challenge` when the token matches. */
  @Get()
  @Header('Content-Type', 'text/plain; charset=utf-8')
  verify(
    @Query('hub.mode') mode: unknown,
    @Query('hub.verify_token') token: unknown,
    @Query('hub.challenge') challenge: unknown,
  ): string {
    const expectedToken = this.configService.get<string>('WHATSAPP_VERIFY_TOKEN');
    const providedToken = resolveOptionalString(token);
    const providedChallenge = resolveOptionalString(challenge);

    if (
      !expectedToken ||
      mode !== 'subscribe' ||
      providedToken !== expectedToken ||
      providedChallenge === undefined
    ) {
      this.logger.security('webhook_verification_rejected', {
        event: 'webhook_verification_rejected',
        mode: typeof mode === 'string' ? mode : null,
      });
      throw new ForbiddenException(INVALID_CREDENTIALS_MESSAGE);
    }

    return providedChallenge;
  }
}
