import { Inject, Injectable, UnprocessableEntityException } from '@nestjs/common';
import { EMPTY_MESSAGE_MESSAGE } from '@/common/constants/error-messages.constants';
import { createLogger } from '@/common/utils/logger';
import { classifyIntent, type Intent, type IntentName } from '../../../domain/intent';
import { sanitizeText } from '../../../domain/text-sanitizer';
import type { MessageSenderPort } from '../../ports/message-sender.port';
import type { MetricsPort } from '../../ports/metrics.port';
import { MESSAGE_SENDER_PORT, METRICS_PORT } from '../../ports/tokens';
import { ResolveOrderUseCase } from '../resolve-order';
import {
  GREETING_REPLY,
  HELP_REPLY,
  PROFANITY_WARNING_REPLY,
  UNKNOWN_REPLY,
  buildOrderFoundReply,
  buildOrderNotFoundReply,
} from './responses';

export interface HandleIncomingMessageInput {
  requestId: string;
  senderId: string;
  text: string;
  signal?: AbortSignal;
}

export interface HandleIncomingMessageResult {
  intent: IntentName;
  reply: string;
  delivered: boolean;
}

@Injectable()
export class HandleIncomingMessageUseCase {
  private readonly logger = createLogger(HandleIncomingMessageUseCase.name);

  constructor(
    private readonly resolveOrder: ResolveOrderUseCase,
    @Inject(MESSAGE_SENDER_PORT)
    private readonly messageSender: MessageSenderPort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
  ) {}

  async execute(input: HandleIncomingMessageInput): Promise<HandleIncomingMessageResult> {
    const startedAt = Date.now();
    const text = sanitizeText(input.text);

    if (text.length === 0) {
      throw new UnprocessableEntityException(EMPTY_MESSAGE_MESSAGE);
    }

    const intent = classifyIntent(text);

    this.logger.webhook('inbound_message', {
      event: 'inbound_message',
      request_id: input.requestId,
      sender_id: input.senderId,
      intent: intent.name,
    });

    const reply = await this.buildReply(intent, input);
    const delivered = await this.messageSender.send({
      to: input.senderId,
      text: reply,
      requestId: input.requestId,
    });

    this.metrics.incrementMessage({ intent: intent.name });
    this.metrics.incrementOutboundMessage(delivered);
    this.metrics.observeResponseLatency({
      intent: intent.name,
      seconds: (Date.now() - startedAt) / 1000,
    });
    this.logger.performance('handle_incoming_message', startedAt, {
      request_id: input.requestId,
      intent: intent.name,
      delivered,
    });

    return { intent: intent.name, reply, delivered };
  }

  private async buildReply(intent: Intent, input: HandleIncomingMessageInput): Promise<string> {
    switch (intent.name) {
      case 'profanity':
        return PROFANITY_WARNING_REPLY;
      case 'help':
        return HELP_REPLY;
      case 'greeting':
        return GREETING_REPLY;
      case 'unknown':
        return UNKNOWN_REPLY;
      case 'order_code': {
        const order = await this.resolveOrder.resolve({
          requestId: input.requestId,
          orderCode: intent.orderCode,
          requesterId: input.senderId,
          signal: input.signal,
        });

        return order
          ? buildOrderFoundReply(order)
          : buildOrderNotFoundReply({ orderCode: intent.orderCode, requesterId: input.senderId });
      }
    }
  }
}
