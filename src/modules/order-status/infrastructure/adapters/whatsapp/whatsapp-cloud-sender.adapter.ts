import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import type { MessageSenderPort } from '@/modules/order-status/application/ports/message-sender.port';
import { fetchWithTimeout, parseJson } from '../shared';

const LOG_PREVIEW_CHARS = 50;

/**
 * Sends text replies through the WhatsApp Cloud API messages endpoint.
 */
@Injectable()
export class WhatsappCloudSenderAdapter implements MessageSenderPort {
  private readonly logger = createLogger(WhatsappCloudSenderAdapter.name);
  private readonly apiUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.apiUrl = this.configService.get<string>('WHATSAPP_API_URL') ?? '';
    this.token = this.configService.get<string>('WHATSAPP_TOKEN') ?? '';
    this.timeoutMs = this.configService.get<number>('REQUEST_TIMEOUT_MS') ?? 10_000;
  }

  async send(input: { to: string; text: string; requestId: string }): Promise<boolean> {
    this.logger.webhook('outbound_message', {
      event: 'outbound_message',
      request_id: input.requestId,
      to: input.to,
      preview: input.text.slice(0, LOG_PREVIEW_CHARS),
    });

    try {
      const response = await fetchWithTimeout(
        this.apiUrl,
        {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.token}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            messaging_product: 'whatsapp',
            to: input.to,
            type: 'text',
            text: { body: input.text },
          }),
        },
        this.timeoutMs,
      );

      if (!response.ok) {
        this.logger.warn('outbound_message_rejected', {
          event: 'outbound_message_rejected',
          request_id: input.requestId,
          status: response.status,
          body: await parseJson(response),
        });
        return false;
      }

      return true;
    } catch (error: unknown) {
      this.logger.error(
        'outbound_message_failed',
        error instanceof Error ? error : undefined,
        {
          event: 'outbound_message_failed',
          request_id: input.requestId,
          timeout: error instanceof Error && error.name === 'AbortError',
        },
      );
      return false;
    }
  }
}
