import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac } from 'node:crypto';
import type { Request } from 'express';
import { INVALID_CREDENTIALS_MESSAGE } from '@/common/constants/error-messages.constants';
import { createLogger } from '@/common/utils/logger';
import { secureEquals } from './crypto-helpers';

export const HEADER_WHATSAPP_SIGNATURE = 'x-hub-signature-256';

/**
 * Checks the Meta `x-hub-signature-256` HMAC over the raw body.
 * Only enforced when WHATSAPP_SECRET is configured.
 */
@Injectable()
export class WhatsappSignatureGuard implements CanActivate {
  private readonly logger = createLogger(WhatsappSignatureGuard.name);

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const secret = this.configService.get<string>('WHATSAPP_SECRET');
    if (!secret) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const providedSignature = request.header(HEADER_WHATSAPP_SIGNATURE);
    if (!providedSignature) {
      this.reject(request, 'missing_signature');
    }

    const body = request.rawBody ?? JSON.stringify(request.body ?? {});
    const expectedSignature = `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;

    if (!secureEquals(providedSignature, expectedSignature)) {
      this.reject(request, 'invalid_signature');
    }

    return true;
  }

  private reject(request: Request, reason: string): never {
    this.logger.security('webhook_signature_rejected', {
      event: 'webhook_signature_rejected',
      request_id: request.requestId,
      reason,
    });
    throw new UnauthorizedException(INVALID_CREDENTIALS_MESSAGE);
  }
}
