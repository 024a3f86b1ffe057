import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { INVALID_CREDENTIALS_MESSAGE } from '@/common/constants/error-messages.constants';
import { createLogger } from '@/common/utils/logger';
import { secureEquals } from './crypto-helpers';

interface BasicCredentials {
  user: string;
  pass: string;
}

/**
 * HTTP Basic auth for admin endpoints. With ADMIN_USER or ADMIN_PASS unset
 * every request is refused.
 */
@Injectable()
export class AdminBasicAuthGuard implements CanActivate {
  private readonly logger = createLogger(AdminBasicAuthGuard.name);

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const expectedUser = this.configService.get<string>('ADMIN_USER');
    const expectedPass = this.configService.get<string>('ADMIN_PASS');

    if (!expectedUser || !expectedPass) {
      this.reject(request, 'admin_disabled');
    }

    const credentials = parseBasicAuthorization(request.header('authorization'));
    if (!credentials) {
      this.reject(request, 'missing_credentials');
    }

    // Both comparisons always run.
    const userMatches = secureEquals(credentials.user, expectedUser);
    const passMatches = secureEquals(credentials.pass, expectedPass);
    if (!(userMatches && passMatches)) {
      this.reject(request, 'invalid_credentials');
    }

    return true;
  }

  private reject(request: Request, reason: string): never {
    this.logger.security('admin_auth_rejected', {
      event: 'admin_auth_rejected',
      request_id: request.requestId,
      path: request.path,
      reason,
    });
    throw new UnauthorizedException(INVALID_CREDENTIALS_MESSAGE);
  }
}

export function parseBasicAuthorization(header: string | undefined): BasicCredentials | null {
  if (!header) {
    return null;
  }

  const match = /^Basic\s+([A-Za-z0-9+/=]+)$/i.exec(header.trim());
  if (!match) {
    return null;
  }

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separatorIndex = decoded.indexOf(':');
  if (separatorIndex < 0) {
    return null;
  }

  return {
    user: decoded.slice(0, separatorIndex),
    pass: decoded.slice(separatorIndex + 1),
  };
}
