import { UnauthorizedException, type ExecutionContext } from '@nestjs/common';
import { createHmac } from 'node:crypto';
import type { Request } from 'express';
import { WhatsappSignatureGuard } from '@/modules/order-status/infrastructure/security';
import { buildConfigService } from '../../../../fixtures/order-status/fakes';

describe('WhatsappSignatureGuard', () => {
  const rawBody = '{"entry":[{"changes":[]}]}';
  const validSignature = `sha256=${createHmac('sha256', 'test-secret').update(rawBody).digest('hex')}`;

  it('allows every request when WHATSAPP_SECRET is unset', () => {
    const guard = new WhatsappSignatureGuard(buildConfigService({}));

    expect(guard.canActivate(buildContext({ headers: {}, rawBody }))).toBe(true);
  });

  it('accepts a matching signature over the raw body', () => {
    const guard = new WhatsappSignatureGuard(buildConfigService({ WHATSAPP_SECRET: 'test-secret' }));

    expect(
      guard.canActivate(
        buildContext({ headers: { 'X-Hub-Signature-256': validSignature }, rawBody }),
      ),
    ).toBe(true);
  });

  it('rejects a missing signature', () => {
    const guard = new WhatsappSignatureGuard(buildConfigService({ WHATSAPP_SECRET: 'test-secret' }));

    expect(() => guard.canActivate(buildContext({ headers: {}, rawBody }))).toThrow(
      UnauthorizedException,
    );
  });

  it('rejects a signature computed over a different body', () => {
    const guard = new WhatsappSignatureGuard(buildConfigService({ WHATSAPP_SECRET: 'test-secret' }));

    expect(() =>
      guard.canActivate(
        buildContext({
          headers: { 'x-hub-signature-256': validSignature },
          rawBody: '{"entry":[]}',
        }),
      ),
    ).toThrow('Firma o credenciales invalidas.');
  });
});

function buildContext(input: { headers: Record<string, string>; rawBody?: string }): ExecutionContext {
  const normalizedHeaders = new Map(
    Object.entries(input.headers).map(([key, value]) => [key.toLowerCase(), value]),
  );

  const request = {
    body: {},
    rawBody: input.rawBody,
    requestId: 'req-1',
    header: (name: string) => normalizedHeaders.get(name.toLowerCase()),
  } as unknown as Request;

  return {
    switchToHttp: () => ({ getRequest: () => request }),
  } as unknown as ExecutionContext;
}
