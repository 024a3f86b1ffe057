import { redactSensitiveData } from '@/common/utils/pii-redaction';

describe('pii-redaction', () => {
  it('redacts secrets and masks phone-derived identifiers', () => {
    const redacted = redactSensitiveData({
      to: '+54 9 11 4444 5555',
      sender_id: '15551234567',
      customer: 'Ana',
      authorization: 'Bearer token-value',
      whatsapp_secret: 'test-secret',
      metadata: {
        requesterId: '15559876543',
      },
    });

    expect(redacted).toEqual({
      to: '***5555',
      sender_id: '***4567',
      customer: 'A***',
      authorization: '[REDACTED]',
      whatsapp_secret: '[REDACTED]',
      metadata: {
        requesterId: '***6543',
      },
    });
  });

  it('redacts bearer tokens embedded in strings', () => {
    expect(redactSensitiveData({ detail: 'sent Bearer abc.def-123 upstream' })).toEqual({
      detail: 'sent Bearer [REDACTED] upstream',
    });
  });

  it('marks circular references', () => {
    const node: Record<string, unknown> = { event: 'loop' };
    node.self = node;

    expect(redactSensitiveData(node)).toEqual({ event: 'loop', self: '[CIRCULAR]' });
  });

  it('keeps non-sensitive values intact', () => {
    const redacted = redactSensitiveData({
      event: 'order_lookup_retry',
      request_id: 'req-1',
      retry_count: 1,
      details: {
        status: 'ok',
      },
    });

    expect(redacted).toEqual({
      event: 'order_lookup_retry',
      request_id: 'req-1',
      retry_count: 1,
      details: {
        status: 'ok',
      },
    });
  });
});
