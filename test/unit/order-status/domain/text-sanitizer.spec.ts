import { MAX_INBOUND_TEXT_CHARS, sanitizeText } from '@/modules/order-status/domain/text-sanitizer';

describe('sanitizeText', () => {
  it('strips tags and collapses whitespace', () => {
    expect(sanitizeText('  <b>PED-123</b>\n\n por favor ')).toBe('PED-123 por favor');
  });

  it('removes control characters', () => {
    expect(sanitizeText('hola\u0000\u0007mundo')).toBe('hola mundo');
  });

  it('caps the length', () => {
    expect(sanitizeText('a'.repeat(MAX_INBOUND_TEXT_CHARS + 50))).toHaveLength(
      MAX_INBOUND_TEXT_CHARS,
    );
  });

  it('returns an empty string for non-string input', () => {
    expect(sanitizeText(42)).toBe('');
    expect(sanitizeText(undefined)).toBe('');
  });
});
