import { containsProfanity } from '@/modules/order-status/domain/profanity';

describe('containsProfanity', () => {
  it('matches prohibited words regardless of case and accents', () => {
    expect(containsProfanity('sos un IDIOTA')).toBe(true);
    expect(containsProfanity('Cabrón')).toBe(true);
    expect(containsProfanity('estúpido')).toBe(true);
  });

  it('matches multi-word entries across extra spaces', () => {
    expect(containsProfanity('hijo   de puta')).toBe(true);
  });

  it('does not match words that only contain a prohibited word', () => {
    expect(containsProfanity('computadora')).toBe(false);
    expect(containsProfanity('tontería')).toBe(false);
  });

  it('returns false for clean text', () => {
    expect(containsProfanity('hola, PED-123')).toBe(false);
  });
});
