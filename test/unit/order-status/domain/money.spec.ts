import { formatMoney, parseMoney } from '@/modules/order-status/domain/money';

describe('parseMoney', () => {
  it('tags bare numbers with the default currency', () => {
    expect(parseMoney(100, 'USD')).toEqual({ amount: 100, currency: 'USD' });
  });

  it('reads localized amount strings', () => {
    expect(parseMoney('1.250,50', 'ARS')).toEqual({ amount: 1250.5, currency: 'ARS' });
    expect(parseMoney('1,250.50', 'USD')).toEqual({ amount: 1250.5, currency: 'USD' });
    expect(parseMoney('99,5', 'USD')).toEqual({ amount: 99.5, currency: 'USD' });
  });

  it('treats a lone separator before three digits as thousands', () => {
    expect(parseMoney('1.250', 'ARS')).toEqual({ amount: 1250, currency: 'ARS' });
  });

  it('picks up a currency tag inside the string', () => {
    expect(parseMoney('100 eur', 'USD')).toEqual({ amount: 100, currency: 'EUR' });
  });

  it('reads amount objects', () => {
    expect(parseMoney({ amount: '5100', currency: 'ars' }, 'USD')).toEqual({
      amount: 5100,
      currency: 'ARS',
    });
    expect(parseMoney({ amount: 10 }, 'USD')).toEqual({ amount: 10, currency: 'USD' });
  });

  it('returns undefined when no amount can be read', () => {
    expect(parseMoney('gratis', 'USD')).toBeUndefined();
    expect(parseMoney(Number.NaN, 'USD')).toBeUndefined();
    expect(parseMoney({ currency: 'USD' }, 'USD')).toBeUndefined();
    expect(parseMoney(null, 'USD')).toBeUndefined();
  });
});

describe('formatMoney', () => {
  it('renders amount and currency', () => {
    expect(formatMoney({ amount: 100, currency: 'USD' })).toBe('100 USD');
  });
});
