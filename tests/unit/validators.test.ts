import { describe, it, expect } from 'vitest';
import { InvalidOperationError } from '../../src/lib/errors';
import {
  createOfferSchema,
  currencySchema,
  identitySchema,
  limitSchema,
  marketOrderSchema,
  pairSchema,
  parseInput,
} from '../../src/lib/validators';

describe('pairSchema', () => {
  it('normalizes case and whitespace', () => {
    expect(parseInput(pairSchema, ' btc/usdt ')).toBe('BTC/USDT');
  });

  it('rejects pairs without a separator', () => {
    expect(() => parseInput(pairSchema, 'BTCUSDT')).toThrow('input: pair must look like BASE/QUOTE');
  });
});

describe('currencySchema', () => {
  it('upper-cases codes', () => {
    expect(parseInput(currencySchema, ' eth ')).toBe('ETH');
  });

  it('rejects symbols', () => {
    expect(() => parseInput(currencySchema, 'E$')).toThrow(InvalidOperationError);
  });
});

describe('identitySchema', () => {
  it('trims the display name', () => {
    expect(parseInput(identitySchema, { externalId: 'oauth|1', displayName: '  Ada  ' })).toEqual({
      externalId: 'oauth|1',
      displayName: 'Ada',
    });
  });

  it('rejects an empty external id', () => {
    expect(() => parseInput(identitySchema, { externalId: '', displayName: 'Ada' })).toThrow(/^externalId: /);
  });
});

describe('marketOrderSchema', () => {
  const order = { accountId: 'acc-1', pair: 'BTC/USDT', side: 'buy', amount: '0.1', price: '50000' };

  it('accepts a null price', () => {
    expect(parseInput(marketOrderSchema, { ...order, price: null }).price).toBeNull();
  });

  it('rejects an unknown side and reports the path', () => {
    try {
      parseInput(marketOrderSchema, { ...order, side: 'hold' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOperationError);
      if (error instanceof InvalidOperationError) {
        expect(error.message.startsWith('side: ')).toBe(true);
        expect(error.details?.issues).toHaveLength(1);
      }
    }
  });
});

describe('createOfferSchema', () => {
  it('normalizes both currencies', () => {
    const parsed = parseInput(createOfferSchema, {
      accountId: 'acc-1',
      offeringCurrency: 'btc',
      offeringAmount: '0.5',
      requestingCurrency: 'usdt',
      requestingAmount: 25000,
    });
    expect(parsed.offeringCurrency).toBe('BTC');
    expect(parsed.requestingCurrency).toBe('USDT');
  });
});

describe('limitSchema', () => {
  it('coerces numeric strings', () => {
    expect(parseInput(limitSchema, '10')).toBe(10);
  });

  it('rejects zero', () => {
    expect(() => parseInput(limitSchema, 0)).toThrow(InvalidOperationError);
  });
});
