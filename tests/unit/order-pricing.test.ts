import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { parsePair, priceMarketOrder } from '../../src/services/OrderService';

const RATE = new Decimal('0.001');

function quote(side: 'buy' | 'sell', amount: string, price: string) {
  const q = priceMarketOrder(side, new Decimal(amount), new Decimal(price), RATE, 8);
  return { gross: q.gross.toFixed(), fee: q.fee.toFixed(), total: q.total.toFixed() };
}

describe('priceMarketOrder', () => {
  it('buy: debits spend plus fee', () => {
    expect(quote('buy', '0.1', '50000')).toEqual({ gross: '5000', fee: '5', total: '5005' });
  });

  it('sell: credits proceeds minus fee', () => {
    expect(quote('sell', '0.1', '50000')).toEqual({ gross: '5000', fee: '5', total: '4995' });
  });

  it('buy rounds spend and fee up', () => {
    expect(quote('buy', '0.00000003', '0.5')).toEqual({
      gross: '0.00000002',
      fee: '0.00000001',
      total: '0.00000003',
    });
  });

  it('sell rounds proceeds down and fee up', () => {
    expect(quote('sell', '3', '0.333333333')).toEqual({
      gross: '0.99999999',
      fee: '0.001',
      total: '0.99899999',
    });
  });

  it('rejects a sell whose fee eats all proceeds', () => {
    expect(() => quote('sell', '0.00000003', '0.5')).toThrow('Order is too small to cover its fee');
  });

  it('charges no fee at a zero rate', () => {
    const q = priceMarketOrder('buy', new Decimal('2'), new Decimal('10'), new Decimal(0), 8);
    expect(q.fee.isZero()).toBe(true);
    expect(q.total.toFixed()).toBe('20');
  });
});

describe('parsePair', () => {
  const currencies = ['BTC', 'ETH', 'USDT'];

  it('splits and normalizes a pair', () => {
    expect(parsePair('btc/usdt', currencies)).toEqual({ base: 'BTC', quote: 'USDT', symbol: 'BTC/USDT' });
  });

  it('rejects a pair of one currency', () => {
    expect(() => parsePair('BTC/BTC', currencies)).toThrow('Pair BTC/BTC must name two different currencies');
  });

  it('rejects unsupported currencies', () => {
    expect(() => parsePair('DOGE/USDT', currencies)).toThrow('Unsupported currency DOGE');
  });
});
