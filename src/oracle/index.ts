/**
 * Price oracle boundary. Fetching prices is someone else's job; the core only
 * asks for one unit price per pair and treats `null` as "no price right now".
 */

import Decimal from 'decimal.js';

export interface PriceOracle {
  /** Unit price of BASE in QUOTE for a `BASE/QUOTE` pair, or null. */
  getPrice(pair: string): Promise<Decimal | null>;
}

/**
 * Fixed price table. Used by scripts, tests and local play.
 */
export class StaticPriceOracle implements PriceOracle {
  private readonly prices = new Map<string, Decimal>();

  constructor(prices: Readonly<Record<string, Decimal.Value>> = {}) {
    for (const [pair, price] of Object.entries(prices)) {
      this.set(pair, price);
    }
  }

  set(pair: string, price: Decimal.Value): void {
    this.prices.set(pair.toUpperCase(), new Decimal(price));
  }

  remove(pair: string): void {
    this.prices.delete(pair.toUpperCase());
  }

  async getPrice(pair: string): Promise<Decimal | null> {
    return this.prices.get(pair.toUpperCase()) ?? null;
  }
}
