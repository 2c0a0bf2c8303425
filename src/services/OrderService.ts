/**
 * OrderService
 *
 * Instant market orders against an externally supplied price. The simulated
 * market is the counterparty: both wallet legs, the fee and the house-ledger
 * legs commit in one transaction with the transaction record.
 *
 * Rounding (scale = ledger.scale):
 *   buy:  spend = ceil(amount * price), fee = ceil(spend * feeRate),
 *         quote -= spend + fee, base += amount
 *   sell: proceeds = floor(amount * price), fee = ceil(proceeds * feeRate),
 *         base -= amount, quote += proceeds - fee
 *
 * Failed orders are never retried here; the caller decides.
 */

import type Decimal from 'decimal.js';
import { ulid } from 'ulidx';
import type { z } from 'zod';
import type { GameConfig } from '../config';
import { AppError, InvalidOperationError, PriceUnavailableError } from '../lib/errors';
import { positiveAmount, positivePrice, roundDown, roundUp, toDecimal } from '../lib/money';
import {
  marketOrderSchema,
  pairSchema,
  parseInput,
  transactionQuerySchema,
} from '../lib/validators';
import { orderLogger } from '../logger';
import type { PriceOracle } from '../oracle';
import type { OrderSide, TradingPair, Transaction } from '../types';
import type { LedgerService } from './LedgerService';

// ============================================================================
// TYPES
// ============================================================================

export interface MarketOrderInput {
  accountId: string;
  pair: string;
  side: OrderSide;
  amount: Decimal.Value;
  /** Null when the oracle had no price; the order then fails untouched. */
  price: Decimal.Value | null;
}

export type PlaceOrderInput = Omit<MarketOrderInput, 'price'>;

export interface OrderQuote {
  side: OrderSide;
  amount: Decimal;
  price: Decimal;
  /** spend for a buy, proceeds for a sell */
  gross: Decimal;
  fee: Decimal;
  /** Quote currency debited (buy) or credited (sell). */
  total: Decimal;
}

export interface OrderServiceDeps {
  ledger: LedgerService;
  game: GameConfig;
  oracle?: PriceOracle;
  generateId?: () => string;
}

const placeOrderSchema = marketOrderSchema.omit({ price: true });

// ============================================================================
// PRICING
// ============================================================================

export function parsePair(pair: string, currencies: readonly string[]): TradingPair {
  const symbol = parseInput(pairSchema, pair);
  const [base, quote] = symbol.split('/');
  if (!base || !quote) {
    throw new InvalidOperationError(`Malformed pair ${pair}`, { pair });
  }
  if (base === quote) {
    throw new InvalidOperationError(`Pair ${symbol} must name two different currencies`, { pair: symbol });
  }
  for (const currency of [base, quote]) {
    if (!currencies.includes(currency)) {
      throw new InvalidOperationError(`Unsupported currency ${currency}`, { pair: symbol, currency });
    }
  }
  return { base, quote, symbol };
}

export function priceMarketOrder(
  side: OrderSide,
  amount: Decimal,
  price: Decimal,
  feeRate: Decimal,
  scale: number
): OrderQuote {
  if (side === 'buy') {
    const gross = roundUp(amount.times(price), scale);
    const fee = roundUp(gross.times(feeRate), scale);
    return { side, amount, price, gross, fee, total: gross.plus(fee) };
  }

  const gross = roundDown(amount.times(price), scale);
  const fee = roundUp(gross.times(feeRate), scale);
  const total = gross.minus(fee);
  if (total.lte(0)) {
    throw new InvalidOperationError('Order is too small to cover its fee', {
      amount: amount.toFixed(),
      price: price.toFixed(),
    });
  }
  return { side, amount, price, gross, fee, total };
}

// ============================================================================
// SERVICE
// ============================================================================

export class OrderService {
  private readonly ledger: LedgerService;
  private readonly game: GameConfig;
  private readonly oracle?: PriceOracle;
  private readonly generateId: () => string;

  constructor(deps: OrderServiceDeps) {
    this.ledger = deps.ledger;
    this.game = deps.game;
    this.oracle = deps.oracle;
    this.generateId = deps.generateId ?? ulid;
  }

  async executeMarketOrder(input: MarketOrderInput): Promise<Transaction> {
    const order = parseInput(marketOrderSchema, input);
    const pair = parsePair(order.pair, this.game.currencies);
    if (order.price === null) {
      throw new PriceUnavailableError(pair.symbol);
    }

    const scale = this.ledger.amountScale;
    const quote = priceMarketOrder(
      order.side,
      positiveAmount(order.amount, scale),
      positivePrice(order.price),
      toDecimal(this.game.feeRate, 'feeRate'),
      scale
    );
    const { accountId } = order;

    const record = await this.ledger.run(async (legs) => {
      if (!(await legs.repos.accounts.findById(accountId))) {
        throw AppError.notFound('Account', accountId);
      }
      await legs.lockWallets([
        { accountId, currency: pair.base },
        { accountId, currency: pair.quote },
      ]);

      if (quote.side === 'buy') {
        await legs.transfer(accountId, pair.quote, quote.total.neg());
        await legs.transfer(accountId, pair.base, quote.amount);
        await legs.house(pair.quote, { feesCollected: quote.fee, marketPosition: quote.gross });
        await legs.house(pair.base, { marketPosition: quote.amount.neg() });
      } else {
        await legs.transfer(accountId, pair.base, quote.amount.neg());
        await legs.transfer(accountId, pair.quote, quote.total);
        await legs.house(pair.base, { marketPosition: quote.amount });
        await legs.house(pair.quote, { feesCollected: quote.fee, marketPosition: quote.gross.neg() });
      }

      return legs.repos.transactions.append({
        id: this.generateId(),
        accountId,
        pair: pair.symbol,
        kind: quote.side,
        amount: quote.amount,
        price: quote.price,
        fee: quote.fee,
        feeCurrency: pair.quote,
        total: quote.total,
        createdAt: legs.now,
      });
    });

    orderLogger.info(
      {
        accountId,
        transactionId: record.id,
        pair: record.pair,
        side: record.kind,
        amount: record.amount.toFixed(),
        price: record.price.toFixed(),
        fee: record.fee.toFixed(),
      },
      'Market order executed'
    );
    return record;
  }

  /**
   * Ask the oracle for a price, then execute. The oracle call happens before
   * the ledger transaction opens.
   */
  async placeMarketOrder(input: PlaceOrderInput): Promise<Transaction> {
    if (!this.oracle) {
      throw new InvalidOperationError('No price oracle configured');
    }
    const order = parseInput(placeOrderSchema, input);
    const pair = parsePair(order.pair, this.game.currencies);
    const price = await this.oracle.getPrice(pair.symbol);
    if (price === null) {
      orderLogger.warn({ accountId: order.accountId, pair: pair.symbol }, 'Oracle returned no price');
    }
    return this.executeMarketOrder({ ...order, pair: pair.symbol, price });
  }

  async listTransactions(
    accountId: string,
    options: z.input<typeof transactionQuerySchema> = {}
  ): Promise<Transaction[]> {
    const query = parseInput(transactionQuerySchema, options);
    return this.ledger.read.transactions.listByAccount(accountId, query);
  }
}
