/**
 * OfferService
 *
 * Peer-to-peer offers with escrow. Creating an offer locks the offered amount
 * in the creator's wallet; accepting settles all four legs at once; cancelling
 * releases the lock.
 *
 * An offer is immutable once it leaves `active`. The offer row is locked
 * (FOR UPDATE) before its status is read, and the status write is itself
 * conditional on `active`, so two racing accepts or an accept racing a cancel
 * resolve to exactly one winner.
 */

import type Decimal from 'decimal.js';
import { ulid } from 'ulidx';
import type { GameConfig } from '../config';
import { AppError, InvalidOperationError, OfferNotActiveError } from '../lib/errors';
import { positiveAmount } from '../lib/money';
import { createOfferSchema, idSchema, limitSchema, parseInput } from '../lib/validators';
import { offerLogger } from '../logger';
import type { LedgerRepositories } from '../repositories/types';
import type { OfferStatus, P2PSettlement, TradeOffer } from '../types';
import type { LedgerService } from './LedgerService';

// ============================================================================
// TYPES
// ============================================================================

export interface CreateOfferInput {
  accountId: string;
  offeringCurrency: string;
  offeringAmount: Decimal.Value;
  requestingCurrency: string;
  requestingAmount: Decimal.Value;
}

export interface AcceptOfferResult {
  offer: TradeOffer;
  settlement: P2PSettlement;
}

export interface OfferServiceDeps {
  ledger: LedgerService;
  game: GameConfig;
  generateId?: () => string;
}

// ============================================================================
// STATE MACHINE
// ============================================================================

const VALID_TRANSITIONS: Record<OfferStatus, OfferStatus[]> = {
  active: ['completed', 'cancelled'],
  completed: [], // TERMINAL
  cancelled: [], // TERMINAL
};

export function isValidTransition(from: OfferStatus, to: OfferStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

function assertTransition(offer: TradeOffer, to: OfferStatus): void {
  if (!isValidTransition(offer.status, to)) {
    throw new OfferNotActiveError(offer.id, offer.status);
  }
}

async function findOfferForUpdate(repos: LedgerRepositories, offerId: string): Promise<TradeOffer> {
  const offer = await repos.offers.findByIdForUpdate(offerId);
  if (!offer) {
    throw AppError.notFound('Offer', offerId);
  }
  return offer;
}

// ============================================================================
// SERVICE
// ============================================================================

export class OfferService {
  private readonly ledger: LedgerService;
  private readonly game: GameConfig;
  private readonly generateId: () => string;

  constructor(deps: OfferServiceDeps) {
    this.ledger = deps.ledger;
    this.game = deps.game;
    this.generateId = deps.generateId ?? ulid;
  }

  async createOffer(input: CreateOfferInput): Promise<TradeOffer> {
    const data = parseInput(createOfferSchema, input);
    const scale = this.ledger.amountScale;

    if (data.offeringCurrency === data.requestingCurrency) {
      throw new InvalidOperationError('Offer must exchange two different currencies', {
        currency: data.offeringCurrency,
      });
    }
    for (const currency of [data.offeringCurrency, data.requestingCurrency]) {
      if (!this.game.currencies.includes(currency)) {
        throw new InvalidOperationError(`Unsupported currency ${currency}`, { currency });
      }
    }
    const offeringAmount = positiveAmount(data.offeringAmount, scale, 'offeringAmount');
    const requestingAmount = positiveAmount(data.requestingAmount, scale, 'requestingAmount');

    const offer = await this.ledger.run(async (legs) => {
      if (!(await legs.repos.accounts.findById(data.accountId))) {
        throw AppError.notFound('Account', data.accountId);
      }
      await legs.lockWallets([{ accountId: data.accountId, currency: data.offeringCurrency }]);
      await legs.lock(data.accountId, data.offeringCurrency, offeringAmount);

      return legs.repos.offers.insert({
        id: this.generateId(),
        creatorId: data.accountId,
        offeringCurrency: data.offeringCurrency,
        offeringAmount,
        requestingCurrency: data.requestingCurrency,
        requestingAmount,
        status: 'active',
        acceptedBy: null,
        createdAt: legs.now,
        updatedAt: legs.now,
      });
    });

    offerLogger.info(
      {
        offerId: offer.id,
        creatorId: offer.creatorId,
        offering: `${offer.offeringAmount.toFixed()} ${offer.offeringCurrency}`,
        requesting: `${offer.requestingAmount.toFixed()} ${offer.requestingCurrency}`,
      },
      'Offer created, funds escrowed'
    );
    return offer;
  }

  async acceptOffer(acceptorId: string, offerId: string): Promise<AcceptOfferResult> {
    parseInput(idSchema, offerId);
    parseInput(idSchema, acceptorId);

    const preview = await this.ledger.read.offers.findById(offerId);
    if (!preview) {
      throw AppError.notFound('Offer', offerId);
    }
    if (preview.creatorId === acceptorId) {
      throw new InvalidOperationError('Cannot accept your own offer', { offerId, accountId: acceptorId });
    }

    const result = await this.ledger.run(async (legs) => {
      const { repos } = legs;
      const offer = await findOfferForUpdate(repos, offerId);
      assertTransition(offer, 'completed');

      const acceptor = await repos.accounts.findById(acceptorId);
      if (!acceptor) {
        throw AppError.notFound('Account', acceptorId);
      }

      const { creatorId, offeringCurrency, offeringAmount, requestingCurrency, requestingAmount } = offer;
      await legs.lockWallets([
        { accountId: creatorId, currency: offeringCurrency },
        { accountId: creatorId, currency: requestingCurrency },
        { accountId: acceptorId, currency: offeringCurrency },
        { accountId: acceptorId, currency: requestingCurrency },
      ]);

      await legs.transfer(acceptorId, requestingCurrency, requestingAmount.neg());
      await legs.transfer(acceptorId, offeringCurrency, offeringAmount);
      await legs.consumeLocked(creatorId, offeringCurrency, offeringAmount);
      await legs.transfer(creatorId, requestingCurrency, requestingAmount);

      const completed = await repos.offers.transition(offer.id, 'active', 'completed', legs.now, acceptorId);
      if (!completed) {
        throw new OfferNotActiveError(offer.id, offer.status);
      }

      const settlement = await repos.settlements.append({
        id: this.generateId(),
        offerId: offer.id,
        creatorId,
        acceptorId,
        offeringCurrency,
        offeringAmount,
        requestingCurrency,
        requestingAmount,
        createdAt: legs.now,
      });

      return { offer: completed, settlement };
    });

    offerLogger.info(
      { offerId, creatorId: result.offer.creatorId, acceptorId, settlementId: result.settlement.id },
      'Offer accepted and settled'
    );
    return result;
  }

  async cancelOffer(accountId: string, offerId: string): Promise<TradeOffer> {
    parseInput(idSchema, offerId);
    parseInput(idSchema, accountId);

    const cancelled = await this.ledger.run(async (legs) => {
      const offer = await findOfferForUpdate(legs.repos, offerId);
      if (offer.creatorId !== accountId) {
        throw new InvalidOperationError('Only the creator can cancel an offer', { offerId, accountId });
      }
      assertTransition(offer, 'cancelled');

      await legs.lockWallets([{ accountId, currency: offer.offeringCurrency }]);
      await legs.unlock(accountId, offer.offeringCurrency, offer.offeringAmount);

      const updated = await legs.repos.offers.transition(offer.id, 'active', 'cancelled', legs.now);
      if (!updated) {
        throw new OfferNotActiveError(offer.id, offer.status);
      }
      return updated;
    });

    offerLogger.info({ offerId, accountId }, 'Offer cancelled, escrow released');
    return cancelled;
  }

  async getOffer(offerId: string): Promise<TradeOffer> {
    const offer = await this.ledger.read.offers.findById(offerId);
    if (!offer) {
      throw AppError.notFound('Offer', offerId);
    }
    return offer;
  }

  /** Active offers, newest first, optionally hiding one account's own. */
  async listActiveOffers(excludeAccountId?: string): Promise<TradeOffer[]> {
    return this.ledger.read.offers.listActive(excludeAccountId);
  }

  async listAccountOffers(accountId: string, status?: OfferStatus): Promise<TradeOffer[]> {
    return this.ledger.read.offers.listByCreator(accountId, status);
  }

  async listSettlements(accountId: string, limit: number = 100): Promise<P2PSettlement[]> {
    return this.ledger.read.settlements.listByAccount(accountId, parseInput(limitSchema, limit));
  }
}
