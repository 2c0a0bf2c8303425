/**
 * LedgerAuditService
 *
 * Recomputes conservation per currency:
 *   sum(balance + locked) + marketPosition + feesCollected = issued
 * and checks that no wallet field is negative. Runs inside a store
 * transaction so it sees one consistent snapshot.
 */

import type Decimal from 'decimal.js';
import { InvariantViolationError } from '../lib/errors';
import { ZERO } from '../lib/money';
import { auditLogger } from '../logger';
import type { LedgerService } from './LedgerService';

export interface CurrencyAudit {
  currency: string;
  issued: Decimal;
  walletBalance: Decimal;
  walletLocked: Decimal;
  feesCollected: Decimal;
  marketPosition: Decimal;
  /** accounted - issued; zero when the currency balances. */
  difference: Decimal;
}

export interface LedgerAuditReport {
  checkedAt: Date;
  walletsChecked: number;
  currencies: CurrencyAudit[];
}

export class LedgerAuditService {
  constructor(private readonly ledger: LedgerService) {}

  async verify(): Promise<LedgerAuditReport> {
    const report = await this.ledger.run(async ({ repos, now }) => {
      const [wallets, totals, house] = await Promise.all([
        repos.wallets.listAll(),
        repos.wallets.totalsByCurrency(),
        repos.house.list(),
      ]);

      const negative = wallets.filter((w) => w.balance.isNegative() || w.lockedBalance.isNegative());
      if (negative.length > 0) {
        throw this.violation('Negative wallet balance', {
          wallets: negative.map((w) => ({
            accountId: w.accountId,
            currency: w.currency,
            balance: w.balance.toFixed(),
            lockedBalance: w.lockedBalance.toFixed(),
          })),
        });
      }

      const currencies = new Set([...totals.map((t) => t.currency), ...house.map((h) => h.currency)]);
      const audits: CurrencyAudit[] = [...currencies].sort().map((currency) => {
        const total = totals.find((t) => t.currency === currency);
        const entry = house.find((h) => h.currency === currency);
        const walletBalance = total?.balance ?? ZERO;
        const walletLocked = total?.lockedBalance ?? ZERO;
        const issued = entry?.issued ?? ZERO;
        const feesCollected = entry?.feesCollected ?? ZERO;
        const marketPosition = entry?.marketPosition ?? ZERO;
        const accounted = walletBalance.plus(walletLocked).plus(marketPosition).plus(feesCollected);
        return {
          currency,
          issued,
          walletBalance,
          walletLocked,
          feesCollected,
          marketPosition,
          difference: accounted.minus(issued),
        };
      });

      const unbalanced = audits.filter((a) => !a.difference.isZero() || a.feesCollected.isNegative());
      if (unbalanced.length > 0) {
        throw this.violation('Ledger does not balance', {
          currencies: unbalanced.map((a) => ({
            currency: a.currency,
            issued: a.issued.toFixed(),
            difference: a.difference.toFixed(),
            feesCollected: a.feesCollected.toFixed(),
          })),
        });
      }

      return { checkedAt: now, walletsChecked: wallets.length, currencies: audits };
    });

    auditLogger.info(
      { walletsChecked: report.walletsChecked, currencies: report.currencies.length },
      'Ledger audit passed'
    );
    return report;
  }

  private violation(message: string, details: Record<string, unknown>): InvariantViolationError {
    const error = new InvariantViolationError(message, details);
    auditLogger.fatal({ err: error, ...details }, message);
    return error;
  }
}
