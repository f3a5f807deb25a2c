/**
 * @module portfolio
 * Reference {@link Ledger} implementation: cash plus per-symbol positions.
 *
 * Every mutation is validated before anything is written, so a rejected
 * `adjust` leaves the portfolio exactly as it was.
 *
 * Cash is held as a whole number of cents. A cash delta is rounded to the
 * cent half away from zero, so `+x` followed by `-x` always nets to zero.
 */

import type { Ledger } from '@trade-ledger/types';
import { ReceiverMutationError } from './errors';

/** Dollars to whole cents, rounding halves away from zero. */
function toCents(amount: number): number {
  return Math.sign(amount) * Math.round(Math.abs(amount) * 100);
}

/** Validation policy for a {@link Portfolio}. */
export interface PortfolioOptions {
  /** Allow positions to go below zero (default true). */
  allowShort?: boolean;
  /** Allow the cash balance to go below zero (default true). */
  allowNegativeCash?: boolean;
}

export class Portfolio implements Ledger {
  private readonly holdings = new Map<string, number>();
  private balanceCents: number;
  private readonly allowShort: boolean;
  private readonly allowNegativeCash: boolean;

  /**
   * @param initialCash - Starting cash balance, rounded to the cent.
   * @param options     - Validation policy.
   */
  constructor(initialCash: number, options: PortfolioOptions = {}) {
    if (!Number.isFinite(initialCash)) {
      throw new RangeError('initialCash must be a finite number');
    }
    this.balanceCents = toCents(initialCash);
    this.allowShort = options.allowShort ?? true;
    this.allowNegativeCash = options.allowNegativeCash ?? true;
  }

  get cash(): number {
    return this.balanceCents / 100;
  }

  position(symbol: string): number {
    return this.holdings.get(symbol) ?? 0;
  }

  positions(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [symbol, quantity] of this.holdings) {
      if (quantity !== 0) {
        result[symbol] = quantity;
      }
    }
    return result;
  }

  /**
   * @throws ReceiverMutationError if the adjustment is malformed or violates the policy.
   */
  adjust(symbol: string, quantityDelta: number, cashDelta: number): void {
    if (symbol.length === 0) {
      throw new ReceiverMutationError('portfolio.adjust', 'Symbol must not be empty');
    }
    if (!Number.isInteger(quantityDelta)) {
      throw new ReceiverMutationError(
        'portfolio.adjust',
        `Quantity delta for ${symbol} must be an integer`,
        { symbol, quantityDelta },
      );
    }
    if (!Number.isFinite(cashDelta)) {
      throw new ReceiverMutationError(
        'portfolio.adjust',
        `Cash delta for ${symbol} must be finite`,
        { symbol, cashDelta },
      );
    }

    const nextQuantity = this.position(symbol) + quantityDelta;
    const nextCents = this.balanceCents + toCents(cashDelta);

    if (!this.allowShort && nextQuantity < 0) {
      throw new ReceiverMutationError(
        'portfolio.adjust',
        `Insufficient ${symbol} shares: holding ${this.position(symbol)}, need ${-quantityDelta}`,
        { symbol, held: this.position(symbol), quantityDelta },
      );
    }
    if (!this.allowNegativeCash && nextCents < 0) {
      throw new ReceiverMutationError(
        'portfolio.adjust',
        `Insufficient cash: balance ${this.cash.toFixed(2)}, need ${(-cashDelta).toFixed(2)}`,
        { balance: this.cash, cashDelta },
      );
    }

    if (nextQuantity === 0) {
      this.holdings.delete(symbol);
    } else {
      this.holdings.set(symbol, nextQuantity);
    }
    this.balanceCents = nextCents;
  }
}
