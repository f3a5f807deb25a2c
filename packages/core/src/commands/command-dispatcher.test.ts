import { describe, it, expect } from 'vitest';
import type { Ledger, TradeCommand } from '@trade-ledger/types';
import { commandDispatcher } from './command-dispatcher';
import { LimitSellCommand } from './limit-sell';
import { MarketBuyCommand } from './market-buy';
import { ActionLog } from '../action-log';
import { Portfolio } from '../portfolio';

/** Third-party command added without touching the closed trade set. */
class DividendCommand implements TradeCommand<Ledger> {
  readonly description: string;

  constructor(
    private readonly symbol: string,
    private readonly amount: number,
  ) {
    this.description = `DIVIDEND ${symbol} $${amount.toFixed(2)}`;
  }

  apply(ledger: Ledger): void {
    ledger.adjust(this.symbol, 0, this.amount);
  }

  invert(ledger: Ledger): void {
    ledger.adjust(this.symbol, 0, -this.amount);
  }

  clone(): DividendCommand {
    return new DividendCommand(this.symbol, this.amount);
  }
}

describe('commandDispatcher', () => {
  it('runs open-set commands through the log', () => {
    const portfolio = new Portfolio(500_000);
    const log = new ActionLog(commandDispatcher<Ledger>());

    log.execute(new MarketBuyCommand('TSLA', 200, 175), portfolio);
    log.execute(new LimitSellCommand('NVDA', 30, 890.5), portfolio);
    log.execute(new DividendCommand('TSLA', 100), portfolio);

    expect(portfolio.cash).toBe(491_815);
    expect(log.auditTrail).toEqual([
      'MARKET BUY 200 TSLA @ $175.00',
      'LIMIT SELL 30 NVDA @ $890.50',
      'DIVIDEND TSLA $100.00',
    ]);

    while (log.undo(portfolio)) {
      // unwind everything
    }
    expect(portfolio.cash).toBe(500_000);
    expect(portfolio.positions()).toEqual({});
  });

  it('snapshots clone every command', () => {
    const portfolio = new Portfolio(500_000);
    const log = new ActionLog(commandDispatcher<Ledger>());
    const original = new MarketBuyCommand('TSLA', 200, 175);
    log.execute(original, portfolio);

    const snap = log.snapshot();
    expect(snap.done).toHaveLength(1);
    expect(snap.done[0]).not.toBe(original);
    expect(snap.done[0].description).toBe(original.description);
  });
});
