/**
 * @module commands/limit-sell
 * Open-set command for selling at a limit price.
 */

import type { Ledger, TradeCommand } from '@trade-ledger/types';

/** Sells `quantity` shares of `symbol`, filled at `limitPrice`. */
export class LimitSellCommand implements TradeCommand<Ledger> {
  readonly description: string;

  constructor(
    readonly symbol: string,
    readonly quantity: number,
    readonly limitPrice: number,
  ) {
    this.description = `LIMIT SELL ${quantity} ${symbol} @ $${limitPrice.toFixed(2)}`;
  }

  apply(ledger: Ledger): void {
    ledger.adjust(this.symbol, -this.quantity, this.quantity * this.limitPrice);
  }

  invert(ledger: Ledger): void {
    ledger.adjust(this.symbol, this.quantity, -this.quantity * this.limitPrice);
  }

  clone(): LimitSellCommand {
    return new LimitSellCommand(this.symbol, this.quantity, this.limitPrice);
  }
}
