/**
 * @module commands/market-buy
 * Open-set command for buying at the market price.
 */

import type { Ledger, TradeCommand } from '@trade-ledger/types';

/**
 * Buys `quantity` shares of `symbol` at `price`.
 * Holds only its parameters; the ledger arrives on each call.
 */
export class MarketBuyCommand implements TradeCommand<Ledger> {
  readonly description: string;

  /**
   * @param symbol   - Instrument to buy.
   * @param quantity - Number of shares.
   * @param price    - Fill price per share.
   */
  constructor(
    readonly symbol: string,
    readonly quantity: number,
    readonly price: number,
  ) {
    this.description = `MARKET BUY ${quantity} ${symbol} @ $${price.toFixed(2)}`;
  }

  /** Add the shares and spend the cash. */
  apply(ledger: Ledger): void {
    ledger.adjust(this.symbol, this.quantity, -this.quantity * this.price);
  }

  /** Remove the shares and refund the cash. */
  invert(ledger: Ledger): void {
    ledger.adjust(this.symbol, -this.quantity, this.quantity * this.price);
  }

  clone(): MarketBuyCommand {
    return new MarketBuyCommand(this.symbol, this.quantity, this.price);
  }
}
