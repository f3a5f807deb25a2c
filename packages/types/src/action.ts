/**
 * @module action
 * Trade actions: immutable, receiver-free descriptions of one reversible
 * mutation of a {@link Ledger}.
 */

/** Fields shared by every trade action. */
interface TradeParams {
  /** Instrument symbol (e.g. "AAPL"). */
  readonly symbol: string;
  /** Number of shares, a positive integer. */
  readonly quantity: number;
  /** Price per share. */
  readonly price: number;
}

/** Buy `quantity` shares of `symbol` at `price`. */
export interface BuyAction extends TradeParams {
  readonly kind: 'buy';
}

/** Sell `quantity` shares of `symbol` at `price`. */
export interface SellAction extends TradeParams {
  readonly kind: 'sell';
}

/** Closed set of trade actions, discriminated by `kind`. */
export type TradeAction = BuyAction | SellAction;

/** Discriminant of {@link TradeAction}. */
export type TradeActionKind = TradeAction['kind'];
