/**
 * @module trade-actions
 * Closed-set trade actions: factories, exhaustive dispatch and validation.
 *
 * Dispatch is a `switch` over `kind` ending in {@link assertNever}, so adding
 * a kind to {@link TradeAction} without handling it fails to compile.
 */

import type { Dispatcher, Ledger, TradeAction, TradeActionKind } from '@trade-ledger/types';
import { ArchiveFormatError, assertNever } from './errors';

/** Display labels keyed by kind. Typed as a full record so every kind must be listed. */
const KIND_LABELS: Record<TradeActionKind, string> = {
  buy: 'BUY',
  sell: 'SELL',
};

/** Every registered action kind. */
export const TRADE_ACTION_KINDS = Object.freeze(
  Object.keys(KIND_LABELS).filter(isTradeActionKind),
);

/** Create a frozen buy action. */
export function buy(symbol: string, quantity: number, price: number): TradeAction {
  return Object.freeze({ kind: 'buy', symbol, quantity, price });
}

/** Create a frozen sell action. */
export function sell(symbol: string, quantity: number, price: number): TradeAction {
  return Object.freeze({ kind: 'sell', symbol, quantity, price });
}

/** Forward mutation: buying spends cash, selling raises it. */
export function applyTrade(action: TradeAction, ledger: Ledger): void {
  const notional = action.quantity * action.price;
  switch (action.kind) {
    case 'buy':
      ledger.adjust(action.symbol, action.quantity, -notional);
      return;
    case 'sell':
      ledger.adjust(action.symbol, -action.quantity, notional);
      return;
    default:
      assertNever(action, 'trade.apply');
  }
}

/** Compensating mutation of {@link applyTrade}. */
export function invertTrade(action: TradeAction, ledger: Ledger): void {
  const notional = action.quantity * action.price;
  switch (action.kind) {
    case 'buy':
      ledger.adjust(action.symbol, -action.quantity, notional);
      return;
    case 'sell':
      ledger.adjust(action.symbol, action.quantity, -notional);
      return;
    default:
      assertNever(action, 'trade.invert');
  }
}

/** e.g. `BUY 100 AAPL @ $185.50` */
export function describeTrade(action: TradeAction): string {
  switch (action.kind) {
    case 'buy':
    case 'sell':
      return `${KIND_LABELS[action.kind]} ${action.quantity} ${action.symbol} @ $${action.price.toFixed(2)}`;
    default:
      return assertNever(action, 'trade.describe');
  }
}

/** Frozen value copy. */
export function copyTrade(action: TradeAction): TradeAction {
  return Object.freeze({ ...action });
}

/** Dispatcher for the closed trade action set. */
export const tradeDispatcher: Dispatcher<TradeAction, Ledger> = {
  apply: applyTrade,
  invert: invertTrade,
  describe: describeTrade,
  copy: copyTrade,
};

/** Type guard for registered kinds. */
export function isTradeActionKind(value: unknown): value is TradeActionKind {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(KIND_LABELS, value);
}

/**
 * Validate untrusted data as a trade action.
 *
 * @throws ArchiveFormatError if the kind is unknown or a parameter is malformed.
 */
export function parseTradeAction(value: unknown): TradeAction {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ArchiveFormatError('Action must be an object');
  }
  const record: Record<string, unknown> = { ...value };
  const { kind, symbol, quantity, price } = record;

  if (!isTradeActionKind(kind)) {
    throw new ArchiveFormatError(`Unknown action kind: ${String(kind)}`);
  }
  if (typeof symbol !== 'string' || symbol.length === 0) {
    throw new ArchiveFormatError('Action symbol must be a non-empty string');
  }
  if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity <= 0) {
    throw new ArchiveFormatError(`Invalid quantity for ${symbol}: ${String(quantity)}`);
  }
  if (typeof price !== 'number' || !Number.isFinite(price) || price < 0) {
    throw new ArchiveFormatError(`Invalid price for ${symbol}: ${String(price)}`);
  }

  switch (kind) {
    case 'buy':
      return buy(symbol, quantity, price);
    case 'sell':
      return sell(symbol, quantity, price);
    default:
      return assertNever(kind, 'trade.parse');
  }
}
