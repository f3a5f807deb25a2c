import { describe, it, expect, vi } from 'vitest';
import type { Ledger, TradeAction } from '@trade-ledger/types';
import {
  TRADE_ACTION_KINDS,
  applyTrade,
  buy,
  copyTrade,
  describeTrade,
  invertTrade,
  isTradeActionKind,
  parseTradeAction,
  sell,
  tradeDispatcher,
} from './trade-actions';
import { ArchiveFormatError, ProgrammingError } from './errors';
import { Portfolio } from './portfolio';

/** Ledger whose adjust is a spy. */
function spyLedger(): Ledger & { adjust: ReturnType<typeof vi.fn> } {
  return {
    cash: 0,
    position: () => 0,
    positions: () => ({}),
    adjust: vi.fn(),
  };
}

describe('trade action factories', () => {
  it('creates frozen plain data', () => {
    const action = buy('AAPL', 100, 185.5);
    expect(action).toEqual({ kind: 'buy', symbol: 'AAPL', quantity: 100, price: 185.5 });
    expect(Object.isFrozen(action)).toBe(true);
    expect(Object.isFrozen(sell('AAPL', 1, 1))).toBe(true);
  });

  it('copies by value', () => {
    const action = sell('MSFT', 75, 420);
    const copy = copyTrade(action);
    expect(copy).toEqual(action);
    expect(copy).not.toBe(action);
    expect(Object.isFrozen(copy)).toBe(true);
  });
});

describe('applyTrade / invertTrade', () => {
  it('buy adds shares and spends cash', () => {
    const ledger = spyLedger();
    applyTrade(buy('AAPL', 100, 185.5), ledger);
    expect(ledger.adjust).toHaveBeenCalledWith('AAPL', 100, -18550);
  });

  it('sell removes shares and raises cash', () => {
    const ledger = spyLedger();
    applyTrade(sell('AAPL', 50, 190), ledger);
    expect(ledger.adjust).toHaveBeenCalledWith('AAPL', -50, 9500);
  });

  it('invert compensates a buy', () => {
    const ledger = spyLedger();
    invertTrade(buy('GOOGL', 50, 140.25), ledger);
    expect(ledger.adjust).toHaveBeenCalledWith('GOOGL', -50, 7012.5);
  });

  it('invert compensates a sell', () => {
    const ledger = spyLedger();
    invertTrade(sell('MSFT', 75, 420), ledger);
    expect(ledger.adjust).toHaveBeenCalledWith('MSFT', 75, -31500);
  });

  it('apply then invert restores a portfolio', () => {
    const portfolio = new Portfolio(500_000);
    const actions: TradeAction[] = [buy('TSLA', 200, 175), sell('NVDA', 30, 890.5)];
    for (const action of actions) {
      applyTrade(action, portfolio);
      invertTrade(action, portfolio);
    }
    expect(portfolio.cash).toBe(500_000);
    expect(portfolio.positions()).toEqual({});
  });

  it('throws ProgrammingError for an unknown kind smuggled past the types', () => {
    const bogus = JSON.parse('{"kind":"short","symbol":"X","quantity":1,"price":1}');
    expect(() => applyTrade(bogus, spyLedger())).toThrow(ProgrammingError);
    expect(() => invertTrade(bogus, spyLedger())).toThrow(ProgrammingError);
    expect(() => describeTrade(bogus)).toThrow('Unhandled action kind');
  });
});

describe('describeTrade', () => {
  it('formats price with two decimals', () => {
    expect(describeTrade(buy('AAPL', 100, 185.5))).toBe('BUY 100 AAPL @ $185.50');
    expect(describeTrade(sell('AAPL', 50, 190))).toBe('SELL 50 AAPL @ $190.00');
  });
});

describe('kind registry', () => {
  it('lists every kind', () => {
    expect([...TRADE_ACTION_KINDS].sort()).toEqual(['buy', 'sell']);
  });

  it('recognises registered kinds only', () => {
    expect(isTradeActionKind('buy')).toBe(true);
    expect(isTradeActionKind('sell')).toBe(true);
    expect(isTradeActionKind('short')).toBe(false);
    expect(isTradeActionKind('toString')).toBe(false);
    expect(isTradeActionKind(42)).toBe(false);
  });

  it('has a dispatcher entry for each operation', () => {
    expect(tradeDispatcher.apply).toBe(applyTrade);
    expect(tradeDispatcher.invert).toBe(invertTrade);
    expect(tradeDispatcher.describe).toBe(describeTrade);
    expect(tradeDispatcher.copy).toBe(copyTrade);
  });
});

describe('parseTradeAction', () => {
  it('accepts a valid action and freezes it', () => {
    const parsed = parseTradeAction({ kind: 'sell', symbol: 'AAPL', quantity: 50, price: 190 });
    expect(parsed).toEqual(sell('AAPL', 50, 190));
    expect(Object.isFrozen(parsed)).toBe(true);
  });

  it('drops unknown extra fields', () => {
    const parsed = parseTradeAction({ kind: 'buy', symbol: 'A', quantity: 1, price: 2, note: 'x' });
    expect(parsed).toEqual({ kind: 'buy', symbol: 'A', quantity: 1, price: 2 });
  });

  it.each([
    { input: null, message: 'Action must be an object' },
    { input: [], message: 'Action must be an object' },
    { input: { kind: 'short', symbol: 'A', quantity: 1, price: 1 }, message: 'Unknown action kind: short' },
    { input: { kind: 'buy', symbol: '', quantity: 1, price: 1 }, message: 'Action symbol must be a non-empty string' },
    { input: { kind: 'buy', symbol: 'A', quantity: 1.5, price: 1 }, message: 'Invalid quantity for A: 1.5' },
    { input: { kind: 'buy', symbol: 'A', quantity: 0, price: 1 }, message: 'Invalid quantity for A: 0' },
    { input: { kind: 'buy', symbol: 'A', quantity: 1, price: -1 }, message: 'Invalid price for A: -1' },
    { input: { kind: 'buy', symbol: 'A', quantity: 1, price: '1' }, message: 'Invalid price for A: 1' },
  ])('rejects input: $message', ({ input, message }) => {
    expect(() => parseTradeAction(input)).toThrow(ArchiveFormatError);
    expect(() => parseTradeAction(input)).toThrow(message);
  });
});
