import { describe, it, expect } from 'vitest';
import { LimitSellCommand } from './limit-sell';
import { Portfolio } from '../portfolio';

describe('LimitSellCommand', () => {
  it('describes itself', () => {
    expect(new LimitSellCommand('NVDA', 30, 890.5).description).toBe('LIMIT SELL 30 NVDA @ $890.50');
  });

  it('apply removes shares and raises cash', () => {
    const portfolio = new Portfolio(500_000);
    new LimitSellCommand('NVDA', 30, 890.5).apply(portfolio);
    expect(portfolio.position('NVDA')).toBe(-30);
    expect(portfolio.cash).toBe(526_715);
  });

  it('invert restores the portfolio', () => {
    const portfolio = new Portfolio(500_000);
    const cmd = new LimitSellCommand('NVDA', 30, 890.5);
    cmd.apply(portfolio);
    cmd.invert(portfolio);
    expect(portfolio.positions()).toEqual({});
    expect(portfolio.cash).toBe(500_000);
  });

  it('clone carries the limit price', () => {
    const copy = new LimitSellCommand('NVDA', 30, 890.5).clone();
    expect(copy.limitPrice).toBe(890.5);
    expect(copy.symbol).toBe('NVDA');
    expect(copy.quantity).toBe(30);
  });
});
