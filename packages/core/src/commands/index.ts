/**
 * @module commands
 * Re-exports the open-set trade commands.
 */

export { MarketBuyCommand } from './market-buy';
export { LimitSellCommand } from './limit-sell';
export { commandDispatcher } from './command-dispatcher';
