/**
 * @trade-ledger/core
 *
 * Undoable action log, trade action dispatch and the reference portfolio.
 *
 * @packageDocumentation
 */

// Action log (execute/undo/redo/snapshot)
export { ActionLog } from './action-log';
export type { ActionLogOptions } from './action-log';

// Closed-set trade actions
export {
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

// Open-set commands
export { LimitSellCommand, MarketBuyCommand, commandDispatcher } from './commands';

// Reference receiver
export { Portfolio } from './portfolio';
export type { PortfolioOptions } from './portfolio';

// Events & reporting
export { EventBusImpl } from './event-bus';
export { attachHistoryReporter } from './history-reporter';
export type { ReporterSink } from './history-reporter';

// Audit-trail archive
export { ARCHIVE_VERSION, exportLog, importLog } from './log-archive';

// Errors
export {
  ArchiveFormatError,
  ProgrammingError,
  ReceiverMutationError,
  TradeLedgerError,
  assertNever,
} from './errors';
