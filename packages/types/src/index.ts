/**
 * @trade-ledger/types
 *
 * Shared type definitions for the trade ledger.
 * This package holds no runtime code. Its interfaces and types are the
 * contract shared by the other packages.
 *
 * @packageDocumentation
 */

// Trade actions
export type { BuyAction, SellAction, TradeAction, TradeActionKind } from './action';

// Receiver
export type { Ledger } from './ledger';

// Dispatch & undo/redo log
export type { Dispatcher, TradeCommand, UndoableLog } from './command';

// Events
export type { EventBus, EventCallback, EventMap, HistoryChange } from './events';

// Audit-trail archive
export type { AuditTrailActions, AuditTrailManifest } from './archive';
