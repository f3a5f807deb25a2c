/**
 * @module archive
 * Audit-trail archive format types.
 */

import type { TradeAction } from './action';

/** Manifest stored as `manifest.json` in the archive ZIP. */
export interface AuditTrailManifest {
  /** Format version for migration support. */
  version: number;
  /** Format identifier. */
  format: 'trade-ledger/audit-trail';
  /** Number of applied actions. */
  done: number;
  /** Number of undone actions. */
  undone: number;
  /** Export timestamp (ISO 8601). */
  exportedAt: string;
}

/** Action sequences stored as `actions.json`. */
export interface AuditTrailActions {
  done: TradeAction[];
  undone: TradeAction[];
}
