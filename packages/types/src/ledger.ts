/**
 * @module ledger
 * Receiver contract: the mutable state trade actions are applied to.
 * The caller owns the ledger and passes it to every log operation.
 */

/** Minimal adjust/query surface a trade action needs. */
export interface Ledger {
  /** Current cash balance. */
  readonly cash: number;

  /** Shares held for `symbol`; 0 when none. */
  position(symbol: string): number;

  /** All non-zero positions keyed by symbol. */
  positions(): Record<string, number>;

  /**
   * Adjust a position and the cash balance in one step.
   * Either both change or, when the ledger rejects the mutation, neither does.
   */
  adjust(symbol: string, quantityDelta: number, cashDelta: number): void;
}
