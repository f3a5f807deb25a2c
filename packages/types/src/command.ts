/**
 * @module command
 * Dispatch and action-log contracts for undo/redo support.
 * Actions carry data only; the receiver is passed explicitly on every call.
 */

/**
 * Maps an action to its forward and compensating mutations.
 *
 * @typeParam A - Action type.
 * @typeParam R - Receiver type.
 */
export interface Dispatcher<A, R> {
  /** Perform the forward mutation of `action` on `receiver`. */
  apply(action: A, receiver: R): void;
  /** Perform the exact compensating mutation of a previously applied `action`. */
  invert(action: A, receiver: R): void;
  /** Human-readable one-line description (for audit trails and menus). */
  describe(action: A): string;
  /** Independent copy of `action`, used when a log is snapshotted. */
  copy(action: A): A;
}

/**
 * Open-set action: anything offering apply/invert/describe plus a deep copy.
 * Used when new action kinds are added outside the closed trade set.
 */
export interface TradeCommand<R> {
  /** Human-readable description of the command. */
  readonly description: string;
  /** Apply the change to the receiver. */
  apply(receiver: R): void;
  /** Reverse the change on the receiver. */
  invert(receiver: R): void;
  /** Return an independent copy of this command. */
  clone(): TradeCommand<R>;
}

/** Undoable log of actions applied to an external receiver. */
export interface UndoableLog<A, R> {
  /** Number of applied actions (size of the audit trail). */
  readonly length: number;
  /** Whether there are actions that can be undone. */
  readonly canUndo: boolean;
  /** Whether there are actions that can be redone. */
  readonly canRedo: boolean;
  /** Description of the next action to undo, or null. */
  readonly undoDescription: string | null;
  /** Description of the next action to redo, or null. */
  readonly redoDescription: string | null;
  /** Applied actions, oldest first. */
  readonly done: readonly A[];
  /** Reversed actions eligible for redo, most recently undone last. */
  readonly undone: readonly A[];
  /** Descriptions of the applied actions in application order. */
  readonly auditTrail: string[];

  /** Apply an action and record it. Clears the redo sequence. */
  execute(action: A, receiver: R): void;
  /** Reverse the most recent action. Returns false when there is nothing to undo. */
  undo(receiver: R): boolean;
  /** Re-apply the most recently undone action. Returns false when there is nothing to redo. */
  redo(receiver: R): boolean;
  /** Independent copy of both sequences. */
  snapshot(): UndoableLog<A, R>;
  /** Apply every recorded action, oldest first, to `receiver`. */
  replay(receiver: R): void;
  /** Clear both sequences. */
  clear(): void;
}
