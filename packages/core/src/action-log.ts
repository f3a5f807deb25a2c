/**
 * @module action-log
 * Undoable action log over an external receiver.
 *
 * The log owns two sequences: `done` (applied actions, oldest first) and
 * `undone` (reversed actions, most recently undone last). Actions are pure
 * data and never reference the receiver; the receiver is passed to every
 * call that mutates it.
 *
 * @see {@link @trade-ledger/types#UndoableLog} for the interface contract
 */

import type { Dispatcher, EventBus, UndoableLog } from '@trade-ledger/types';

/** Options for an {@link ActionLog}. */
export interface ActionLogOptions {
  /** Bus that receives `history:*` notifications. Snapshots never inherit it. */
  events?: EventBus;
}

/**
 * Concrete implementation of {@link UndoableLog}.
 *
 * Bookkeeping only changes after the receiver mutation succeeded: if
 * `apply`/`invert` throws, both sequences are left exactly as they were and
 * the error propagates to the caller.
 *
 * History is unbounded. Evicting the oldest action would make the done
 * sequence stop reproducing the receiver when replayed from scratch.
 */
export class ActionLog<A, R> implements UndoableLog<A, R>, Iterable<A> {
  private doneStack: A[] = [];
  private undoneStack: A[] = [];
  private readonly dispatcher: Dispatcher<A, R>;
  private readonly events: EventBus | undefined;

  /**
   * @param dispatcher - Forward/inverse behavior for the action type.
   * @param options    - Optional event bus.
   */
  constructor(dispatcher: Dispatcher<A, R>, options: ActionLogOptions = {}) {
    this.dispatcher = dispatcher;
    this.events = options.events;
  }

  /**
   * Build a log with pre-populated sequences (e.g. from an archive).
   * The sequences are copied; the receiver is not touched.
   */
  static from<A, R>(
    dispatcher: Dispatcher<A, R>,
    done: readonly A[],
    undone: readonly A[] = [],
    options: ActionLogOptions = {},
  ): ActionLog<A, R> {
    const log = new ActionLog(dispatcher, options);
    log.doneStack = done.map((action) => dispatcher.copy(action));
    log.undoneStack = undone.map((action) => dispatcher.copy(action));
    return log;
  }

  get length(): number {
    return this.doneStack.length;
  }

  /** Same as {@link length}: position of the cursor in {@link entries}. */
  get currentIndex(): number {
    return this.doneStack.length;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.doneStack.length > 0;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this.undoneStack.length > 0;
  }

  /** @inheritdoc */
  get undoDescription(): string | null {
    return this.describeTop(this.doneStack);
  }

  /** @inheritdoc */
  get redoDescription(): string | null {
    return this.describeTop(this.undoneStack);
  }

  /** @inheritdoc */
  get done(): readonly A[] {
    return [...this.doneStack];
  }

  /** @inheritdoc */
  get undone(): readonly A[] {
    return [...this.undoneStack];
  }

  /** @inheritdoc */
  get auditTrail(): string[] {
    return this.doneStack.map((action) => this.dispatcher.describe(action));
  }

  /**
   * Descriptions along the whole current path: done, then undone in
   * redo order. {@link currentIndex} marks how many are applied.
   */
  get entries(): string[] {
    return [...this.doneStack, ...[...this.undoneStack].reverse()].map((action) =>
      this.dispatcher.describe(action),
    );
  }

  [Symbol.iterator](): Iterator<A> {
    return this.done[Symbol.iterator]();
  }

  /** @inheritdoc */
  execute(action: A, receiver: R): void {
    // The caller keeps its own object; done holds a copy it cannot reach.
    const recorded = this.dispatcher.copy(action);
    this.guard('execute', recorded, () => this.dispatcher.apply(recorded, receiver));
    this.doneStack.push(recorded);
    this.undoneStack = [];
    this.notify('history:executed', recorded);
  }

  /** @inheritdoc */
  undo(receiver: R): boolean {
    if (this.doneStack.length === 0) {
      return false;
    }
    const action = this.doneStack[this.doneStack.length - 1];
    this.guard('undo', action, () => this.dispatcher.invert(action, receiver));
    this.doneStack.pop();
    this.undoneStack.push(action);
    this.notify('history:undone', action);
    return true;
  }

  /** @inheritdoc */
  redo(receiver: R): boolean {
    if (this.undoneStack.length === 0) {
      return false;
    }
    const action = this.undoneStack[this.undoneStack.length - 1];
    this.guard('redo', action, () => this.dispatcher.apply(action, receiver));
    this.undoneStack.pop();
    this.doneStack.push(action);
    this.notify('history:redone', action);
    return true;
  }

  /**
   * Independent copy of both sequences. The copy has no event bus and no
   * further relationship to this log.
   */
  snapshot(): ActionLog<A, R> {
    return ActionLog.from(this.dispatcher, this.doneStack, this.undoneStack);
  }

  /** @inheritdoc */
  replay(receiver: R): void {
    for (const action of this.doneStack) {
      this.dispatcher.apply(action, receiver);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.doneStack = [];
    this.undoneStack = [];
    this.emitSafely('history:cleared', () => this.events?.emit('history:cleared'));
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private describeTop(stack: readonly A[]): string | null {
    return stack.length > 0 ? this.dispatcher.describe(stack[stack.length - 1]) : null;
  }

  /** Run a receiver mutation, reporting a rejection before rethrowing it. */
  private guard(op: 'execute' | 'undo' | 'redo', action: A, mutate: () => void): void {
    try {
      mutate();
    } catch (error) {
      const rejection = {
        op,
        description: this.dispatcher.describe(action),
        message: error instanceof Error ? error.message : String(error),
      };
      this.emitSafely('history:rejected', () => this.events?.emit('history:rejected', rejection));
      throw error;
    }
  }

  private notify(event: 'history:executed' | 'history:undone' | 'history:redone', action: A): void {
    const payload = { description: this.dispatcher.describe(action), length: this.doneStack.length };
    this.emitSafely(event, () => this.events?.emit(event, payload));
  }

  /**
   * A throwing listener is reported on the console. It never changes the
   * outcome of the call that emitted the event.
   */
  private emitSafely(event: string, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      console.error(
        `[ActionLog] listener failed after ${event}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
