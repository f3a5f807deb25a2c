/**
 * @module errors
 * Typed error classes. Each carries a stable `code` and the `op` that failed.
 */

/** Base class for all trade-ledger errors. */
export class TradeLedgerError extends Error {
  readonly code: string;
  readonly op: string;

  constructor(code: string, op: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.op = op;
  }
}

/**
 * A broken invariant: an action kind no dispatcher handles, or an inverse
 * requested outside the log protocol. Never caught by the log.
 */
export class ProgrammingError extends TradeLedgerError {
  constructor(op: string, message: string) {
    super('E_PROGRAMMING', op, message);
  }
}

/** The receiver refused a mutation; nothing was changed. */
export class ReceiverMutationError extends TradeLedgerError {
  readonly details?: Record<string, unknown>;

  constructor(op: string, message: string, details?: Record<string, unknown>) {
    super('E_RECEIVER_REJECTED', op, message);
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      this.details = details;
    }
  }
}

/** An audit-trail archive could not be read. */
export class ArchiveFormatError extends TradeLedgerError {
  constructor(message: string) {
    super('E_ARCHIVE_FORMAT', 'archive.import', message);
  }
}

/**
 * Exhaustiveness guard for closed unions. Statically unreachable; throws
 * when untyped data slips an unknown discriminant past the type system.
 */
export function assertNever(value: never, op: string): never {
  throw new ProgrammingError(op, `Unhandled action kind: ${JSON.stringify(value)}`);
}
