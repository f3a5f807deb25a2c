/**
 * @module commands/command-dispatcher
 * Dispatcher for open-set {@link TradeCommand}s.
 */

import type { Dispatcher, TradeCommand } from '@trade-ledger/types';

/**
 * Route log operations to the command's own capabilities. `copy` uses
 * `clone()`, so snapshots of an open-set log never share command instances.
 */
export function commandDispatcher<R>(): Dispatcher<TradeCommand<R>, R> {
  return {
    apply: (command, receiver) => command.apply(receiver),
    invert: (command, receiver) => command.invert(receiver),
    describe: (command) => command.description,
    copy: (command) => command.clone(),
  };
}
