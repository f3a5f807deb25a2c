/**
 * @module history-reporter
 * Writes action-log notifications to a console-like sink.
 */

import type { EventBus, HistoryChange } from '@trade-ledger/types';

/** The part of `console` the reporter writes to. */
export type ReporterSink = Pick<Console, 'log' | 'error'>;

const TAG = '[ActionLog]';

function line(verb: string, change: HistoryChange): string {
  return `${TAG} ${verb} ${change.description} (${change.length} recorded)`;
}

/**
 * Subscribe a reporter to every `history:*` event on `bus`.
 *
 * @returns A function that detaches the reporter.
 */
export function attachHistoryReporter(bus: EventBus, sink: ReporterSink = console): () => void {
  const unsubscribers = [
    bus.on('history:executed', (change) => sink.log(line('EXEC', change))),
    bus.on('history:undone', (change) => sink.log(line('UNDO', change))),
    bus.on('history:redone', (change) => sink.log(line('REDO', change))),
    bus.on('history:cleared', () => sink.log(`${TAG} history cleared`)),
    bus.on('history:rejected', ({ op, description, message }) =>
      sink.error(`${TAG} ${op} rejected for ${description}: ${message}`),
    ),
  ];
  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
