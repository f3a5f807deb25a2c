import { describe, it, expect, vi } from 'vitest';
import { attachHistoryReporter } from './history-reporter';
import { EventBusImpl } from './event-bus';
import { ActionLog } from './action-log';
import { Portfolio } from './portfolio';
import { buy, sell, tradeDispatcher } from './trade-actions';

function setup() {
  const events = new EventBusImpl();
  const sink = { log: vi.fn(), error: vi.fn() };
  const detach = attachHistoryReporter(events, sink);
  const log = new ActionLog(tradeDispatcher, { events });
  return { events, sink, detach, log };
}

describe('attachHistoryReporter', () => {
  it('writes one tagged line per transition', () => {
    const { sink, log } = setup();
    const portfolio = new Portfolio(1_000_000);

    log.execute(buy('AAPL', 100, 185.5), portfolio);
    log.undo(portfolio);
    log.redo(portfolio);
    log.clear();

    expect(sink.log.mock.calls).toEqual([
      ['[ActionLog] EXEC BUY 100 AAPL @ $185.50 (1 recorded)'],
      ['[ActionLog] UNDO BUY 100 AAPL @ $185.50 (0 recorded)'],
      ['[ActionLog] REDO BUY 100 AAPL @ $185.50 (1 recorded)'],
      ['[ActionLog] history cleared'],
    ]);
    expect(sink.error).not.toHaveBeenCalled();
  });

  it('reports rejected mutations on the error channel', () => {
    const { sink, log } = setup();
    const portfolio = new Portfolio(0, { allowShort: false });

    expect(() => log.execute(sell('AAPL', 5, 10), portfolio)).toThrow();
    expect(sink.error).toHaveBeenCalledWith(
      '[ActionLog] execute rejected for SELL 5 AAPL @ $10.00: Insufficient AAPL shares: holding 0, need 5',
    );
    expect(sink.log).not.toHaveBeenCalled();
  });

  it('stops writing once detached', () => {
    const { sink, detach, log } = setup();
    detach();
    log.execute(buy('AAPL', 1, 1), new Portfolio(10));
    expect(sink.log).not.toHaveBeenCalled();
  });
});
