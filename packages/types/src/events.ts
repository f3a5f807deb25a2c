/**
 * @module events
 * Type-safe event bus definitions for action-log notifications.
 */

/** Payload of a committed log transition. */
export interface HistoryChange {
  /** Description of the action that moved. */
  description: string;
  /** Size of the done sequence after the transition. */
  length: number;
}

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when an action is executed (appended to done). */
  'history:executed': HistoryChange;
  /** Fired when an action is undone. */
  'history:undone': HistoryChange;
  /** Fired when an action is redone. */
  'history:redone': HistoryChange;
  /** Fired when the receiver rejects a mutation; the log is unchanged. */
  'history:rejected': { op: 'execute' | 'undo' | 'redo'; description: string; message: string };
  /** Fired when both sequences are cleared. */
  'history:cleared': undefined;
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
