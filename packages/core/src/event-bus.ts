/**
 * @module event-bus
 * Type-safe pub/sub for action-log notifications.
 *
 * @see {@link @trade-ledger/types#EventBus} for the interface contract
 * @see {@link @trade-ledger/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@trade-ledger/types';

type Listener = (...args: unknown[]) => void;

/** One registration of a callback on one event. */
interface Subscription {
  readonly callback: Listener;
  readonly once: boolean;
  active: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Each event keeps its own ordered list of subscriptions, so the same
 * callback registered with `once` on two events is two independent
 * subscriptions. A subscription removed during an emit is not called for
 * the rest of that emit.
 */
export class EventBusImpl implements EventBus {
  private readonly subscriptions = new Map<keyof EventMap, Subscription[]>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback as Listener, false);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback as Listener, true);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const original = callback as Listener;
    this.remove(event, (sub) => sub.callback === original);
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const subs = this.subscriptions.get(event);
    if (!subs) return;

    for (const sub of [...subs]) {
      if (!sub.active) continue;
      if (sub.once) {
        this.remove(event, (candidate) => candidate === sub);
      }
      sub.callback(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    for (const subs of this.subscriptions.values()) {
      for (const sub of subs) {
        sub.active = false;
      }
    }
    this.subscriptions.clear();
  }

  private subscribe(event: keyof EventMap, callback: Listener, once: boolean): () => void {
    const sub: Subscription = { callback, once, active: true };
    const subs = this.subscriptions.get(event);
    if (subs) {
      subs.push(sub);
    } else {
      this.subscriptions.set(event, [sub]);
    }
    return () => this.remove(event, (candidate) => candidate === sub);
  }

  private remove(event: keyof EventMap, matches: (sub: Subscription) => boolean): void {
    const subs = this.subscriptions.get(event);
    if (!subs) return;

    const kept: Subscription[] = [];
    for (const sub of subs) {
      if (matches(sub)) {
        sub.active = false;
      } else {
        kept.push(sub);
      }
    }
    if (kept.length === 0) {
      this.subscriptions.delete(event);
    } else {
      this.subscriptions.set(event, kept);
    }
  }
}
