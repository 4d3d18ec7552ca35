/**
 * Event Bus: typed publish/subscribe between the playback core, the
 * sources and display code.
 *
 * Every subscription owns a serial delivery queue. `publish` snapshots the
 * subscriber list, enqueues one delivery per subscriber and returns without
 * waiting, so a slow or re-entrant handler (one that subscribes or publishes
 * itself) never blocks the publisher or another subscriber. A handler that
 * throws or rejects is logged and skipped.
 */

import type { PlayerEvents } from "../types/index.js";
import { SubscriberError } from "./errors.js";
import { createLogger, describeError } from "./logger.js";
import type { Logger } from "./logger.js";

export type EventHandler<T> = (payload: T) => void | Promise<void>;

export interface EventBusOptions {
  /** Pending deliveries allowed per subscriber before events are dropped for it. Default: 100 */
  queueLimit?: number;
  logger?: Logger;
  /** Observes every handler failure after it has been logged. */
  onSubscriberError?: (error: SubscriberError) => void;
}

interface Subscription<T> {
  handler: EventHandler<T>;
  tail: Promise<void>;
  pending: number;
}

export class EventBus<Events extends object = PlayerEvents> {
  private readonly subscriptions: { [K in keyof Events]?: Subscription<Events[K]>[] } = {};
  private readonly inFlight = new Set<Promise<void>>();
  private readonly queueLimit: number;
  private readonly logger: Logger;
  private readonly onSubscriberError?: (error: SubscriberError) => void;

  constructor(options: EventBusOptions = {}) {
    this.queueLimit = options.queueLimit ?? 100;
    this.logger = options.logger ?? createLogger("event-bus");
    this.onSubscriberError = options.onSubscriberError;
  }

  // ── Subscription table ───────────────────────────────────────────

  /** Add `handler` for `eventType`. Subscribing the same handler twice is a no-op. */
  subscribe<K extends keyof Events>(eventType: K, handler: EventHandler<Events[K]>): void {
    const list: Subscription<Events[K]>[] = this.subscriptions[eventType] ?? [];
    if (list.some((sub) => sub.handler === handler)) return;
    list.push({ handler, tail: Promise.resolve(), pending: 0 });
    this.subscriptions[eventType] = list;
  }

  /** Remove `handler`. Deliveries already queued for it still run. */
  unsubscribe<K extends keyof Events>(eventType: K, handler: EventHandler<Events[K]>): boolean {
    const list: Subscription<Events[K]>[] | undefined = this.subscriptions[eventType];
    if (!list) return false;
    const index = list.findIndex((sub) => sub.handler === handler);
    if (index === -1) return false;
    list.splice(index, 1);
    if (list.length === 0) delete this.subscriptions[eventType];
    return true;
  }

  subscriberCount<K extends keyof Events>(eventType: K): number {
    return this.subscriptions[eventType]?.length ?? 0;
  }

  // ── Dispatch ─────────────────────────────────────────────────────

  /**
   * Schedule delivery of `payload` to every current subscriber of
   * `eventType`. Returns the number of deliveries scheduled.
   */
  publish<K extends keyof Events>(eventType: K, payload: Events[K]): number {
    const snapshot: Subscription<Events[K]>[] = [...(this.subscriptions[eventType] ?? [])];
    let scheduled = 0;

    for (const sub of snapshot) {
      if (sub.pending >= this.queueLimit) {
        this.logger.warn(
          { eventType: String(eventType), pending: sub.pending },
          "Subscriber queue full, dropping event",
        );
        continue;
      }
      sub.pending++;
      const delivery = sub.tail.then(() => this.deliver(eventType, sub, payload));
      sub.tail = delivery;
      this.track(delivery);
      scheduled++;
    }

    return scheduled;
  }

  /**
   * Resolve once every queued delivery has run, including deliveries that
   * handlers enqueue while the bus is draining.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  // ── Internal ─────────────────────────────────────────────────────

  private async deliver<K extends keyof Events>(
    eventType: K,
    sub: Subscription<Events[K]>,
    payload: Events[K],
  ): Promise<void> {
    try {
      await sub.handler(payload);
    } catch (err) {
      const error = new SubscriberError(String(eventType), err);
      this.logger.error({ eventType: String(eventType), err: describeError(err) }, error.message);
      this.reportFailure(error);
    } finally {
      sub.pending--;
    }
  }

  private reportFailure(error: SubscriberError): void {
    try {
      this.onSubscriberError?.(error);
    } catch (err) {
      this.logger.error({ err: describeError(err) }, "onSubscriberError hook failed");
    }
  }

  private track(delivery: Promise<void>): void {
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }
}

export type PlayerEventBus = EventBus<PlayerEvents>;
