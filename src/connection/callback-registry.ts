import type { Logger } from '../core/logging/index.js';
import type { ObjectTransportPort } from '../ports/object-transport.port.js';
import type { CallbackCookie } from '../protocol/ids.js';
import { asCallbackCookie } from '../protocol/ids.js';
import type { PushListener } from './weak-listener.js';

/**
 * Per-callback-id table of push listeners.
 *
 * Locking: every mutation below runs to completion inside one synchronous
 * section. The event loop never interleaves two of them, which gives the same
 * exclusion a mutex would. Listener invocation walks a snapshot, so listeners
 * may add or remove entries (their own included) while being dispatched.
 *
 * The transport is subscribed once per id, when the id's first listener is
 * added. Removing the last listener does not unsubscribe; the trampoline keeps
 * running against an empty set.
 */
export class CallbackRegistry {
  private readonly table = new Map<number, Map<CallbackCookie, PushListener>>();
  private readonly inFlight = new Set<Promise<void>>();
  private nextCookie = 1;

  constructor(
    private readonly transport: ObjectTransportPort,
    private readonly logger: Logger
  ) {}

  add(callbackId: number, listener: PushListener): CallbackCookie {
    const cookie = asCallbackCookie(this.nextCookie++);

    let listeners = this.table.get(callbackId);
    if (!listeners) {
      listeners = new Map();
      this.table.set(callbackId, listeners);
      this.transport.registerCallback(callbackId, (...args: unknown[]) => this.dispatch(callbackId, args));
    }

    listeners.set(cookie, listener);
    return cookie;
  }

  /** Unknown ids and cookies are ignored. */
  remove(callbackId: number, cookie: CallbackCookie): void {
    this.table.get(callbackId)?.delete(cookie);
  }

  /** Forgets every listener. Transport subscriptions stay in place. */
  removeAll(): void {
    for (const listeners of this.table.values()) {
      listeners.clear();
    }
    this.table.clear();
  }

  dispatch(callbackId: number, args: readonly unknown[]): void {
    const listeners = this.table.get(callbackId);
    if (!listeners) {
      this.logger.debug({ callbackId }, 'push event without listeners');
      return;
    }

    const dead: CallbackCookie[] = [];

    for (const [cookie, listener] of [...listeners]) {
      // removed by an earlier listener in this walk
      if (!listeners.has(cookie)) continue;

      if (!listener.alive()) {
        dead.push(cookie);
        continue;
      }

      this.invokeIsolated(callbackId, cookie, listener, args);
    }

    for (const cookie of dead) {
      listeners.delete(cookie);
    }
  }

  listenerCount(callbackId: number): number {
    return this.table.get(callbackId)?.size ?? 0;
  }

  /** Resolves once every asynchronous listener started so far has finished. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private invokeIsolated(
    callbackId: number,
    cookie: CallbackCookie,
    listener: PushListener,
    args: readonly unknown[]
  ): void {
    let outcome: void | Promise<void>;
    try {
      outcome = listener.invoke(args);
    } catch (error) {
      this.logger.error({ err: error, callbackId, cookie }, 'push listener threw');
      return;
    }

    if (outcome instanceof Promise) {
      const settled: Promise<void> = outcome
        .catch((error: unknown) => {
          this.logger.error({ err: error, callbackId, cookie }, 'push listener rejected');
        })
        .finally(() => {
          this.inFlight.delete(settled);
        });
      this.inFlight.add(settled);
    }
  }
}
