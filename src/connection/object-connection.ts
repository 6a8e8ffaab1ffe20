import { inject, injectable } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import type { ObjectTransportPort } from '../ports/object-transport.port.js';
import type { CallbackCookie } from '../protocol/ids.js';
import { CallbackRegistry } from './callback-registry.js';
import type { PushListener } from './weak-listener.js';

/**
 * One connection to an object server: the transport plus the callback table
 * that multiplexes its push events. Sessions opened on the same container
 * share it.
 */
@injectable()
export class ObjectConnection {
  private readonly callbacks: CallbackRegistry;

  constructor(
    @inject(DI.Ports.Transport) readonly transport: ObjectTransportPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.callbacks = new CallbackRegistry(transport, loggerFactory.create('CallbackRegistry'));
  }

  addCallback(callbackId: number, listener: PushListener): CallbackCookie {
    return this.callbacks.add(callbackId, listener);
  }

  removeCallback(callbackId: number, cookie: CallbackCookie): void {
    this.callbacks.remove(callbackId, cookie);
  }

  removeAllCallbacks(): void {
    this.callbacks.removeAll();
  }

  listenerCount(callbackId: number): number {
    return this.callbacks.listenerCount(callbackId);
  }

  settle(): Promise<void> {
    return this.callbacks.settle();
  }
}
