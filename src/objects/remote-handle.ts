import { ok, err, type Result } from 'neverthrow';
import type { z } from 'zod';
import type { Logger } from '../core/logging/index.js';
import type { CallbackCookie, ObjectId } from '../protocol/ids.js';
import type { CallbackId } from '../protocol/constants.js';
import type { ObjectTransportPort } from '../ports/object-transport.port.js';
import type { ObjectSession } from '../session/object-session.js';
import { WeakListener } from '../connection/weak-listener.js';
import { MisuseError, type ObjectApiError } from '../errors/app-error.js';
import { ObjectReleaser } from './object-releaser.js';

/**
 * `owned`: the receiving handle attached or allocated it and releases it when
 * the field is replaced or reset. `borrowed`: supplied by the caller, who keeps
 * responsibility for it.
 */
export type Ownership = 'owned' | 'borrowed';

interface Subscription {
  readonly callbackId: CallbackId;
  readonly cookie: CallbackCookie;
  readonly listener: { dispose(): void };
}

/**
 * Client-side representative of one server object.
 *
 * Lifecycle: unattached -> attach -> attached -> detach -> unattached.
 * `release()` works from either state (no-op when unattached).
 *
 * While attached, the handle owns one server reference and an armed
 * {@link ObjectReleaser}. Detach disarms it; dispose fires it; if the handle is
 * collected while still attached the session's finalization registry fires it.
 *
 * Subclasses keep their fields in property initializers and restore the same
 * values in `resetFields()`.
 */
export abstract class RemoteHandle {
  private _objectId: ObjectId | null = null;
  private releaser: ObjectReleaser | null = null;
  private readonly owned = new Set<RemoteHandle>();
  private subscriptions: Subscription[] = [];

  constructor(readonly session: ObjectSession) {}

  /** Noun used in messages ("string", "file", ...). */
  abstract readonly kind: string;

  /** Re-reads every field from the server. */
  abstract update(): Promise<Result<void, ObjectApiError>>;

  /** Restores every field to its unattached value. */
  protected abstract resetFields(): void;

  /** Subscribe to push events here, through {@link listen}. */
  protected attachCallbacks(): void {}

  /** Extra teardown after subscriptions are dropped (pending async slots, ...). */
  protected detachCallbacks(): void {}

  get objectId(): ObjectId | null {
    return this._objectId;
  }

  get isAttached(): boolean {
    return this._objectId !== null;
  }

  protected get transport(): ObjectTransportPort {
    return this.session.transport;
  }

  protected get logger(): Logger {
    return this.session.handleLogger;
  }

  protected requireObjectId(action: string): ObjectId {
    if (this._objectId === null) {
      throw new MisuseError(`Cannot ${action} unattached ${this.kind} object`);
    }
    return this._objectId;
  }

  /**
   * Binds this handle to `objectId`, releasing whatever it held before.
   *
   * When the refresh fails the handle ends up unattached and the error is
   * returned; `objectId` then still belongs to the caller.
   */
  async attach(objectId: ObjectId, refresh = true): Promise<Result<this, ObjectApiError>> {
    await this.release();
    this.bind(objectId);

    if (!refresh) return ok(this);

    const updated = await this.update();
    if (updated.isErr()) {
      this.teardown(true);
      return err(updated.error);
    }
    return ok(this);
  }

  /**
   * Unbinds without telling the server and hands the id back, e.g. to re-wrap
   * it in a more specific handle.
   */
  detach(): ObjectId {
    return this.teardown(true);
  }

  async release(): Promise<void> {
    if (this._objectId === null) return;
    const objectId = this.teardown(true);
    await this.session.releaseObject(objectId);
  }

  /** Deterministic counterpart of collection: fires the armed guard. */
  async dispose(): Promise<void> {
    const releaser = this.releaser;
    if (this._objectId === null || releaser === null) return;
    this.teardown(false);
    await releaser.fire();
  }

  /**
   * Attach `objectId` freshly returned by an allocating call; on failure the
   * id is released here since nobody else holds it.
   */
  protected async adopt(objectId: ObjectId, refresh: boolean): Promise<Result<this, ObjectApiError>> {
    const attached = await this.attach(objectId, refresh);
    if (attached.isErr()) {
      await this.session.releaseObject(objectId);
    }
    return attached;
  }

  /**
   * Field replacement with ownership bookkeeping: an owned `previous` is
   * released, an owned `next` is recorded.
   */
  protected replaceChild<T extends RemoteHandle>(previous: T | null, next: T | null, ownership: Ownership): T | null {
    if (previous !== null && previous !== next && this.owned.delete(previous)) {
      this.session.track(previous.release());
    }
    if (next !== null && ownership === 'owned') {
      this.owned.add(next);
    }
    return next;
  }

  protected own<T extends RemoteHandle>(child: T): T {
    this.owned.add(child);
    return child;
  }

  /**
   * Subscribes to `callbackId` for as long as this handle stays attached.
   *
   * `handler` receives the handle as an argument and must not close over it;
   * payloads that do not match `schema` are logged and dropped.
   */
  protected listen<S extends z.ZodTypeAny>(
    callbackId: CallbackId,
    schema: S,
    handler: (owner: this, payload: z.output<S>) => void | Promise<void>
  ): void {
    const listener = new WeakListener<this>(this, (owner, args) => {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        owner.logger.warn({ callbackId, issues: parsed.error.issues.length }, 'malformed push event dropped');
        return;
      }
      return handler(owner, parsed.data);
    });

    const cookie = this.session.connection.addCallback(callbackId, listener);
    this.subscriptions.push({ callbackId, cookie, listener });
  }

  private bind(objectId: ObjectId): void {
    const releaser = new ObjectReleaser(this.session, objectId);
    this._objectId = objectId;
    this.releaser = releaser;
    this.session.watch(this, releaser);
    this.attachCallbacks();
  }

  private teardown(disarm: boolean): ObjectId {
    const objectId = this.requireObjectId('detach');

    for (const { callbackId, cookie, listener } of this.subscriptions) {
      listener.dispose();
      this.session.connection.removeCallback(callbackId, cookie);
    }
    this.subscriptions = [];
    this.detachCallbacks();

    if (this.releaser !== null) {
      if (disarm) this.releaser.disarm();
      this.session.unwatch(this.releaser);
      this.releaser = null;
    }

    this._objectId = null;
    this.resetFields();

    for (const child of this.owned) {
      this.session.track(child.release());
    }
    this.owned.clear();

    return objectId;
  }
}
