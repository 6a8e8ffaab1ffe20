import { inject, injectable } from 'tsyringe';
import { ok, err, type Result } from 'neverthrow';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { ValidatedConfig } from '../config/client-config.js';
import type { IntervalTimerPort } from '../ports/interval-timer.port.js';
import type { ObjectTransportPort } from '../ports/object-transport.port.js';
import type { ObjectConnection } from '../connection/object-connection.js';
import type { ObjectId, SessionId } from '../protocol/ids.js';
import { errorCodeName, isSuccess } from '../protocol/error-codes.js';
import { Err } from '../errors/factories.js';
import { MisuseError, type ObjectApiError } from '../errors/app-error.js';
import type { ObjectReleaser } from '../objects/object-releaser.js';

/**
 * Server-side session: id, keep-alive loop, expiry.
 *
 * Invariants:
 * - `sessionId` is set only between a successful `create()` and `expire()`
 * - the keep-alive timer runs exactly while `sessionId` is set
 * - best-effort calls (keep-alive, release, expire) never reject; failures are logged
 *
 * Every best-effort call is tracked until it settles; `settle()` waits for all
 * of them, including asynchronous push-event listeners on the connection.
 */
@injectable()
export class ObjectSession {
  private _sessionId: SessionId | null = null;
  private readonly pending = new Set<Promise<void>>();
  private readonly finalizers: FinalizationRegistry<ObjectReleaser>;
  private readonly logger: Logger;

  /** Shared by every handle opened on this session. */
  readonly handleLogger: Logger;

  constructor(
    @inject(DI.Connection.Object) readonly connection: ObjectConnection,
    @inject(DI.Ports.Timer) private readonly timer: IntervalTimerPort,
    @inject(DI.Config.Client) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('ObjectSession');
    this.handleLogger = loggerFactory.create('RemoteHandle');
    this.finalizers = new FinalizationRegistry((releaser) => {
      this.logger.debug({ objectId: releaser.objectId }, 'handle collected while attached');
      this.track(releaser.fire());
    });
  }

  get transport(): ObjectTransportPort {
    return this.connection.transport;
  }

  get sessionId(): SessionId | null {
    return this._sessionId;
  }

  get isAlive(): boolean {
    return this._sessionId !== null;
  }

  requireSessionId(action: string): SessionId {
    if (this._sessionId === null) {
      throw new MisuseError(`Cannot ${action} without a live session`);
    }
    return this._sessionId;
  }

  /**
   * Expires any previous session, then asks the server for a new one.
   * On failure the session stays expired.
   */
  async create(): Promise<Result<SessionId, ObjectApiError>> {
    await this.expire();

    const { lifetimeS, keepAliveIntervalMs } = this.config.session;
    const response = await this.transport.createSession(lifetimeS);

    if (response.isErr()) {
      return err(Err.transportFailed('Could not create session', response.error));
    }

    const { errorCode, sessionId } = response.value;
    if (!isSuccess(errorCode)) {
      return err(Err.remote('Could not create session', errorCode));
    }

    this._sessionId = sessionId;
    this.timer.start(keepAliveIntervalMs, () => this.track(this.keepAliveTick()));
    this.logger.debug({ sessionId, lifetimeS, keepAliveIntervalMs }, 'session created');

    return ok(sessionId);
  }

  /**
   * One keep-alive round trip. A failure is logged and the loop keeps going;
   * the next tick may well succeed.
   */
  async keepAliveTick(): Promise<void> {
    const sessionId = this._sessionId;
    if (sessionId === null) return;

    const response = await this.transport.keepSessionAlive(sessionId, this.config.session.lifetimeS);

    if (response.isErr()) {
      this.logger.warn({ sessionId, err: response.error }, 'keep-alive failed');
      return;
    }

    const { errorCode } = response.value;
    if (!isSuccess(errorCode)) {
      this.logger.warn({ sessionId, errorCode, codeName: errorCodeName(errorCode) }, 'keep-alive rejected');
    }
  }

  /**
   * Idempotent. Stops the keep-alive loop and drops every callback subscription
   * before telling the server; handles keep their ids but the server frees
   * their objects with the session.
   */
  async expire(): Promise<void> {
    const sessionId = this._sessionId;
    if (sessionId === null) return;

    this.timer.stop();
    this.connection.removeAllCallbacks();
    this._sessionId = null;

    const response = await this.transport.expireSessionUnchecked(sessionId);
    if (response.isErr()) {
      this.logger.warn({ sessionId, err: response.error }, 'expire failed');
      return;
    }
    this.logger.debug({ sessionId }, 'session expired');
  }

  /**
   * Best-effort server release. Skipped once the session is gone, since the
   * server dropped the object with it.
   */
  releaseObject(objectId: ObjectId): Promise<void> {
    const sessionId = this._sessionId;
    if (sessionId === null) {
      this.logger.debug({ objectId }, 'release skipped, session expired');
      return Promise.resolve();
    }

    const released = this.transport.releaseObjectUnchecked(objectId, sessionId).match(
      () => {
        this.logger.trace({ objectId }, 'object released');
      },
      (error) => {
        this.logger.warn({ objectId, err: error }, 'release failed');
      }
    );

    this.track(released);
    return released;
  }

  /** Keeps `task` referenced until it settles; a rejection is logged. */
  track(task: Promise<void>): void {
    const settled: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'background task failed');
      })
      .finally(() => {
        this.pending.delete(settled);
      });
    this.pending.add(settled);
  }

  async settle(): Promise<void> {
    do {
      await Promise.all([...this.pending]);
      await this.connection.settle();
    } while (this.pending.size > 0);
  }

  /** Fires `releaser` if `handle` is collected before it is unwatched. */
  watch(handle: object, releaser: ObjectReleaser): void {
    this.finalizers.register(handle, releaser, releaser);
  }

  unwatch(releaser: ObjectReleaser): void {
    this.finalizers.unregister(releaser);
  }
}
