import type { ObjectId } from '../protocol/ids.js';
import type { ObjectSession } from '../session/object-session.js';

/**
 * Last-chance release guard for one attached object id.
 *
 * Armed on attach. `detach()`/`release()` disarm it; `dispose()` and the
 * session's finalization registry fire it. Fires at most once.
 */
export class ObjectReleaser {
  private armed = true;

  constructor(
    private readonly session: ObjectSession,
    readonly objectId: ObjectId
  ) {}

  get isArmed(): boolean {
    return this.armed;
  }

  disarm(): void {
    this.armed = false;
  }

  fire(): Promise<void> {
    if (!this.armed) return Promise.resolve();
    this.armed = false;
    return this.session.releaseObject(this.objectId);
  }
}
