import { ok, err, type Result } from 'neverthrow';
import type { ObjectId } from '../protocol/ids.js';
import type { ObjectSession } from '../session/object-session.js';
import type { ObjectApiError } from '../errors/app-error.js';
import type { RemoteHandle } from './remote-handle.js';

export async function releaseAll(session: ObjectSession, objectIds: readonly ObjectId[]): Promise<void> {
  await Promise.all(objectIds.map((objectId) => session.releaseObject(objectId)));
}

/**
 * Attaches `handle` to `objectId` and refreshes it. On failure, `objectId` and
 * `extraIds` (ids from the same reply not yet wrapped) are released and the
 * original error is returned.
 */
export async function attachOrRelease<T extends RemoteHandle>(
  handle: T,
  objectId: ObjectId,
  extraIds: readonly ObjectId[] = []
): Promise<Result<T, ObjectApiError>> {
  const attached = await handle.attach(objectId);
  if (attached.isErr()) {
    await releaseAll(handle.session, [objectId, ...extraIds]);
    return err(attached.error);
  }
  return ok(handle);
}

/**
 * Wraps the ids of one multi-field reply (a command, a stdio triple, ...)
 * one at a time. A failure anywhere releases everything from the reply: the
 * handles attached so far and the ids not yet reached.
 */
export class AttachBatch {
  private readonly pending: ObjectId[];
  private readonly attached: RemoteHandle[] = [];

  constructor(
    private readonly session: ObjectSession,
    objectIds: readonly ObjectId[]
  ) {
    this.pending = [...objectIds];
  }

  async attach<T extends RemoteHandle>(handle: T, objectId: ObjectId): Promise<Result<T, ObjectApiError>> {
    const index = this.pending.indexOf(objectId);
    if (index >= 0) this.pending.splice(index, 1);

    const extras = this.pending.splice(0);
    const result = await attachOrRelease(handle, objectId, extras);
    if (result.isErr()) {
      await this.releaseAttached();
      return err(result.error);
    }

    this.pending.push(...extras);
    this.attached.push(handle);
    return ok(handle);
  }

  /** Drops the reply id without wrapping it (e.g. an unused name string). */
  async skip(objectId: ObjectId): Promise<void> {
    const index = this.pending.indexOf(objectId);
    if (index < 0) return;
    this.pending.splice(index, 1);
    await this.session.releaseObject(objectId);
  }

  /** Releases everything from the reply; for failures between attaches. */
  async abort(): Promise<void> {
    await releaseAll(this.session, this.pending.splice(0));
    await this.releaseAttached();
  }

  private async releaseAttached(): Promise<void> {
    const handles = this.attached.splice(0);
    await Promise.all(handles.map((handle) => handle.release()));
  }
}
