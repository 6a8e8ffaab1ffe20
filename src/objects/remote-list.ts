import { ok, err, type Result } from 'neverthrow';
import { MisuseError, type ObjectApiError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { ObjectId } from '../protocol/ids.js';
import { checked } from './checked-call.js';
import { RemoteHandle } from './remote-handle.js';
import { RemoteString } from './remote-string.js';
import { decodeObject, isObjectType, type RemoteObject } from './object-registry.js';

export type ListItemInput = string | RemoteObject;

/**
 * Server list of typed objects. Decoded items are owned by the list; items
 * passed to `allocate` as handles are borrowed.
 */
export class RemoteList extends RemoteHandle {
  readonly kind = 'list';

  private _items: readonly RemoteObject[] | null = null;

  get items(): readonly RemoteObject[] | null {
    return this._items;
  }

  protected resetFields(): void {
    this._items = null;
  }

  /**
   * Decodes every item. If any item fails, the items decoded so far are
   * released and the first error is returned.
   */
  async update(): Promise<Result<void, ObjectApiError>> {
    const listId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update list');

    const length = await checked(this.transport.getListLength(listId), `Could not get length of list object ${listId}`);
    if (length.isErr()) return err(length.error);

    const items: RemoteObject[] = [];
    const abort = async (error: ObjectApiError): Promise<Result<void, ObjectApiError>> => {
      await Promise.all(items.map((item) => item.release()));
      return err(error);
    };

    for (let index = 0; index < length.value.length; index++) {
      const item = await checked(
        this.transport.getListItem(listId, index, sessionId),
        `Could not get item ${index} of list object ${listId}`
      );
      if (item.isErr()) return abort(item.error);

      const { itemObjectId, type } = item.value;
      if (!isObjectType(type)) {
        await this.session.releaseObject(itemObjectId);
        return abort(Err.unexpectedObjectType(listId, index, type));
      }

      const decoded = await decodeObject(this.session, type, itemObjectId);
      if (decoded.isErr()) return abort(decoded.error);
      items.push(decoded.value);
    }

    for (const previous of this._items ?? []) this.replaceChild(previous, null, 'owned');
    for (const item of items) this.own(item);
    this._items = items;
    return ok(undefined);
  }

  /**
   * Allocates a new list. Strings are allocated as owned string objects;
   * handles must be attached and stay owned by the caller.
   */
  async allocate(items: readonly ListItemInput[]): Promise<Result<this, ObjectApiError>> {
    for (const item of items) {
      if (typeof item !== 'string' && !item.isAttached) {
        throw new MisuseError(`Cannot append unattached ${item.kind} object to list`);
      }
    }

    await this.release();
    const sessionId = this.session.requireSessionId('allocate list');

    const allocated = await checked(this.transport.allocateList(items.length, sessionId), 'Could not allocate list object');
    if (allocated.isErr()) return err(allocated.error);

    const { listId } = allocated.value;
    const resolved: RemoteObject[] = [];
    const ownedStrings: RemoteString[] = [];
    const abort = async (error: ObjectApiError): Promise<Result<this, ObjectApiError>> => {
      await Promise.all(ownedStrings.map((s) => s.release()));
      await this.session.releaseObject(listId);
      return err(error);
    };

    for (const item of items) {
      let handle: RemoteObject;
      if (typeof item === 'string') {
        const allocatedString = await new RemoteString(this.session).allocate(item);
        if (allocatedString.isErr()) return abort(allocatedString.error);
        handle = allocatedString.value;
        ownedStrings.push(allocatedString.value);
      } else {
        handle = item;
      }

      const appended = await checked(
        this.transport.appendToList(listId, attachedId(handle)),
        `Could not append item to list object ${listId}`
      );
      if (appended.isErr()) return abort(appended.error);
      resolved.push(handle);
    }

    const attached = await this.adopt(listId, false);
    if (attached.isErr()) return abort(attached.error);

    for (const s of ownedStrings) this.own(s);
    this._items = resolved;
    return ok(this);
  }
}

function attachedId(handle: RemoteObject): ObjectId {
  const objectId = handle.objectId;
  if (objectId === null) {
    throw new MisuseError(`Cannot append unattached ${handle.kind} object to list`);
  }
  return objectId;
}
