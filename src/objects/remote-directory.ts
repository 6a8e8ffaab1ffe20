import { ok, err, type Result } from 'neverthrow';
import { ErrorCode, isSuccess } from '../protocol/error-codes.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { checked } from './checked-call.js';
import { attachOrRelease } from './attach-or-release.js';
import { RemoteHandle } from './remote-handle.js';
import { RemoteString } from './remote-string.js';
import { withStringArgument, type StringArgument } from './string-argument.js';

export interface DirectoryEntry {
  readonly name: RemoteString;
  /** One of `DirectoryEntryType`. */
  readonly type: number;
}

export class RemoteDirectory extends RemoteHandle {
  readonly kind = 'directory';

  private _name: RemoteString | null = null;
  private _entries: readonly DirectoryEntry[] | null = null;

  get name(): RemoteString | null {
    return this._name;
  }

  get entries(): readonly DirectoryEntry[] | null {
    return this._entries;
  }

  protected resetFields(): void {
    this._name = null;
    this._entries = null;
  }

  /** Name, then a full listing from the start (the directory is rewound). */
  async update(): Promise<Result<void, ObjectApiError>> {
    const directoryId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update directory');

    const named = await checked(
      this.transport.getDirectoryName(directoryId, sessionId),
      `Could not get name of directory object ${directoryId}`
    );
    if (named.isErr()) return err(named.error);

    const name = await attachOrRelease(new RemoteString(this.session), named.value.nameStringId);
    if (name.isErr()) return err(name.error);
    this._name = this.replaceChild(this._name, name.value, 'owned');

    const rewound = await checked(
      this.transport.rewindDirectory(directoryId),
      `Could not rewind directory object ${directoryId}`
    );
    if (rewound.isErr()) return err(rewound.error);

    const entries: DirectoryEntry[] = [];
    const abort = async (error: ObjectApiError): Promise<Result<void, ObjectApiError>> => {
      await Promise.all(entries.map((entry) => entry.name.release()));
      return err(error);
    };

    for (;;) {
      const next = await this.transport.getNextDirectoryEntry(directoryId, sessionId);
      const message = `Could not get next entry of directory object ${directoryId}`;
      if (next.isErr()) return abort(Err.transportFailed(message, next.error));

      const { errorCode, nameStringId, type } = next.value;
      if (errorCode === ErrorCode.NO_MORE_DATA) break;
      if (!isSuccess(errorCode)) return abort(Err.remote(message, errorCode));

      const entryName = await attachOrRelease(new RemoteString(this.session), nameStringId);
      if (entryName.isErr()) return abort(entryName.error);
      entries.push({ name: entryName.value, type });
    }

    for (const previous of this._entries ?? []) this.replaceChild(previous.name, null, 'owned');
    for (const entry of entries) this.own(entry.name);
    this._entries = entries;
    return ok(undefined);
  }

  async open(name: StringArgument): Promise<Result<this, ObjectApiError>> {
    await this.release();
    const sessionId = this.session.requireSessionId('open directory');

    const opened = await withStringArgument(this.session, name, (nameStringId) =>
      checked(this.transport.openDirectory(nameStringId, sessionId), 'Could not open directory object')
    );
    if (opened.isErr()) return err(opened.error);

    return this.adopt(opened.value.directoryId, true);
  }
}
