import { ok, err, type Result } from 'neverthrow';
import type { ObjectId } from '../protocol/ids.js';
import { FileType } from '../protocol/constants.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { checked } from './checked-call.js';
import { attachOrRelease } from './attach-or-release.js';
import { FileBase } from './file-base.js';
import { RemoteString } from './remote-string.js';
import { withStringArgument, type StringArgument } from './string-argument.js';

export class RemoteFile extends FileBase {
  readonly kind = 'file';

  private _name: RemoteString | null = null;

  get name(): RemoteString | null {
    return this._name;
  }

  protected override resetFields(): void {
    super.resetFields();
    this._name = null;
  }

  protected override async adoptName(type: number, nameStringId: ObjectId): Promise<Result<void, ObjectApiError>> {
    if (type === FileType.PIPE) {
      this._name = this.replaceChild(this._name, null, 'owned');
      return super.adoptName(type, nameStringId);
    }

    const name = await attachOrRelease(new RemoteString(this.session), nameStringId);
    if (name.isErr()) return err(name.error);

    this._name = this.replaceChild(this._name, name.value, 'owned');
    return ok(undefined);
  }

  /**
   * Opens (or creates, with `FileFlag.CREATE`) the file at `name` and attaches
   * to it. Anything held before is released first.
   */
  async open(
    name: StringArgument,
    flags: number,
    permissions: number,
    uid: number,
    gid: number
  ): Promise<Result<this, ObjectApiError>> {
    await this.release();
    const sessionId = this.session.requireSessionId('open file');

    const opened = await withStringArgument(this.session, name, (nameStringId) =>
      checked(this.transport.openFile(nameStringId, flags, permissions, uid, gid, sessionId), 'Could not open file object')
    );
    if (opened.isErr()) return err(opened.error);

    return this.adopt(opened.value.fileId, true);
  }
}
