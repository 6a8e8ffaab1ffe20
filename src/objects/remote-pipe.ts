import { err, type Result } from 'neverthrow';
import type { ObjectApiError } from '../errors/app-error.js';
import { checked } from './checked-call.js';
import { FileBase } from './file-base.js';

/** Anonymous pipe. Same transfer paths as a file, no name. */
export class RemotePipe extends FileBase {
  readonly kind = 'pipe';

  async create(flags: number, length: number): Promise<Result<this, ObjectApiError>> {
    await this.release();
    const sessionId = this.session.requireSessionId('create pipe');

    const created = await checked(this.transport.createPipe(flags, length, sessionId), 'Could not create pipe object');
    if (created.isErr()) return err(created.error);

    return this.adopt(created.value.fileId, true);
  }
}
