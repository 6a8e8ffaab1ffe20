import { err, type Result } from 'neverthrow';
import { NO_OBJECT_ID, type ObjectId } from '../protocol/ids.js';
import { FileType } from '../protocol/constants.js';
import type { ObjectSession } from '../session/object-session.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { checked } from './checked-call.js';
import { attachOrRelease, releaseAll } from './attach-or-release.js';
import { RemoteFile } from './remote-file.js';
import { RemotePipe } from './remote-pipe.js';

/**
 * Wraps an id of object type "file", which may be a regular file or a pipe.
 * One file-info round trip decides; its name string id is dropped here because
 * the wrapping handle fetches its own on refresh.
 */
export async function resolveFileOrPipe(
  session: ObjectSession,
  fileId: ObjectId,
  extraIds: readonly ObjectId[] = []
): Promise<Result<RemoteFile | RemotePipe, ObjectApiError>> {
  const sessionId = session.requireSessionId('resolve file');

  const info = await checked(
    session.transport.getFileInfo(fileId, sessionId),
    `Could not get information for file object ${fileId}`
  );
  if (info.isErr()) {
    await releaseAll(session, [fileId, ...extraIds]);
    return err(info.error);
  }

  if (info.value.nameStringId !== NO_OBJECT_ID) {
    await session.releaseObject(info.value.nameStringId);
  }

  if (info.value.type === FileType.PIPE) {
    return attachOrRelease(new RemotePipe(session), fileId, extraIds);
  }
  return attachOrRelease(new RemoteFile(session), fileId, extraIds);
}
