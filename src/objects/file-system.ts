import { ok, err, type Result } from 'neverthrow';
import type { ObjectSession } from '../session/object-session.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { checked } from './checked-call.js';
import { attachOrRelease } from './attach-or-release.js';
import { RemoteString } from './remote-string.js';
import { withStringArgument, type StringArgument } from './string-argument.js';

export interface FileInfo {
  /** One of `FileType`. */
  readonly type: number;
  readonly permissions: number;
  readonly uid: number;
  readonly gid: number;
  readonly length: number;
  readonly accessTime: number;
  readonly modificationTime: number;
  readonly statusChangeTime: number;
}

/** Metadata for the path `name`, without opening it. */
export async function lookupFileInfo(
  session: ObjectSession,
  name: StringArgument,
  followSymlink: boolean
): Promise<Result<FileInfo, ObjectApiError>> {
  const sessionId = session.requireSessionId('look up file info');

  const info = await withStringArgument(session, name, (nameStringId) =>
    checked(session.transport.lookupFileInfo(nameStringId, followSymlink, sessionId), 'Could not lookup file info')
  );
  if (info.isErr()) return err(info.error);

  const { type, permissions, uid, gid, length, accessTime, modificationTime, statusChangeTime } = info.value;
  return ok({ type, permissions, uid, gid, length, accessTime, modificationTime, statusChangeTime });
}

export async function lookupSymlinkTarget(
  session: ObjectSession,
  name: StringArgument,
  canonicalize: boolean
): Promise<Result<RemoteString, ObjectApiError>> {
  const sessionId = session.requireSessionId('look up symlink target');

  const target = await withStringArgument(session, name, (nameStringId) =>
    checked(
      session.transport.lookupSymlinkTarget(nameStringId, canonicalize, sessionId),
      'Could not lookup symlink target'
    )
  );
  if (target.isErr()) return err(target.error);

  return attachOrRelease(new RemoteString(session), target.value.targetStringId);
}

export async function createDirectory(
  session: ObjectSession,
  name: StringArgument,
  flags: number,
  permissions: number,
  uid: number,
  gid: number
): Promise<Result<void, ObjectApiError>> {
  const created = await withStringArgument(session, name, (nameStringId) =>
    checked(session.transport.createDirectory(nameStringId, flags, permissions, uid, gid), 'Could not create directory')
  );
  return created.map(() => undefined);
}
