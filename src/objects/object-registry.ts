import type { Result } from 'neverthrow';
import type { ObjectId } from '../protocol/ids.js';
import { ObjectType } from '../protocol/constants.js';
import type { ObjectSession } from '../session/object-session.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { attachOrRelease } from './attach-or-release.js';
import { RemoteString } from './remote-string.js';
import { RemoteList } from './remote-list.js';
import type { RemoteFile } from './remote-file.js';
import type { RemotePipe } from './remote-pipe.js';
import { resolveFileOrPipe } from './file-or-pipe.js';
import { RemoteDirectory } from './remote-directory.js';
import { RemoteProcess } from './remote-process.js';
import { RemoteProgram } from './remote-program.js';

export type RemoteObject =
  | RemoteString
  | RemoteList
  | RemoteFile
  | RemotePipe
  | RemoteDirectory
  | RemoteProcess
  | RemoteProgram;

/**
 * Wraps an id of a known type into a refreshed handle. On failure `objectId`
 * and `extraIds` are released.
 */
export type ObjectDecoder = (
  session: ObjectSession,
  objectId: ObjectId,
  extraIds: readonly ObjectId[]
) => Promise<Result<RemoteObject, ObjectApiError>>;

// Handle classes are only touched when a decoder runs, after every module
// in the cycle (list <-> registry) has finished loading.
const DECODERS = {
  [ObjectType.STRING]: (session, objectId, extraIds) => attachOrRelease(new RemoteString(session), objectId, extraIds),
  [ObjectType.LIST]: (session, objectId, extraIds) => attachOrRelease(new RemoteList(session), objectId, extraIds),
  [ObjectType.FILE]: (session, objectId, extraIds) => resolveFileOrPipe(session, objectId, extraIds),
  [ObjectType.DIRECTORY]: (session, objectId, extraIds) =>
    attachOrRelease(new RemoteDirectory(session), objectId, extraIds),
  [ObjectType.PROCESS]: (session, objectId, extraIds) => attachOrRelease(new RemoteProcess(session), objectId, extraIds),
  [ObjectType.PROGRAM]: (session, objectId, extraIds) => attachOrRelease(new RemoteProgram(session), objectId, extraIds),
} as const satisfies Record<ObjectType, ObjectDecoder>;

const KNOWN_TYPES: ReadonlySet<number> = new Set(Object.values(ObjectType));

export function isObjectType(tag: number): tag is ObjectType {
  return KNOWN_TYPES.has(tag);
}

export function decodeObject(
  session: ObjectSession,
  type: ObjectType,
  objectId: ObjectId,
  extraIds: readonly ObjectId[] = []
): Promise<Result<RemoteObject, ObjectApiError>> {
  const decoder: ObjectDecoder = DECODERS[type];
  return decoder(session, objectId, extraIds);
}
