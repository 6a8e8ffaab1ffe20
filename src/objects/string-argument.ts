import { ok, err, type Result } from 'neverthrow';
import type { ObjectId } from '../protocol/ids.js';
import type { ObjectSession } from '../session/object-session.js';
import { MisuseError, type ObjectApiError } from '../errors/app-error.js';
import type { Ownership } from './remote-handle.js';
import { RemoteString } from './remote-string.js';

/** Text to be allocated on the server, or a string object the caller already holds. */
export type StringArgument = string | RemoteString;

export interface ResolvedString {
  readonly handle: RemoteString;
  readonly objectId: ObjectId;
  readonly ownership: Ownership;
}

export async function resolveString(
  session: ObjectSession,
  value: StringArgument
): Promise<Result<ResolvedString, ObjectApiError>> {
  if (typeof value !== 'string') {
    return ok({ handle: value, objectId: requireAttached(value), ownership: 'borrowed' });
  }

  const allocated = await new RemoteString(session).allocate(value);
  if (allocated.isErr()) return err(allocated.error);
  return ok({ handle: allocated.value, objectId: requireAttached(allocated.value), ownership: 'owned' });
}

/**
 * Runs `use` with the id of `value`. A string allocated here lives only for
 * the duration of the call.
 */
export async function withStringArgument<T>(
  session: ObjectSession,
  value: StringArgument,
  use: (objectId: ObjectId) => PromiseLike<Result<T, ObjectApiError>>
): Promise<Result<T, ObjectApiError>> {
  const resolved = await resolveString(session, value);
  if (resolved.isErr()) return err(resolved.error);

  const { handle, objectId, ownership } = resolved.value;
  try {
    return await use(objectId);
  } finally {
    if (ownership === 'owned') await handle.release();
  }
}

export function requireAttached(handle: { readonly objectId: ObjectId | null; readonly kind: string }): ObjectId {
  if (handle.objectId === null) {
    throw new MisuseError(`Cannot pass unattached ${handle.kind} object`);
  }
  return handle.objectId;
}
