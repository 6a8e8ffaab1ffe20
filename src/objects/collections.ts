import { err, type Result } from 'neverthrow';
import type { ObjectSession } from '../session/object-session.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { checked } from './checked-call.js';
import { attachOrRelease } from './attach-or-release.js';
import { RemoteList } from './remote-list.js';

/** Every process the server knows about, as a list of process objects. */
export async function getProcesses(session: ObjectSession): Promise<Result<RemoteList, ObjectApiError>> {
  const sessionId = session.requireSessionId('get processes');
  const reply = await checked(session.transport.getProcesses(sessionId), 'Could not get processes list object');
  if (reply.isErr()) return err(reply.error);
  return attachOrRelease(new RemoteList(session), reply.value.processesListId);
}

export async function getPrograms(session: ObjectSession): Promise<Result<RemoteList, ObjectApiError>> {
  const sessionId = session.requireSessionId('get programs');
  const reply = await checked(session.transport.getPrograms(sessionId), 'Could not get programs list object');
  if (reply.isErr()) return err(reply.error);
  return attachOrRelease(new RemoteList(session), reply.value.programsListId);
}
