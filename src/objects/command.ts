import { ok, err, type Result } from 'neverthrow';
import type { ObjectId } from '../protocol/ids.js';
import type { CommandReply } from '../ports/object-transport.port.js';
import type { ObjectSession } from '../session/object-session.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { AttachBatch } from './attach-or-release.js';
import type { Ownership, RemoteHandle } from './remote-handle.js';
import { RemoteList, type ListItemInput } from './remote-list.js';
import { RemoteString } from './remote-string.js';
import { requireAttached, type StringArgument } from './string-argument.js';

/** Items to be allocated as a new list, or a list object the caller already holds. */
export type ListArgument = readonly ListItemInput[] | RemoteList;

export interface Command {
  readonly executable: RemoteString;
  readonly arguments: RemoteList;
  readonly environment: RemoteList;
  readonly workingDirectory: RemoteString;
}

export interface CommandInput {
  readonly executable: StringArgument;
  readonly arguments: ListArgument;
  readonly environment: ListArgument;
  readonly workingDirectory: StringArgument;
}

/** Wraps the four ids of a command reply; all-or-nothing. */
export async function attachCommand(
  session: ObjectSession,
  reply: CommandReply
): Promise<Result<Command, ObjectApiError>> {
  const { executableStringId, argumentsListId, environmentListId, workingDirectoryStringId } = reply;
  const batch = new AttachBatch(session, [
    executableStringId,
    argumentsListId,
    environmentListId,
    workingDirectoryStringId,
  ]);

  const executable = await batch.attach(new RemoteString(session), executableStringId);
  if (executable.isErr()) return err(executable.error);
  const args = await batch.attach(new RemoteList(session), argumentsListId);
  if (args.isErr()) return err(args.error);
  const environment = await batch.attach(new RemoteList(session), environmentListId);
  if (environment.isErr()) return err(environment.error);
  const workingDirectory = await batch.attach(new RemoteString(session), workingDirectoryStringId);
  if (workingDirectory.isErr()) return err(workingDirectory.error);

  return ok({
    executable: executable.value,
    arguments: args.value,
    environment: environment.value,
    workingDirectory: workingDirectory.value,
  });
}

export interface Resolved<T extends RemoteHandle> {
  readonly handle: T;
  readonly objectId: ObjectId;
  readonly ownership: Ownership;
}

/**
 * Turns plain values into server objects for one call. Everything allocated
 * here is released by `releaseAllocated()`; after a successful call the receiver
 * takes the handles over with their recorded ownership.
 */
export class ArgumentScope {
  private readonly allocated: RemoteHandle[] = [];

  constructor(private readonly session: ObjectSession) {}

  async string(value: StringArgument): Promise<Result<Resolved<RemoteString>, ObjectApiError>> {
    if (typeof value !== 'string') {
      return ok({ handle: value, objectId: requireAttached(value), ownership: 'borrowed' });
    }
    const allocated = await new RemoteString(this.session).allocate(value);
    if (allocated.isErr()) return err(allocated.error);
    return ok(this.record(allocated.value));
  }

  async list(value: ListArgument): Promise<Result<Resolved<RemoteList>, ObjectApiError>> {
    if (value instanceof RemoteList) {
      return ok({ handle: value, objectId: requireAttached(value), ownership: 'borrowed' });
    }
    const allocated = await new RemoteList(this.session).allocate(value);
    if (allocated.isErr()) return err(allocated.error);
    return ok(this.record(allocated.value));
  }

  async command(input: CommandInput): Promise<Result<ResolvedCommand, ObjectApiError>> {
    const executable = await this.string(input.executable);
    if (executable.isErr()) return err(executable.error);
    const args = await this.list(input.arguments);
    if (args.isErr()) return err(args.error);
    const environment = await this.list(input.environment);
    if (environment.isErr()) return err(environment.error);
    const workingDirectory = await this.string(input.workingDirectory);
    if (workingDirectory.isErr()) return err(workingDirectory.error);

    return ok({
      executable: executable.value,
      arguments: args.value,
      environment: environment.value,
      workingDirectory: workingDirectory.value,
    });
  }

  async releaseAllocated(): Promise<void> {
    const handles = this.allocated.splice(0);
    await Promise.all(handles.map((handle) => handle.release()));
  }

  private record<T extends RemoteHandle>(handle: T): Resolved<T> {
    this.allocated.push(handle);
    return { handle, objectId: requireAttached(handle), ownership: 'owned' };
  }
}

export interface ResolvedCommand {
  readonly executable: Resolved<RemoteString>;
  readonly arguments: Resolved<RemoteList>;
  readonly environment: Resolved<RemoteList>;
  readonly workingDirectory: Resolved<RemoteString>;
}
