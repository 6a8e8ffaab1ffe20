import type { ResultAsync } from 'neverthrow';
import type { ObjectId, SessionId } from '../protocol/ids.js';
import type { RemoteErrorCode } from '../protocol/error-codes.js';

/**
 * Failure below the protocol: connection lost, request timed out, frame rejected.
 * Server-reported codes are NOT transport errors; they arrive in `errorCode`.
 */
export type TransportError = {
  readonly code: 'TRANSPORT_IO_ERROR';
  readonly message: string;
  readonly cause?: unknown;
};

/** Every response starts with the server's error code. */
export type Reply<T extends object = Record<never, never>> = Readonly<{ errorCode: RemoteErrorCode } & T>;

/**
 * Handler installed for one push-event id. Arguments are the raw payload fields
 * as decoded by the transport; receivers validate them before use.
 */
export type PushEventHandler = (...args: unknown[]) => void;

export type FileInfoReply = Reply<{
  type: number;
  nameStringId: ObjectId;
  flags: number;
  permissions: number;
  uid: number;
  gid: number;
  length: number;
  accessTime: number;
  modificationTime: number;
  statusChangeTime: number;
}>;

export type LookupFileInfoReply = Reply<{
  type: number;
  permissions: number;
  uid: number;
  gid: number;
  length: number;
  accessTime: number;
  modificationTime: number;
  statusChangeTime: number;
}>;

export type CommandReply = Reply<{
  executableStringId: ObjectId;
  argumentsListId: ObjectId;
  environmentListId: ObjectId;
  workingDirectoryStringId: ObjectId;
}>;

export type StdioRedirectionReply = Reply<{
  stdinRedirection: number;
  stdinFileNameStringId: ObjectId;
  stdoutRedirection: number;
  stdoutFileNameStringId: ObjectId;
  stderrRedirection: number;
  stderrFileNameStringId: ObjectId;
}>;

export type ScheduleReply = Reply<{
  startCondition: number;
  startTimestamp: number;
  startDelay: number;
  repeatMode: number;
  repeatInterval: number;
  repeatFieldsStringId: ObjectId;
}>;

export interface SpawnProcessRequest {
  readonly executableStringId: ObjectId;
  readonly argumentsListId: ObjectId;
  readonly environmentListId: ObjectId;
  readonly workingDirectoryStringId: ObjectId;
  readonly uid: number;
  readonly gid: number;
  readonly stdinFileId: ObjectId;
  readonly stdoutFileId: ObjectId;
  readonly stderrFileId: ObjectId;
}

export interface ProgramStdioRedirectionRequest {
  readonly stdinRedirection: number;
  readonly stdinFileNameStringId: ObjectId;
  readonly stdoutRedirection: number;
  readonly stdoutFileNameStringId: ObjectId;
  readonly stderrRedirection: number;
  readonly stderrFileNameStringId: ObjectId;
}

export interface ProgramScheduleRequest {
  readonly startCondition: number;
  readonly startTimestamp: number;
  readonly startDelay: number;
  readonly repeatMode: number;
  readonly repeatInterval: number;
  readonly repeatFieldsStringId: ObjectId;
}

/**
 * Port: request/response RPC plus push-event subscription for the object server.
 *
 * Guarantees expected from implementations:
 * - Calls on one transport are delivered to the server in issue order
 * - `*Unchecked` and `*Async` calls resolve once the request is sent; they carry
 *   no server reply (async calls answer through a push event)
 * - `registerCallback` replaces any handler previously installed for that id
 *
 * Buffers passed to write/set calls are already zero-padded to the wire width;
 * the accompanying length says how many bytes are payload.
 */
export interface ObjectTransportPort {
  // sessions
  createSession(lifetimeS: number): ResultAsync<Reply<{ sessionId: SessionId }>, TransportError>;
  expireSessionUnchecked(sessionId: SessionId): ResultAsync<void, TransportError>;
  keepSessionAlive(sessionId: SessionId, lifetimeS: number): ResultAsync<Reply, TransportError>;

  // objects
  releaseObjectUnchecked(objectId: ObjectId, sessionId: SessionId): ResultAsync<void, TransportError>;

  // strings
  allocateString(
    lengthToReserve: number,
    buffer: Uint8Array,
    sessionId: SessionId
  ): ResultAsync<Reply<{ stringId: ObjectId }>, TransportError>;
  getStringLength(stringId: ObjectId): ResultAsync<Reply<{ length: number }>, TransportError>;
  setStringChunk(stringId: ObjectId, offset: number, buffer: Uint8Array): ResultAsync<Reply, TransportError>;
  getStringChunk(stringId: ObjectId, offset: number): ResultAsync<Reply<{ buffer: Uint8Array }>, TransportError>;

  // lists
  allocateList(lengthToReserve: number, sessionId: SessionId): ResultAsync<Reply<{ listId: ObjectId }>, TransportError>;
  getListLength(listId: ObjectId): ResultAsync<Reply<{ length: number }>, TransportError>;
  getListItem(
    listId: ObjectId,
    index: number,
    sessionId: SessionId
  ): ResultAsync<Reply<{ itemObjectId: ObjectId; type: number }>, TransportError>;
  appendToList(listId: ObjectId, itemObjectId: ObjectId): ResultAsync<Reply, TransportError>;

  // files and pipes
  openFile(
    nameStringId: ObjectId,
    flags: number,
    permissions: number,
    uid: number,
    gid: number,
    sessionId: SessionId
  ): ResultAsync<Reply<{ fileId: ObjectId }>, TransportError>;
  createPipe(flags: number, length: number, sessionId: SessionId): ResultAsync<Reply<{ fileId: ObjectId }>, TransportError>;
  getFileInfo(fileId: ObjectId, sessionId: SessionId): ResultAsync<FileInfoReply, TransportError>;
  readFile(
    fileId: ObjectId,
    lengthToRead: number
  ): ResultAsync<Reply<{ buffer: Uint8Array; lengthRead: number }>, TransportError>;
  readFileAsync(fileId: ObjectId, lengthToRead: number): ResultAsync<void, TransportError>;
  writeFile(
    fileId: ObjectId,
    buffer: Uint8Array,
    lengthToWrite: number
  ): ResultAsync<Reply<{ lengthWritten: number }>, TransportError>;
  writeFileUnchecked(fileId: ObjectId, buffer: Uint8Array, lengthToWrite: number): ResultAsync<void, TransportError>;
  writeFileAsync(fileId: ObjectId, buffer: Uint8Array, lengthToWrite: number): ResultAsync<void, TransportError>;
  lookupFileInfo(
    nameStringId: ObjectId,
    followSymlink: boolean,
    sessionId: SessionId
  ): ResultAsync<LookupFileInfoReply, TransportError>;
  lookupSymlinkTarget(
    nameStringId: ObjectId,
    canonicalize: boolean,
    sessionId: SessionId
  ): ResultAsync<Reply<{ targetStringId: ObjectId }>, TransportError>;

  // directories
  openDirectory(nameStringId: ObjectId, sessionId: SessionId): ResultAsync<Reply<{ directoryId: ObjectId }>, TransportError>;
  getDirectoryName(directoryId: ObjectId, sessionId: SessionId): ResultAsync<Reply<{ nameStringId: ObjectId }>, TransportError>;
  getNextDirectoryEntry(
    directoryId: ObjectId,
    sessionId: SessionId
  ): ResultAsync<Reply<{ nameStringId: ObjectId; type: number }>, TransportError>;
  rewindDirectory(directoryId: ObjectId): ResultAsync<Reply, TransportError>;
  createDirectory(
    nameStringId: ObjectId,
    flags: number,
    permissions: number,
    uid: number,
    gid: number
  ): ResultAsync<Reply, TransportError>;

  // processes
  getProcesses(sessionId: SessionId): ResultAsync<Reply<{ processesListId: ObjectId }>, TransportError>;
  spawnProcess(request: SpawnProcessRequest, sessionId: SessionId): ResultAsync<Reply<{ processId: ObjectId }>, TransportError>;
  killProcess(processId: ObjectId, signal: number): ResultAsync<Reply, TransportError>;
  getProcessCommand(processId: ObjectId, sessionId: SessionId): ResultAsync<CommandReply, TransportError>;
  getProcessIdentity(processId: ObjectId): ResultAsync<Reply<{ pid: number; uid: number; gid: number }>, TransportError>;
  getProcessStdio(
    processId: ObjectId,
    sessionId: SessionId
  ): ResultAsync<Reply<{ stdinFileId: ObjectId; stdoutFileId: ObjectId; stderrFileId: ObjectId }>, TransportError>;
  getProcessState(
    processId: ObjectId
  ): ResultAsync<Reply<{ state: number; timestamp: number; exitCode: number }>, TransportError>;

  // programs
  getPrograms(sessionId: SessionId): ResultAsync<Reply<{ programsListId: ObjectId }>, TransportError>;
  defineProgram(identifierStringId: ObjectId, sessionId: SessionId): ResultAsync<Reply<{ programId: ObjectId }>, TransportError>;
  purgeProgram(programId: ObjectId, cookie: number): ResultAsync<Reply, TransportError>;
  getProgramIdentifier(programId: ObjectId, sessionId: SessionId): ResultAsync<Reply<{ identifierStringId: ObjectId }>, TransportError>;
  getProgramRootDirectory(
    programId: ObjectId,
    sessionId: SessionId
  ): ResultAsync<Reply<{ rootDirectoryStringId: ObjectId }>, TransportError>;
  setProgramCommand(
    programId: ObjectId,
    executableStringId: ObjectId,
    argumentsListId: ObjectId,
    environmentListId: ObjectId,
    workingDirectoryStringId: ObjectId
  ): ResultAsync<Reply, TransportError>;
  getProgramCommand(programId: ObjectId, sessionId: SessionId): ResultAsync<CommandReply, TransportError>;
  setProgramStdioRedirection(
    programId: ObjectId,
    request: ProgramStdioRedirectionRequest
  ): ResultAsync<Reply, TransportError>;
  getProgramStdioRedirection(programId: ObjectId, sessionId: SessionId): ResultAsync<StdioRedirectionReply, TransportError>;
  setProgramSchedule(programId: ObjectId, request: ProgramScheduleRequest): ResultAsync<Reply, TransportError>;
  getProgramSchedule(programId: ObjectId, sessionId: SessionId): ResultAsync<ScheduleReply, TransportError>;
  getProgramSchedulerState(
    programId: ObjectId,
    sessionId: SessionId
  ): ResultAsync<Reply<{ state: number; timestamp: number; messageStringId: ObjectId }>, TransportError>;
  scheduleProgramNow(programId: ObjectId): ResultAsync<Reply, TransportError>;
  getLastSpawnedProgramProcess(
    programId: ObjectId,
    sessionId: SessionId
  ): ResultAsync<Reply<{ processId: ObjectId; timestamp: number }>, TransportError>;
  getCustomProgramOptionNames(programId: ObjectId, sessionId: SessionId): ResultAsync<Reply<{ namesListId: ObjectId }>, TransportError>;
  setCustomProgramOptionValue(
    programId: ObjectId,
    nameStringId: ObjectId,
    valueStringId: ObjectId
  ): ResultAsync<Reply, TransportError>;
  getCustomProgramOptionValue(
    programId: ObjectId,
    nameStringId: ObjectId,
    sessionId: SessionId
  ): ResultAsync<Reply<{ valueStringId: ObjectId }>, TransportError>;

  // push events
  registerCallback(callbackId: number, handler: PushEventHandler): void;
}
