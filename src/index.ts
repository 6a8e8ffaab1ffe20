import 'reflect-metadata';

// Composition
export { createClientContainer, openSession, type ClientContainerOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Session and connection
export { ObjectSession } from './session/object-session.js';
export { ObjectConnection } from './connection/object-connection.js';

// Handles
export { RemoteHandle, type Ownership } from './objects/remote-handle.js';
export { RemoteString } from './objects/remote-string.js';
export { RemoteList, type ListItemInput } from './objects/remote-list.js';
export { FileBase, type AsyncReadResult, type AsyncWriteCallbacks } from './objects/file-base.js';
export { RemoteFile } from './objects/remote-file.js';
export { RemotePipe } from './objects/remote-pipe.js';
export { RemoteDirectory, type DirectoryEntry } from './objects/remote-directory.js';
export { RemoteProcess, type SpawnOptions, type ProcessStateChangedCallback } from './objects/remote-process.js';
export {
  RemoteProgram,
  purgeCookie,
  type ProgramCallback,
  type ScheduleInput,
  type StdioTarget,
} from './objects/remote-program.js';
export type { CommandInput, ListArgument } from './objects/command.js';
export type { StringArgument } from './objects/string-argument.js';
export { decodeObject, isObjectType, type RemoteObject } from './objects/object-registry.js';
export { resolveFileOrPipe } from './objects/file-or-pipe.js';
export { lookupFileInfo, lookupSymlinkTarget, createDirectory, type FileInfo } from './objects/file-system.js';
export { getProcesses, getPrograms } from './objects/collections.js';

// Protocol
export * from './protocol/constants.js';
export { ErrorCode, errorCodeName, isSuccess, type ErrorCodeName, type RemoteErrorCode } from './protocol/error-codes.js';
export { NO_OBJECT_ID, asObjectId, asSessionId, type ObjectId, type SessionId, type CallbackCookie } from './protocol/ids.js';

// Ports and adapters
export type * from './ports/object-transport.port.js';
export type { IntervalTimerPort } from './ports/interval-timer.port.js';
export { NodeIntervalTimer } from './infra/local/interval-timer/index.js';

// Errors, config, logging
export * from './errors/index.js';
export {
  loadClientConfig,
  createClientConfig,
  DEFAULT_CLIENT_CONFIG,
  KEEP_ALIVE_MARGIN,
  type ClientConfig,
  type ValidatedConfig,
} from './config/client-config.js';
export { PinoLoggerFactory, type ILoggerFactory, type Logger, type LogLevel } from './core/logging/index.js';
