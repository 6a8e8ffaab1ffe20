/**
 * Protocol constants shared with the object server.
 *
 * Values are part of the wire contract and must not be changed.
 */

// =============================================================================
// Chunk limits (bytes per call, fixed by the wire frame size)
// =============================================================================

export const StringChunkLimit = {
  /** Inline payload of the allocate call. */
  ALLOCATE: 58,
  SET_CHUNK: 58,
  GET_CHUNK: 63,
} as const;

export const FileChunkLimit = {
  READ: 62,
  READ_ASYNC: 60,
  WRITE: 61,
  WRITE_UNCHECKED: 61,
  WRITE_ASYNC: 61,
} as const;

/** Calls per async write burst: `ASYNC_BURST_CHUNKS - 1` unchecked + 1 acknowledged. */
export const ASYNC_BURST_CHUNKS = 2000;

// =============================================================================
// Object types (tag reported next to list items)
// =============================================================================

export const ObjectType = {
  STRING: 0,
  LIST: 1,
  FILE: 2,
  DIRECTORY: 3,
  PROCESS: 4,
  PROGRAM: 5,
} as const;

export type ObjectType = (typeof ObjectType)[keyof typeof ObjectType];

// =============================================================================
// Files, pipes, directories
// =============================================================================

export const FileType = {
  UNKNOWN: 0,
  REGULAR: 1,
  DIRECTORY: 2,
  CHARACTER: 3,
  BLOCK: 4,
  FIFO: 5,
  SYMLINK: 6,
  SOCKET: 7,
  PIPE: 8,
} as const;

export type FileType = (typeof FileType)[keyof typeof FileType];

export const FileFlag = {
  READ_ONLY: 1,
  WRITE_ONLY: 2,
  READ_WRITE: 4,
  APPEND: 8,
  CREATE: 16,
  EXCLUSIVE: 32,
  NON_BLOCKING: 64,
  TRUNCATE: 128,
  TEMPORARY: 256,
} as const;

export const PipeFlag = {
  NON_BLOCKING_READ: 1,
  NON_BLOCKING_WRITE: 2,
} as const;

export const DirectoryEntryType = {
  UNKNOWN: 0,
  REGULAR: 1,
  DIRECTORY: 2,
  CHARACTER: 3,
  BLOCK: 4,
  FIFO: 5,
  SYMLINK: 6,
  SOCKET: 7,
} as const;

export type DirectoryEntryType = (typeof DirectoryEntryType)[keyof typeof DirectoryEntryType];

export const DirectoryFlag = {
  RECURSIVE: 1,
  EXCLUSIVE: 2,
} as const;

// =============================================================================
// Processes
// =============================================================================

export const ProcessSignal = {
  INTERRUPT: 2,
  QUIT: 3,
  ABORT: 6,
  KILL: 9,
  USER1: 10,
  USER2: 12,
  TERMINATE: 15,
  CONTINUE: 18,
  STOP: 19,
} as const;

export type ProcessSignal = (typeof ProcessSignal)[keyof typeof ProcessSignal];

export const ProcessState = {
  UNKNOWN: 0,
  RUNNING: 1,
  ERROR: 2,
  EXITED: 3,
  KILLED: 4,
  STOPPED: 5,
} as const;

/** Exit code values reported while a process is in the ERROR state. */
export const ProcessErrorExitCode = {
  INTERNAL_ERROR: 125,
  CANNOT_EXECUTE: 126,
  DOES_NOT_EXIST: 127,
} as const;

// =============================================================================
// Programs
// =============================================================================

export const StdioRedirection = {
  DEV_NULL: 0,
  PIPE: 1,
  FILE: 2,
  LOG: 3,
  STDOUT: 4,
} as const;

export const StartCondition = {
  NEVER: 0,
  NOW: 1,
  REBOOT: 2,
  TIMESTAMP: 3,
} as const;

export const RepeatMode = {
  NEVER: 0,
  INTERVAL: 1,
  CRON: 2,
} as const;

export const SchedulerState = {
  STOPPED: 0,
  WAITING_FOR_START_CONDITION: 1,
  DELAYING_START: 2,
  WAITING_FOR_REPEAT_CONDITION: 3,
  ERROR_OCCURRED: 4,
} as const;

// =============================================================================
// Push-event ids
// =============================================================================

export const CallbackId = {
  ASYNC_FILE_READ: 30,
  ASYNC_FILE_WRITE: 31,
  PROCESS_STATE_CHANGED: 45,
  PROGRAM_SCHEDULER_STATE_CHANGED: 65,
  PROGRAM_PROCESS_SPAWNED: 66,
} as const;

export type CallbackId = (typeof CallbackId)[keyof typeof CallbackId];
