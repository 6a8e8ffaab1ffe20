/**
 * Error codes reported by the object server in the first slot of every response.
 *
 * Codes below 128 are protocol-level; 128 and above mirror POSIX errno
 * conditions on the server side.
 */
export const ErrorCode = {
  SUCCESS: 0,
  UNKNOWN_ERROR: 1,
  INVALID_OPERATION: 2,
  OPERATION_ABORTED: 3,
  INTERNAL_ERROR: 4,
  UNKNOWN_SESSION_ID: 5,
  NO_FREE_SESSION_ID: 6,
  UNKNOWN_OBJECT_ID: 7,
  NO_FREE_OBJECT_ID: 8,
  OBJECT_IS_LOCKED: 9,
  NO_MORE_DATA: 10,
  WRONG_LIST_ITEM_TYPE: 11,
  PROGRAM_IS_PURGED: 12,
  INVALID_PARAMETER: 128,
  NO_FREE_MEMORY: 129,
  NO_FREE_SPACE: 130,
  ACCESS_DENIED: 131,
  ALREADY_EXISTS: 132,
  DOES_NOT_EXIST: 133,
  INTERRUPTED: 134,
  IS_DIRECTORY: 135,
  NOT_A_DIRECTORY: 136,
  WOULD_BLOCK: 137,
  OVERFLOW: 138,
  BAD_FILE_DESCRIPTOR: 139,
  OUT_OF_RANGE: 140,
  NAME_TOO_LONG: 141,
  INVALID_SEEK: 142,
  NOT_SUPPORTED: 143,
  TOO_MANY_OPEN_FILES: 144,
} as const;

export type ErrorCodeName = keyof typeof ErrorCode;

/**
 * Any code the server may send. Unknown values are possible (newer servers),
 * so this stays `number` and is narrowed by comparison, not by type.
 */
export type RemoteErrorCode = number;

const NAMES_BY_CODE: ReadonlyMap<number, string> = new Map(
  Object.entries(ErrorCode).map(([name, code]) => [code, `E_${name}`])
);

/**
 * `E_`-prefixed name of a code, or `<unknown>` for codes this client does not know.
 */
export function errorCodeName(code: RemoteErrorCode): string {
  return NAMES_BY_CODE.get(code) ?? '<unknown>';
}

export function isSuccess(code: RemoteErrorCode): boolean {
  return code === ErrorCode.SUCCESS;
}
