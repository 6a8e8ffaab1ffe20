import type {
  ClientError,
  ConfigIssue,
  ConfigInvalidError,
  RemoteError,
  StalledTransferError,
  TransportFailedError,
  UnexpectedObjectTypeError,
} from './app-error.js';
import type { ObjectId } from '../protocol/ids.js';
import type { RemoteErrorCode } from '../protocol/error-codes.js';
import { errorCodeName } from '../protocol/error-codes.js';
import type { TransportError } from '../ports/object-transport.port.js';

export const Err = {
  remote: (message: string, code: RemoteErrorCode, transferred?: number): RemoteError => ({
    _tag: 'Remote',
    code,
    codeName: errorCodeName(code),
    message,
    ...(transferred === undefined ? {} : { transferred }),
  }),

  transportFailed: (operation: string, cause: TransportError): TransportFailedError => ({
    _tag: 'TransportFailed',
    operation,
    message: `${operation}: ${cause.message}`,
    cause,
  }),

  unexpectedObjectType: (listId: ObjectId, index: number, typeTag: number): UnexpectedObjectTypeError => ({
    _tag: 'UnexpectedObjectType',
    listId,
    index,
    typeTag,
    message: `List item ${index} has unknown object type ${typeTag}`,
  }),

  stalledTransfer: (transferred: number): StalledTransferError => ({
    _tag: 'StalledTransfer',
    transferred,
    message: `Server accepted zero bytes after ${transferred} bytes`,
  }),

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),
} as const satisfies Record<string, (...args: never[]) => ClientError>;
