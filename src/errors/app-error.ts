import type { Brand } from '../runtime/brand.js';
import type { ObjectId } from '../protocol/ids.js';
import type { RemoteErrorCode } from '../protocol/error-codes.js';

/** Server answered with a non-success code. */
export type RemoteError = Readonly<{
  readonly _tag: 'Remote';
  readonly code: RemoteErrorCode;
  readonly codeName: string;
  readonly message: string;
  /** Bytes moved by a chunked transfer before the failing call. */
  readonly transferred?: number;
}>;

/** The call never produced a server answer. */
export type TransportFailedError = Readonly<{
  readonly _tag: 'TransportFailed';
  readonly operation: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedObjectTypeError = Readonly<{
  readonly _tag: 'UnexpectedObjectType';
  readonly listId: ObjectId;
  readonly index: number;
  readonly typeTag: number;
  readonly message: string;
}>;

/** A write chunk was acknowledged with success but zero bytes written. */
export type StalledTransferError = Readonly<{
  readonly _tag: 'StalledTransfer';
  readonly transferred: number;
  readonly message: string;
}>;

export type ObjectApiError = RemoteError | TransportFailedError | UnexpectedObjectTypeError | StalledTransferError;

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type ClientError = ObjectApiError | ConfigInvalidError;

export type ValidatedClientConfig<T> = Brand<T, 'ValidatedClientConfig'>;

/**
 * Programmer error: an operation on an unattached handle, a second detach, or a
 * second concurrent async read/write on one handle. Thrown, never returned.
 */
export class MisuseError extends Error {
  override readonly name = 'MisuseError';
}
