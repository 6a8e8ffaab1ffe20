import { err, ok, type Result, type ResultAsync } from 'neverthrow';
import type { Reply, TransportError } from '../ports/object-transport.port.js';
import { ErrorCode, isSuccess } from '../protocol/error-codes.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

/**
 * Folds the two failure channels of a call into one: transport failures and
 * non-success codes both become errors carrying `message`.
 */
export function checked<R extends Reply>(
  call: ResultAsync<R, TransportError>,
  message: string
): ResultAsync<R, ObjectApiError> {
  return call
    .mapErr((error): ObjectApiError => Err.transportFailed(message, error))
    .andThen((reply): Result<R, ObjectApiError> =>
      isSuccess(reply.errorCode) ? ok(reply) : err(Err.remote(message, reply.errorCode))
    );
}

/**
 * Like {@link checked} for chunked reads: a "no more data" code ends the
 * transfer and comes back as `null` instead of an error.
 */
export function checkedUntilEnd<R extends Reply>(
  call: ResultAsync<R, TransportError>,
  message: string
): ResultAsync<R | null, ObjectApiError> {
  return call
    .mapErr((error): ObjectApiError => Err.transportFailed(message, error))
    .andThen((reply): Result<R | null, ObjectApiError> => {
      if (reply.errorCode === ErrorCode.NO_MORE_DATA) return ok(null);
      return isSuccess(reply.errorCode) ? ok(reply) : err(Err.remote(message, reply.errorCode));
    });
}

/** For `*Unchecked`/`*Async` calls, which only fail at the transport. */
export function sent(call: ResultAsync<void, TransportError>, message: string): ResultAsync<void, ObjectApiError> {
  return call.mapErr((error): ObjectApiError => Err.transportFailed(message, error));
}

/** Records on a remote error how many bytes a chunked transfer moved first. */
export function withTransferred(error: ObjectApiError, transferred: number): ObjectApiError {
  return error._tag === 'Remote' ? Err.remote(error.message, error.code, transferred) : error;
}
