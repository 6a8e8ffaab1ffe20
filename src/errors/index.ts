export type {
  ClientError,
  ConfigIssue,
  ConfigInvalidError,
  ObjectApiError,
  RemoteError,
  StalledTransferError,
  TransportFailedError,
  UnexpectedObjectTypeError,
  ValidatedClientConfig,
} from './app-error.js';
export { MisuseError } from './app-error.js';
export { Err } from './factories.js';
export { formatObjectApiError } from './formatter.js';
