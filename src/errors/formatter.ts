import type { ClientError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatObjectApiError(error: ClientError): string {
  switch (error._tag) {
    case 'Remote': {
      const base = `${error.message}: ${error.codeName} (${error.code})`;
      return error.transferred === undefined ? base : `${base} after ${error.transferred} bytes`;
    }

    case 'TransportFailed':
      return error.cause === undefined ? error.message : `${error.message}\nCause: ${safeToString(error.cause)}`;

    case 'UnexpectedObjectType':
    case 'StalledTransfer':
      return error.message;

    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    default:
      return assertNever(error);
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
