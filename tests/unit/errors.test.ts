/**
 * Error data and formatting.
 */

import { describe, it, expect } from 'vitest';
import { Err, formatObjectApiError } from '../../src/errors/index.js';
import { ErrorCode, errorCodeName, isSuccess } from '../../src/protocol/error-codes.js';
import { asObjectId } from '../../src/protocol/ids.js';

describe('errorCodeName', () => {
  it('should prefix known codes with E_', () => {
    expect(errorCodeName(ErrorCode.SUCCESS)).toBe('E_SUCCESS');
    expect(errorCodeName(ErrorCode.DOES_NOT_EXIST)).toBe('E_DOES_NOT_EXIST');
    expect(errorCodeName(ErrorCode.TOO_MANY_OPEN_FILES)).toBe('E_TOO_MANY_OPEN_FILES');
  });

  it('should name unknown codes <unknown>', () => {
    expect(errorCodeName(99)).toBe('<unknown>');
    expect(errorCodeName(255)).toBe('<unknown>');
  });

  it('should treat only zero as success', () => {
    expect(isSuccess(0)).toBe(true);
    expect(isSuccess(ErrorCode.NO_MORE_DATA)).toBe(false);
  });
});

describe('Err', () => {
  it('should carry the code name on remote errors', () => {
    const error = Err.remote('Could not open file object', ErrorCode.ACCESS_DENIED);
    expect(error).toEqual({
      _tag: 'Remote',
      code: 131,
      codeName: 'E_ACCESS_DENIED',
      message: 'Could not open file object',
    });
  });

  it('should only record transferred when given', () => {
    expect('transferred' in Err.remote('x', 1)).toBe(false);
    expect(Err.remote('x', 1, 0).transferred).toBe(0);
  });

  it('should describe unexpected list item types', () => {
    const error = Err.unexpectedObjectType(asObjectId(4), 2, 9);
    expect(error.message).toBe('List item 2 has unknown object type 9');
    expect(error.listId).toBe(4);
  });
});

describe('formatObjectApiError', () => {
  it('should format remote errors with name and number', () => {
    expect(formatObjectApiError(Err.remote('Could not open file object', ErrorCode.DOES_NOT_EXIST))).toBe(
      'Could not open file object: E_DOES_NOT_EXIST (133)'
    );
  });

  it('should append the transferred byte count', () => {
    expect(formatObjectApiError(Err.remote('Could not write to file object 3', ErrorCode.NO_FREE_SPACE, 122))).toBe(
      'Could not write to file object 3: E_NO_FREE_SPACE (130) after 122 bytes'
    );
  });

  it('should include the transport cause', () => {
    const error = Err.transportFailed('Could not create session', {
      code: 'TRANSPORT_IO_ERROR',
      message: 'socket closed',
    });
    expect(error.message).toBe('Could not create session: socket closed');
    expect(formatObjectApiError(error)).toBe(
      'Could not create session: socket closed\nCause: {"code":"TRANSPORT_IO_ERROR","message":"socket closed"}'
    );
  });

  it('should list config issues', () => {
    const error = Err.configInvalid([{ path: 'OBJLINK_SESSION_LIFETIME_S', message: 'too small' }]);
    expect(formatObjectApiError(error)).toBe('Invalid configuration\n\n  - OBJLINK_SESSION_LIFETIME_S: too small');
  });

  it('should pass stalled transfer messages through', () => {
    expect(formatObjectApiError(Err.stalledTransfer(61))).toBe('Server accepted zero bytes after 61 bytes');
  });
});
