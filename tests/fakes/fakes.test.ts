/**
 * The fakes are part of the test contract: handle tests trust their
 * reference counting and failure injection, so pin both down here.
 */

import { describe, it, expect, vi } from 'vitest';
import { ErrorCode } from '../../src/protocol/error-codes.js';
import { asSessionId } from '../../src/protocol/ids.js';
import { InMemoryObjectServer } from './in-memory-object-server.fake.js';
import { ManualIntervalTimer } from './manual-interval-timer.fake.js';

const SESSION = asSessionId(1);

describe('InMemoryObjectServer', () => {
  it('should free an object once its last reference is released', async () => {
    const server = new InMemoryObjectServer();
    const stringId = server.seedString('kept');
    const listId = server.seedList([stringId]);

    expect(server.refsOf(stringId)).toBe(2);

    await server.releaseObjectUnchecked(listId, SESSION);
    expect(server.isLive(listId)).toBe(false);
    expect(server.refsOf(stringId)).toBe(1);

    await server.releaseObjectUnchecked(stringId, SESSION);
    expect(server.liveObjectCount()).toBe(0);
    expect(server.released).toEqual([listId, stringId]);
  });

  it('should inject a failure once, after the skipped calls', async () => {
    const server = new InMemoryObjectServer();
    const stringId = server.seedString('abc');
    server.failOn('getStringLength', { errorCode: ErrorCode.OBJECT_IS_LOCKED }, { skip: 1 });

    const codes: number[] = [];
    for (let i = 0; i < 3; i++) {
      const reply = await server.getStringLength(stringId);
      codes.push(reply.isOk() ? reply.value.errorCode : -1);
    }

    expect(codes).toEqual([ErrorCode.SUCCESS, ErrorCode.OBJECT_IS_LOCKED, ErrorCode.SUCCESS]);
    expect(server.callCount('getStringLength')).toBe(3);
  });

  it('should return a transport error when asked to', async () => {
    const server = new InMemoryObjectServer();
    server.failOn('createSession', { transport: 'socket closed' });

    const reply = await server.createSession(35);

    expect(reply.isErr() ? reply.error : null).toEqual({ code: 'TRANSPORT_IO_ERROR', message: 'socket closed' });
  });

  it('should hand pipe data out in the order it was written', async () => {
    const server = new InMemoryObjectServer();
    const pipeId = server.seedPipe();
    const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

    await server.writeFile(pipeId, bytes('first,'), 6);
    await server.writeFile(pipeId, bytes('second'), 6);
    const reply = await server.readFile(pipeId, 6);

    expect(reply.isOk() ? new TextDecoder().decode(reply.value.buffer.subarray(0, reply.value.lengthRead)) : null).toBe(
      'first,'
    );
  });

  it('should deliver pushed events to the registered handler', () => {
    const server = new InMemoryObjectServer();
    const handler = vi.fn();
    server.registerCallback(45, handler);

    server.emit(45, 7, 3);
    server.emit(46, 'ignored');

    expect(handler).toHaveBeenCalledWith(7, 3);
    expect(server.hasHandler(46)).toBe(false);
  });
});

describe('ManualIntervalTimer', () => {
  it('should only tick while started', () => {
    const timer = new ManualIntervalTimer();
    const tick = vi.fn();

    timer.tick();
    timer.start(250, tick);
    timer.tick(3);
    timer.stop();
    timer.tick();

    expect(tick).toHaveBeenCalledTimes(3);
    expect(timer.startCount).toBe(1);
    expect(timer.running).toBe(false);
  });
});
