/**
 * Attach/detach/release lifecycle shared by every handle, exercised through
 * string objects.
 */

import { describe, it, expect } from 'vitest';
import { MisuseError } from '../../src/errors/index.js';
import { ErrorCode } from '../../src/protocol/error-codes.js';
import { FileFlag } from '../../src/protocol/constants.js';
import { asObjectId } from '../../src/protocol/ids.js';
import { RemoteString } from '../../src/objects/remote-string.js';
import { RemoteFile } from '../../src/objects/remote-file.js';
import { attachOrRelease } from '../../src/objects/attach-or-release.js';
import { createLiveSession } from '../helpers/test-container.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('RemoteHandle lifecycle', () => {
  it('should refresh on attach', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');

    const handle = expectOk(await new RemoteString(session).attach(stringId), 'attaching string');

    expect(handle.objectId).toBe(stringId);
    expect(handle.isAttached).toBe(true);
    expect(handle.data).toBe('hello');
  });

  it('should skip the refresh when asked', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');

    const handle = expectOk(await new RemoteString(session).attach(stringId, false), 'attaching string');

    expect(handle.data).toBeNull();
    expect(server.callCount('getStringLength')).toBe(0);
  });

  it('should release exactly once', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');
    const handle = expectOk(await new RemoteString(session).attach(stringId), 'attaching string');

    await handle.release();
    await handle.release();

    expect(server.released).toEqual([stringId]);
    expect(server.isLive(stringId)).toBe(false);
    expect(handle.isAttached).toBe(false);
    expect(handle.data).toBeNull();
  });

  it('should hand the id back on detach without telling the server', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');
    const handle = expectOk(await new RemoteString(session).attach(stringId), 'attaching string');

    expect(handle.detach()).toBe(stringId);
    expect(handle.isAttached).toBe(false);
    expect(server.isLive(stringId)).toBe(true);
    expect(server.callCount('releaseObjectUnchecked')).toBe(0);
    expect(() => handle.detach()).toThrow(MisuseError);
    expect(() => handle.detach()).toThrow('Cannot detach unattached string object');
  });

  it('should allow re-attaching a detached id elsewhere', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');
    const first = expectOk(await new RemoteString(session).attach(stringId), 'attaching string');

    const second = expectOk(await new RemoteString(session).attach(first.detach()), 're-attaching string');

    expect(second.data).toBe('hello');
    await second.release();
    expect(server.released).toEqual([stringId]);
  });

  it('should release the previous id when attached to another', async () => {
    const { session, server } = await createLiveSession();
    const first = server.seedString('one');
    const second = server.seedString('two');
    const handle = expectOk(await new RemoteString(session).attach(first), 'attaching first');

    expectOk(await handle.attach(second), 'attaching second');

    expect(server.released).toEqual([first]);
    expect(handle.data).toBe('two');
  });

  it('should end unattached when the refresh fails and leave the id to the caller', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');
    server.failOn('getStringLength', { errorCode: ErrorCode.INTERNAL_ERROR });

    const handle = new RemoteString(session);
    const error = expectErr(await handle.attach(stringId), 'attaching with failing refresh');

    expect(error._tag).toBe('Remote');
    expect(error.message).toBe(`Could not get length of string object ${stringId}`);
    expect(handle.isAttached).toBe(false);
    expect(server.isLive(stringId)).toBe(true);
  });

  it('should release the id in attachOrRelease when the refresh fails', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');
    const extra = server.seedString('sibling');

    const error = expectErr(
      await attachOrRelease(new RemoteString(session), asObjectId(999), [stringId, extra]),
      'attaching unknown id'
    );

    expect(error._tag).toBe('Remote');
    expect(server.released).toEqual([999, stringId, extra]);
  });

  it('should fire the release guard on dispose', async () => {
    const { session, server } = await createLiveSession();
    const stringId = server.seedString('hello');
    const handle = expectOk(await new RemoteString(session).attach(stringId), 'attaching string');

    await handle.dispose();
    await handle.dispose();

    expect(server.released).toEqual([stringId]);
    expect(handle.isAttached).toBe(false);
  });

  it('should not fire the guard after detach', async () => {
    const { session, server } = await createLiveSession();
    const handle = expectOk(await new RemoteString(session).attach(server.seedString('x')), 'attaching string');

    handle.detach();
    await handle.dispose();

    expect(server.callCount('releaseObjectUnchecked')).toBe(0);
  });

  it('should release owned children with the parent', async () => {
    const { session, server } = await createLiveSession();
    server.seedFile('/tmp/notes.txt', 'abc');
    const file = expectOk(
      await new RemoteFile(session).open('/tmp/notes.txt', FileFlag.READ_ONLY, 0, 0, 0),
      'opening file'
    );
    const fileId = file.objectId;
    const nameId = file.name?.objectId;

    await file.release();
    await session.settle();

    expect(file.name).toBeNull();
    expect(server.released).toContain(fileId);
    expect(server.released).toContain(nameId);
    expect(server.liveObjectCount()).toBe(0);
  });

  it('should reject operations on an unattached handle', async () => {
    const { session } = await createLiveSession();
    await expect(new RemoteString(session).update()).rejects.toThrow('Cannot update unattached string object');
  });
});
