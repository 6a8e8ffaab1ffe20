import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../src/protocol/error-codes.js';
import { DirectoryEntryType } from '../../src/protocol/constants.js';
import { RemoteDirectory } from '../../src/objects/remote-directory.js';
import { createLiveSession } from '../helpers/test-container.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('RemoteDirectory', () => {
  it('should list every entry after opening', async () => {
    const { session, server } = await createLiveSession();
    server.seedDirectory('/home/demo', [
      { name: 'notes.txt', type: DirectoryEntryType.REGULAR },
      { name: 'bin', type: DirectoryEntryType.DIRECTORY },
    ]);

    const directory = expectOk(await new RemoteDirectory(session).open('/home/demo'), 'opening directory');

    expect(directory.name?.data).toBe('/home/demo');
    expect(directory.entries?.map((entry) => [entry.name.data, entry.type])).toEqual([
      ['notes.txt', DirectoryEntryType.REGULAR],
      ['bin', DirectoryEntryType.DIRECTORY],
    ]);
  });

  it('should rewind before each listing', async () => {
    const { session, server } = await createLiveSession();
    server.seedDirectory('/srv', [{ name: 'a', type: DirectoryEntryType.REGULAR }]);
    const directory = expectOk(await new RemoteDirectory(session).open('/srv'), 'opening directory');
    const [before] = directory.entries ?? [];

    expectOk(await directory.update(), 'listing again');
    await session.settle();

    expect(server.callCount('rewindDirectory')).toBe(2);
    expect(directory.entries?.map((entry) => entry.name.data)).toEqual(['a']);
    expect(before?.name.isAttached).toBe(false);
  });

  it('should list an empty directory', async () => {
    const { session, server } = await createLiveSession();
    server.seedDirectory('/empty', []);

    const directory = expectOk(await new RemoteDirectory(session).open('/empty'), 'opening empty directory');

    expect(directory.entries).toEqual([]);
  });

  it('should release the entries read so far when a later one fails', async () => {
    const { session, server } = await createLiveSession();
    server.seedDirectory('/srv', [
      { name: 'a', type: DirectoryEntryType.REGULAR },
      { name: 'b', type: DirectoryEntryType.REGULAR },
    ]);
    server.failOn('getNextDirectoryEntry', { errorCode: ErrorCode.INTERNAL_ERROR }, { skip: 1 });

    const error = expectErr(await new RemoteDirectory(session).open('/srv'), 'opening with failing listing');
    await session.settle();

    expect(error.message).toMatch(/^Could not get next entry of directory object \d+$/);
    expect(server.liveObjectCount()).toBe(0);
  });

  it('should fail for a missing directory', async () => {
    const { session } = await createLiveSession();

    const error = expectErr(await new RemoteDirectory(session).open('/missing'), 'opening missing directory');

    expect(error).toEqual({
      _tag: 'Remote',
      code: ErrorCode.DOES_NOT_EXIST,
      codeName: 'E_DOES_NOT_EXIST',
      message: 'Could not open directory object',
    });
  });
});
