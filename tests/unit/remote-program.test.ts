import { describe, it, expect, vi } from 'vitest';
import { MisuseError } from '../../src/errors/index.js';
import { ErrorCode } from '../../src/protocol/error-codes.js';
import {
  ProcessState,
  RepeatMode,
  SchedulerState,
  StartCondition,
  StdioRedirection,
} from '../../src/protocol/constants.js';
import { RemoteProgram, purgeCookie } from '../../src/objects/remote-program.js';
import { RemoteString } from '../../src/objects/remote-string.js';
import { createLiveSession, type LiveSession } from '../helpers/test-container.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

const LOG = { redirection: StdioRedirection.LOG } as const;

async function defineProgram(harness: LiveSession, identifier = 'nightly-backup'): Promise<RemoteProgram> {
  return expectOk(await new RemoteProgram(harness.session).define(identifier), `defining ${identifier}`);
}

function requireId(program: RemoteProgram): NonNullable<RemoteProgram['objectId']> {
  if (program.objectId === null) throw new Error('program is not attached');
  return program.objectId;
}

describe('purgeCookie', () => {
  it('should sum the code points of the identifier', () => {
    expect(purgeCookie('abc')).toBe(294);
    expect(purgeCookie('')).toBe(0);
  });
});

describe('RemoteProgram', () => {
  describe('define', () => {
    it('should attach to the new program with the server defaults', async () => {
      const harness = await createLiveSession();

      const program = await defineProgram(harness);

      expect(program.identifier?.data).toBe('nightly-backup');
      expect(program.rootDirectory?.data).toBe('/programs/nightly-backup');
      expect(program.executable?.data).toBe('');
      expect(program.arguments?.items).toEqual([]);
      expect(program.workingDirectory?.data).toBe('.');
      expect(program.stdinRedirection).toBe(StdioRedirection.DEV_NULL);
      expect(program.stdoutRedirection).toBe(StdioRedirection.LOG);
      expect(program.stdinFileName).toBeNull();
      expect(program.startCondition).toBe(StartCondition.NEVER);
      expect(program.repeatMode).toBe(RepeatMode.NEVER);
      expect(program.repeatFields).toBeNull();
      expect(program.schedulerState).toBe(SchedulerState.STOPPED);
      expect(program.schedulerMessage).toBeNull();
      expect(program.lastSpawnedProcess).toBeNull();
      expect(program.lastSpawnedTimestamp).toBeNull();
      expect(program.customOptions?.size).toBe(0);
    });

    it('should release the allocated identifier once the program holds its own', async () => {
      const harness = await createLiveSession();

      const program = await defineProgram(harness);
      await harness.session.settle();

      const allocatedIdentifier = harness.server.callsOf('defineProgram')[0]?.args[0];
      expect(harness.server.released).toContain(allocatedIdentifier);
      expect(program.identifier?.objectId).not.toBe(allocatedIdentifier);
    });

    it('should reject a second program with the same identifier', async () => {
      const harness = await createLiveSession();
      await defineProgram(harness);

      const duplicate = new RemoteProgram(harness.session);
      const error = expectErr(await duplicate.define('nightly-backup'), 'defining duplicate');

      expect(error).toMatchObject({
        _tag: 'Remote',
        code: ErrorCode.ALREADY_EXISTS,
        message: 'Could not define program object',
      });
      expect(duplicate.isAttached).toBe(false);
    });

    it('should accept an identifier string the caller holds', async () => {
      const harness = await createLiveSession();
      const identifier = expectOk(await new RemoteString(harness.session).allocate('reports'), 'allocating');

      const program = expectOk(await new RemoteProgram(harness.session).define(identifier), 'defining');
      await harness.session.settle();

      expect(program.identifier?.data).toBe('reports');
      expect(identifier.isAttached).toBe(true);
    });
  });

  describe('purge', () => {
    it('should purge once and report the second attempt', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness, 'abc');

      expectOk(await program.purge(), 'purging');
      const error = expectErr(await program.purge(), 'purging twice');

      expect(harness.server.callsOf('purgeProgram')[0]?.args).toEqual([program.objectId, 294]);
      expect(error).toMatchObject({
        _tag: 'Remote',
        code: ErrorCode.PROGRAM_IS_PURGED,
        message: `Could not purge program object ${program.objectId}`,
      });
    });

    it('should free the identifier for a new definition', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      expectOk(await program.purge(), 'purging');

      const replacement = await defineProgram(harness);

      expect(replacement.objectId).not.toBe(program.objectId);
    });
  });

  describe('setCommand', () => {
    it('should store the command and read it back on refresh', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);

      expectOk(
        await program.setCommand({
          executable: '/usr/bin/backup',
          arguments: ['--full', '--quiet'],
          environment: ['TZ=UTC'],
          workingDirectory: '/var/backups',
        }),
        'setting command'
      );
      expect(program.executable?.data).toBe('/usr/bin/backup');

      expectOk(await program.updateCommand(), 'refreshing command');

      expect(program.executable?.data).toBe('/usr/bin/backup');
      expect(program.arguments?.items?.map(String)).toEqual(['--full', '--quiet']);
      expect(program.environment?.items?.map(String)).toEqual(['TZ=UTC']);
      expect(program.workingDirectory?.data).toBe('/var/backups');
    });

    it('should release the allocated arguments when the server refuses', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      await harness.session.settle();
      const liveBefore = harness.server.liveObjectCount();
      harness.server.failOn('setProgramCommand', { errorCode: ErrorCode.INVALID_PARAMETER });

      const error = expectErr(
        await program.setCommand({ executable: '/bin/true', arguments: ['x'], environment: [], workingDirectory: '/' }),
        'setting refused command'
      );
      await harness.session.settle();

      expect(error.message).toBe(`Could not set command for program object ${program.objectId}`);
      expect(program.executable?.data).toBe('');
      expect(harness.server.liveObjectCount()).toBe(liveBefore);
    });
  });

  describe('setStdioRedirection', () => {
    it('should require a file name for file redirection', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);

      await expect(
        program.setStdioRedirection({ redirection: StdioRedirection.FILE }, LOG, LOG)
      ).rejects.toThrow(new MisuseError('File redirection requires a file name'));
      expect(harness.server.callCount('setProgramStdioRedirection')).toBe(0);
    });

    it('should store a file redirection and read the name back', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      const allocationsBefore = harness.server.callCount('allocateString');

      expectOk(
        await program.setStdioRedirection(
          { redirection: StdioRedirection.DEV_NULL, fileName: '/ignored' },
          { redirection: StdioRedirection.FILE, fileName: '/var/log/backup.out' },
          { redirection: StdioRedirection.STDOUT }
        ),
        'setting redirection'
      );
      expect(harness.server.callCount('allocateString')).toBe(allocationsBefore + 1);

      expectOk(await program.updateStdioRedirection(), 'refreshing redirection');

      expect(program.stdinRedirection).toBe(StdioRedirection.DEV_NULL);
      expect(program.stdinFileName).toBeNull();
      expect(program.stdoutRedirection).toBe(StdioRedirection.FILE);
      expect(program.stdoutFileName?.data).toBe('/var/log/backup.out');
      expect(program.stderrRedirection).toBe(StdioRedirection.STDOUT);
      expect(program.stderrFileName).toBeNull();
    });
  });

  describe('setSchedule', () => {
    it('should require repeat fields for cron mode', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);

      await expect(
        program.setSchedule({
          startCondition: StartCondition.NOW,
          startTimestamp: 0,
          startDelay: 0,
          repeatMode: RepeatMode.CRON,
          repeatInterval: 0,
        })
      ).rejects.toThrow('Cron repeat mode requires repeat fields');
    });

    it('should store a cron schedule and read it back', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);

      expectOk(
        await program.setSchedule({
          startCondition: StartCondition.REBOOT,
          startTimestamp: 0,
          startDelay: 30,
          repeatMode: RepeatMode.CRON,
          repeatInterval: 0,
          repeatFields: '0 3 * * *',
        }),
        'setting schedule'
      );
      expectOk(await program.updateSchedule(), 'refreshing schedule');

      expect(program.startCondition).toBe(StartCondition.REBOOT);
      expect(program.startDelay).toBe(30);
      expect(program.repeatMode).toBe(RepeatMode.CRON);
      expect(program.repeatFields?.data).toBe('0 3 * * *');
    });

    it('should not allocate repeat fields outside cron mode', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      const allocationsBefore = harness.server.callCount('allocateString');

      expectOk(
        await program.setSchedule({
          startCondition: StartCondition.NOW,
          startTimestamp: 0,
          startDelay: 0,
          repeatMode: RepeatMode.INTERVAL,
          repeatInterval: 3600,
          repeatFields: '* * * * *',
        }),
        'setting interval schedule'
      );

      expect(harness.server.callCount('allocateString')).toBe(allocationsBefore);
      expect(program.repeatInterval).toBe(3600);
      expect(program.repeatFields).toBeNull();
    });
  });

  describe('scheduleNow', () => {
    it('should ask the scheduler to start the program', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);

      expectOk(await program.scheduleNow(), 'scheduling');

      expect(harness.server.callsOf('scheduleProgramNow')[0]?.args).toEqual([program.objectId]);
    });
  });

  describe('custom options', () => {
    it('should set a value and cast it', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);

      expectOk(await program.setCustomOptionValue('retries', '3'), 'setting option');

      expect(program.customOptions?.get('retries')?.data).toBe('3');
      expect(program.castCustomOptionValue('retries', Number, 0)).toBe(3);
    });

    it('should fall back for missing options and failing parsers', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      expectOk(await program.setCustomOptionValue('mode', 'fast'), 'setting option');

      const strict = (text: string): number => {
        const value = Number.parseInt(text, 10);
        if (Number.isNaN(value)) throw new Error(`not a number: ${text}`);
        return value;
      };

      expect(program.castCustomOptionValue('missing', strict, 7)).toBe(7);
      expect(program.castCustomOptionValue('mode', strict, 7)).toBe(7);
    });

    it('should read options set on the server', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      harness.server.setCustomOption(requireId(program), 'keep-days', '14');
      harness.server.setCustomOption(requireId(program), 'compress', 'yes');

      expectOk(await program.updateCustomOptions(), 'refreshing options');

      expect([...(program.customOptions?.keys() ?? [])].sort()).toEqual(['compress', 'keep-days']);
      expect(program.castCustomOptionValue('keep-days', Number, 0)).toBe(14);
    });

    it('should replace the previous option values on refresh', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      expectOk(await program.setCustomOptionValue('retries', '3'), 'setting option');
      const first = program.customOptions?.get('retries');

      expectOk(await program.updateCustomOptions(), 'refreshing options');
      await harness.session.settle();

      expect(first?.isAttached).toBe(false);
      expect(program.customOptions?.get('retries')?.data).toBe('3');
    });
  });

  describe('push events', () => {
    it('should refresh the scheduler state and fetch the error message', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      const callback = vi.fn();
      program.schedulerStateChangedCallback = callback;

      harness.server.changeSchedulerState(requireId(program), SchedulerState.ERROR_OCCURRED, 'disk full');
      await harness.session.settle();

      expect(program.schedulerState).toBe(SchedulerState.ERROR_OCCURRED);
      expect(program.schedulerTimestamp).toBe(1_700_000_001);
      expect(program.schedulerMessage?.data).toBe('disk full');
      expect(callback).toHaveBeenCalledWith(program);
    });

    it('should drop the message once the scheduler recovers', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      harness.server.changeSchedulerState(requireId(program), SchedulerState.ERROR_OCCURRED, 'disk full');
      await harness.session.settle();
      const message = program.schedulerMessage;

      harness.server.changeSchedulerState(requireId(program), SchedulerState.WAITING_FOR_START_CONDITION);
      await harness.session.settle();

      expect(program.schedulerState).toBe(SchedulerState.WAITING_FOR_START_CONDITION);
      expect(program.schedulerMessage).toBeNull();
      expect(message?.isAttached).toBe(false);
    });

    it('should attach the spawned process', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      expectOk(
        await program.setCommand({ executable: '/usr/bin/backup', arguments: [], environment: [], workingDirectory: '/' }),
        'setting command'
      );
      const callback = vi.fn();
      program.processSpawnedCallback = callback;

      harness.server.spawnForProgram(requireId(program));
      await harness.session.settle();

      expect(program.lastSpawnedProcess?.pid).toBe(1000);
      expect(program.lastSpawnedProcess?.state).toBe(ProcessState.RUNNING);
      expect(program.lastSpawnedProcess?.executable?.data).toBe('/usr/bin/backup');
      expect(program.lastSpawnedTimestamp).toBe(1_700_000_001);
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it('should log and keep going when the spawned process cannot be fetched', async () => {
      const harness = await createLiveSession();
      const program = await defineProgram(harness);
      const callback = vi.fn();
      program.processSpawnedCallback = callback;
      harness.server.failOn('getLastSpawnedProgramProcess', { errorCode: ErrorCode.INTERNAL_ERROR });

      harness.server.spawnForProgram(requireId(program));
      await harness.session.settle();

      expect(harness.loggerFactory.hasEntry('warn', 'spawned process refresh failed')).toBe(true);
      expect(program.lastSpawnedProcess).toBeNull();
      expect(callback).not.toHaveBeenCalled();
    });

    it('should ignore events for other programs', async () => {
      const harness = await createLiveSession();
      const first = await defineProgram(harness, 'first');
      const second = await defineProgram(harness, 'second');
      const callback = vi.fn();
      first.schedulerStateChangedCallback = callback;

      harness.server.changeSchedulerState(requireId(second), SchedulerState.DELAYING_START);
      await harness.session.settle();

      expect(callback).not.toHaveBeenCalled();
      expect(first.schedulerState).toBe(SchedulerState.STOPPED);
      expect(second.schedulerState).toBe(SchedulerState.DELAYING_START);
    });
  });
});
