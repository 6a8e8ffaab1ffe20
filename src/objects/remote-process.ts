import { ok, err, type Result } from 'neverthrow';
import { CallbackId, ProcessState } from '../protocol/constants.js';
import { ProcessStateChangedPayload, type ProcessStateChangedEvent } from '../connection/event-payloads.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { checked } from './checked-call.js';
import { AttachBatch } from './attach-or-release.js';
import { ArgumentScope, attachCommand, type CommandInput } from './command.js';
import type { FileBase } from './file-base.js';
import { RemoteFile } from './remote-file.js';
import { RemoteHandle } from './remote-handle.js';
import type { RemoteList } from './remote-list.js';
import type { RemoteString } from './remote-string.js';
import { requireAttached } from './string-argument.js';

export interface SpawnOptions extends CommandInput {
  readonly uid: number;
  readonly gid: number;
  readonly stdin: FileBase;
  readonly stdout: FileBase;
  readonly stderr: FileBase;
}

export type ProcessStateChangedCallback = (process: RemoteProcess) => void;

export class RemoteProcess extends RemoteHandle {
  readonly kind = 'process';

  /** Invoked after a state-changed event has been applied. Survives re-attach. */
  stateChangedCallback: ProcessStateChangedCallback | null = null;

  private _executable: RemoteString | null = null;
  private _arguments: RemoteList | null = null;
  private _environment: RemoteList | null = null;
  private _workingDirectory: RemoteString | null = null;
  private _pid: number | null = null;
  private _uid: number | null = null;
  private _gid: number | null = null;
  private _stdin: FileBase | null = null;
  private _stdout: FileBase | null = null;
  private _stderr: FileBase | null = null;
  private _state: number | null = null;
  private _timestamp: number | null = null;
  private _exitCode: number | null = null;

  get executable(): RemoteString | null {
    return this._executable;
  }
  get arguments(): RemoteList | null {
    return this._arguments;
  }
  get environment(): RemoteList | null {
    return this._environment;
  }
  get workingDirectory(): RemoteString | null {
    return this._workingDirectory;
  }
  /** `null` once the process is no longer running or stopped. */
  get pid(): number | null {
    return this._pid;
  }
  get uid(): number | null {
    return this._uid;
  }
  get gid(): number | null {
    return this._gid;
  }
  get stdin(): FileBase | null {
    return this._stdin;
  }
  get stdout(): FileBase | null {
    return this._stdout;
  }
  get stderr(): FileBase | null {
    return this._stderr;
  }
  /** One of `ProcessState`. */
  get state(): number | null {
    return this._state;
  }
  get timestamp(): number | null {
    return this._timestamp;
  }
  get exitCode(): number | null {
    return this._exitCode;
  }

  protected resetFields(): void {
    this._executable = null;
    this._arguments = null;
    this._environment = null;
    this._workingDirectory = null;
    this._pid = null;
    this._uid = null;
    this._gid = null;
    this._stdin = null;
    this._stdout = null;
    this._stderr = null;
    this._state = null;
    this._timestamp = null;
    this._exitCode = null;
  }

  protected override attachCallbacks(): void {
    this.listen(CallbackId.PROCESS_STATE_CHANGED, ProcessStateChangedPayload, RemoteProcess.onStateChanged);
  }

  async update(): Promise<Result<void, ObjectApiError>> {
    const command = await this.updateCommand();
    if (command.isErr()) return command;
    const identity = await this.updateIdentity();
    if (identity.isErr()) return identity;
    const stdio = await this.updateStdio();
    if (stdio.isErr()) return stdio;
    return this.updateState();
  }

  async updateCommand(): Promise<Result<void, ObjectApiError>> {
    const processId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update process');

    const reply = await checked(
      this.transport.getProcessCommand(processId, sessionId),
      `Could not get command of process object ${processId}`
    );
    if (reply.isErr()) return err(reply.error);

    const command = await attachCommand(this.session, reply.value);
    if (command.isErr()) return err(command.error);

    this._executable = this.replaceChild(this._executable, command.value.executable, 'owned');
    this._arguments = this.replaceChild(this._arguments, command.value.arguments, 'owned');
    this._environment = this.replaceChild(this._environment, command.value.environment, 'owned');
    this._workingDirectory = this.replaceChild(this._workingDirectory, command.value.workingDirectory, 'owned');
    return ok(undefined);
  }

  async updateIdentity(): Promise<Result<void, ObjectApiError>> {
    const processId = this.requireObjectId('update');

    const reply = await checked(
      this.transport.getProcessIdentity(processId),
      `Could not get identity of process object ${processId}`
    );
    if (reply.isErr()) return err(reply.error);

    this._pid = reply.value.pid;
    this._uid = reply.value.uid;
    this._gid = reply.value.gid;
    return ok(undefined);
  }

  async updateStdio(): Promise<Result<void, ObjectApiError>> {
    const processId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update process');

    const reply = await checked(
      this.transport.getProcessStdio(processId, sessionId),
      `Could not get stdio of process object ${processId}`
    );
    if (reply.isErr()) return err(reply.error);

    const { stdinFileId, stdoutFileId, stderrFileId } = reply.value;
    const batch = new AttachBatch(this.session, [stdinFileId, stdoutFileId, stderrFileId]);

    const stdin = await batch.attach(new RemoteFile(this.session), stdinFileId);
    if (stdin.isErr()) return err(stdin.error);
    const stdout = await batch.attach(new RemoteFile(this.session), stdoutFileId);
    if (stdout.isErr()) return err(stdout.error);
    const stderr = await batch.attach(new RemoteFile(this.session), stderrFileId);
    if (stderr.isErr()) return err(stderr.error);

    this._stdin = this.replaceChild(this._stdin, stdin.value, 'owned');
    this._stdout = this.replaceChild(this._stdout, stdout.value, 'owned');
    this._stderr = this.replaceChild(this._stderr, stderr.value, 'owned');
    return ok(undefined);
  }

  async updateState(): Promise<Result<void, ObjectApiError>> {
    const processId = this.requireObjectId('update');

    const reply = await checked(
      this.transport.getProcessState(processId),
      `Could not get state of process object ${processId}`
    );
    if (reply.isErr()) return err(reply.error);

    this._state = reply.value.state;
    this._timestamp = reply.value.timestamp;
    this._exitCode = reply.value.exitCode;
    return ok(undefined);
  }

  /**
   * Spawns a new process and attaches to it. Plain strings and item arrays are
   * allocated for the call and owned by this handle afterwards; handles passed
   * in (including the stdio files) stay with the caller.
   */
  async spawn(options: SpawnOptions): Promise<Result<this, ObjectApiError>> {
    const stdinFileId = requireAttached(options.stdin);
    const stdoutFileId = requireAttached(options.stdout);
    const stderrFileId = requireAttached(options.stderr);

    await this.release();
    const sessionId = this.session.requireSessionId('spawn process');

    const scope = new ArgumentScope(this.session);
    const command = await scope.command(options);
    if (command.isErr()) {
      await scope.releaseAllocated();
      return err(command.error);
    }

    const { executable, arguments: args, environment, workingDirectory } = command.value;
    const spawned = await checked(
      this.transport.spawnProcess(
        {
          executableStringId: executable.objectId,
          argumentsListId: args.objectId,
          environmentListId: environment.objectId,
          workingDirectoryStringId: workingDirectory.objectId,
          uid: options.uid,
          gid: options.gid,
          stdinFileId,
          stdoutFileId,
          stderrFileId,
        },
        sessionId
      ),
      'Could not spawn process object'
    );
    if (spawned.isErr()) {
      await scope.releaseAllocated();
      return err(spawned.error);
    }

    const attached = await this.adopt(spawned.value.processId, false);
    if (attached.isErr()) {
      await scope.releaseAllocated();
      return err(attached.error);
    }

    this._executable = this.replaceChild(this._executable, executable.handle, executable.ownership);
    this._arguments = this.replaceChild(this._arguments, args.handle, args.ownership);
    this._environment = this.replaceChild(this._environment, environment.handle, environment.ownership);
    this._workingDirectory = this.replaceChild(
      this._workingDirectory,
      workingDirectory.handle,
      workingDirectory.ownership
    );
    this._uid = options.uid;
    this._gid = options.gid;
    this._stdin = this.replaceChild(this._stdin, options.stdin, 'borrowed');
    this._stdout = this.replaceChild(this._stdout, options.stdout, 'borrowed');
    this._stderr = this.replaceChild(this._stderr, options.stderr, 'borrowed');

    const identity = await this.updateIdentity();
    if (identity.isErr()) return err(identity.error);
    const state = await this.updateState();
    if (state.isErr()) return err(state.error);

    return ok(this);
  }

  /** `signal` is one of `ProcessSignal`. */
  async kill(signal: number): Promise<Result<void, ObjectApiError>> {
    const processId = this.requireObjectId('kill');
    const killed = await checked(
      this.transport.killProcess(processId, signal),
      `Could not kill process object ${processId}`
    );
    return killed.map(() => undefined);
  }

  private static onStateChanged(
    process: RemoteProcess,
    [processId, state, timestamp, exitCode]: ProcessStateChangedEvent
  ): void {
    if (process.objectId !== processId) return;

    process._state = state;
    process._timestamp = timestamp;
    process._exitCode = exitCode;

    if (state !== ProcessState.RUNNING && state !== ProcessState.STOPPED) {
      process._pid = null;
    }

    process.stateChangedCallback?.(process);
  }
}
