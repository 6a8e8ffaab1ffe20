import { ok, err, type Result } from 'neverthrow';
import { NO_OBJECT_ID } from '../protocol/ids.js';
import { CallbackId, RepeatMode, SchedulerState, StdioRedirection } from '../protocol/constants.js';
import { ErrorCode, isSuccess } from '../protocol/error-codes.js';
import { ProgramEventPayload, type ProgramEvent } from '../connection/event-payloads.js';
import { MisuseError, type ObjectApiError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatObjectApiError } from '../errors/formatter.js';
import { checked } from './checked-call.js';
import { AttachBatch, attachOrRelease } from './attach-or-release.js';
import { ArgumentScope, attachCommand, type CommandInput, type Resolved } from './command.js';
import { RemoteHandle } from './remote-handle.js';
import { RemoteList } from './remote-list.js';
import { RemoteProcess } from './remote-process.js';
import { RemoteString } from './remote-string.js';
import { requireAttached, type StringArgument } from './string-argument.js';

export interface StdioTarget {
  /** One of `StdioRedirection`. */
  readonly redirection: number;
  /** Required for `StdioRedirection.FILE`, ignored otherwise. */
  readonly fileName?: StringArgument;
}

export interface ScheduleInput {
  readonly startCondition: number;
  readonly startTimestamp: number;
  readonly startDelay: number;
  readonly repeatMode: number;
  readonly repeatInterval: number;
  /** Cron fields; required for `RepeatMode.CRON`, ignored otherwise. */
  readonly repeatFields?: StringArgument;
}

export type ProgramCallback = (program: RemoteProgram) => void;

interface SchedulerSnapshot {
  readonly state: number;
  readonly timestamp: number;
  readonly message: RemoteString | null;
}

/**
 * A program definition on the server: command, stdio redirection, schedule
 * and custom options, plus what the scheduler is doing with it.
 */
export class RemoteProgram extends RemoteHandle {
  readonly kind = 'program';

  schedulerStateChangedCallback: ProgramCallback | null = null;
  processSpawnedCallback: ProgramCallback | null = null;

  private _identifier: RemoteString | null = null;
  private _rootDirectory: RemoteString | null = null;
  private _executable: RemoteString | null = null;
  private _arguments: RemoteList | null = null;
  private _environment: RemoteList | null = null;
  private _workingDirectory: RemoteString | null = null;
  private _stdinRedirection: number | null = null;
  private _stdinFileName: RemoteString | null = null;
  private _stdoutRedirection: number | null = null;
  private _stdoutFileName: RemoteString | null = null;
  private _stderrRedirection: number | null = null;
  private _stderrFileName: RemoteString | null = null;
  private _startCondition: number | null = null;
  private _startTimestamp: number | null = null;
  private _startDelay: number | null = null;
  private _repeatMode: number | null = null;
  private _repeatInterval: number | null = null;
  private _repeatFields: RemoteString | null = null;
  private _schedulerState: number | null = null;
  private _schedulerTimestamp: number | null = null;
  private _schedulerMessage: RemoteString | null = null;
  private _lastSpawnedProcess: RemoteProcess | null = null;
  private _lastSpawnedTimestamp: number | null = null;
  private _customOptions: Map<string, RemoteString> | null = null;

  get identifier(): RemoteString | null {
    return this._identifier;
  }
  get rootDirectory(): RemoteString | null {
    return this._rootDirectory;
  }
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
  get stdinRedirection(): number | null {
    return this._stdinRedirection;
  }
  get stdinFileName(): RemoteString | null {
    return this._stdinFileName;
  }
  get stdoutRedirection(): number | null {
    return this._stdoutRedirection;
  }
  get stdoutFileName(): RemoteString | null {
    return this._stdoutFileName;
  }
  get stderrRedirection(): number | null {
    return this._stderrRedirection;
  }
  get stderrFileName(): RemoteString | null {
    return this._stderrFileName;
  }
  get startCondition(): number | null {
    return this._startCondition;
  }
  get startTimestamp(): number | null {
    return this._startTimestamp;
  }
  get startDelay(): number | null {
    return this._startDelay;
  }
  get repeatMode(): number | null {
    return this._repeatMode;
  }
  get repeatInterval(): number | null {
    return this._repeatInterval;
  }
  get repeatFields(): RemoteString | null {
    return this._repeatFields;
  }
  get schedulerState(): number | null {
    return this._schedulerState;
  }
  get schedulerTimestamp(): number | null {
    return this._schedulerTimestamp;
  }
  /** Only set while the scheduler is in `ERROR_OCCURRED`. */
  get schedulerMessage(): RemoteString | null {
    return this._schedulerMessage;
  }
  get lastSpawnedProcess(): RemoteProcess | null {
    return this._lastSpawnedProcess;
  }
  get lastSpawnedTimestamp(): number | null {
    return this._lastSpawnedTimestamp;
  }
  get customOptions(): ReadonlyMap<string, RemoteString> | null {
    return this._customOptions;
  }

  protected resetFields(): void {
    this._identifier = null;
    this._rootDirectory = null;
    this._executable = null;
    this._arguments = null;
    this._environment = null;
    this._workingDirectory = null;
    this._stdinRedirection = null;
    this._stdinFileName = null;
    this._stdoutRedirection = null;
    this._stdoutFileName = null;
    this._stderrRedirection = null;
    this._stderrFileName = null;
    this._startCondition = null;
    this._startTimestamp = null;
    this._startDelay = null;
    this._repeatMode = null;
    this._repeatInterval = null;
    this._repeatFields = null;
    this._schedulerState = null;
    this._schedulerTimestamp = null;
    this._schedulerMessage = null;
    this._lastSpawnedProcess = null;
    this._lastSpawnedTimestamp = null;
    this._customOptions = null;
  }

  protected override attachCallbacks(): void {
    this.listen(CallbackId.PROGRAM_SCHEDULER_STATE_CHANGED, ProgramEventPayload, RemoteProgram.onSchedulerStateChanged);
    this.listen(CallbackId.PROGRAM_PROCESS_SPAWNED, ProgramEventPayload, RemoteProgram.onProcessSpawned);
  }

  async update(): Promise<Result<void, ObjectApiError>> {
    const steps = [
      () => this.updateIdentifier(),
      () => this.updateRootDirectory(),
      () => this.updateCommand(),
      () => this.updateStdioRedirection(),
      () => this.updateSchedule(),
      () => this.updateSchedulerState(),
      () => this.updateLastSpawnedProcess(),
      () => this.updateCustomOptions(),
    ];
    for (const step of steps) {
      const result = await step();
      if (result.isErr()) return result;
    }
    return ok(undefined);
  }

  async updateIdentifier(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');

    const reply = await checked(
      this.transport.getProgramIdentifier(programId, sessionId),
      `Could not get identifier of program object ${programId}`
    );
    if (reply.isErr()) return err(reply.error);

    const identifier = await attachOrRelease(new RemoteString(this.session), reply.value.identifierStringId);
    if (identifier.isErr()) return err(identifier.error);
    this._identifier = this.replaceChild(this._identifier, identifier.value, 'owned');
    return ok(undefined);
  }

  async updateRootDirectory(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');

    const reply = await checked(
      this.transport.getProgramRootDirectory(programId, sessionId),
      `Could not get root directory of program object ${programId}`
    );
    if (reply.isErr()) return err(reply.error);

    const rootDirectory = await attachOrRelease(new RemoteString(this.session), reply.value.rootDirectoryStringId);
    if (rootDirectory.isErr()) return err(rootDirectory.error);
    this._rootDirectory = this.replaceChild(this._rootDirectory, rootDirectory.value, 'owned');
    return ok(undefined);
  }

  async updateCommand(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');

    const reply = await checked(
      this.transport.getProgramCommand(programId, sessionId),
      `Could not get command of program object ${programId}`
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

  /** File names are only present (and only fetched) for `FILE` redirections. */
  async updateStdioRedirection(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');

    const reply = await checked(
      this.transport.getProgramStdioRedirection(programId, sessionId),
      `Could not get stdio redirection of program object ${programId}`
    );
    if (reply.isErr()) return err(reply.error);

    const slots = [
      [reply.value.stdinRedirection, reply.value.stdinFileNameStringId],
      [reply.value.stdoutRedirection, reply.value.stdoutFileNameStringId],
      [reply.value.stderrRedirection, reply.value.stderrFileNameStringId],
    ] as const;

    const batch = new AttachBatch(
      this.session,
      slots.filter(([redirection]) => redirection === StdioRedirection.FILE).map(([, nameId]) => nameId)
    );
    const names: (RemoteString | null)[] = [];
    for (const [redirection, nameId] of slots) {
      if (redirection !== StdioRedirection.FILE) {
        names.push(null);
        continue;
      }
      const name = await batch.attach(new RemoteString(this.session), nameId);
      if (name.isErr()) return err(name.error);
      names.push(name.value);
    }

    const [stdinName = null, stdoutName = null, stderrName = null] = names;
    this._stdinRedirection = reply.value.stdinRedirection;
    this._stdinFileName = this.replaceChild(this._stdinFileName, stdinName, 'owned');
    this._stdoutRedirection = reply.value.stdoutRedirection;
    this._stdoutFileName = this.replaceChild(this._stdoutFileName, stdoutName, 'owned');
    this._stderrRedirection = reply.value.stderrRedirection;
    this._stderrFileName = this.replaceChild(this._stderrFileName, stderrName, 'owned');
    return ok(undefined);
  }

  async updateSchedule(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');

    const reply = await checked(
      this.transport.getProgramSchedule(programId, sessionId),
      `Could not get schedule of program object ${programId}`
    );
    if (reply.isErr()) return err(reply.error);

    const { startCondition, startTimestamp, startDelay, repeatMode, repeatInterval, repeatFieldsStringId } = reply.value;
    let repeatFields: RemoteString | null = null;
    if (repeatMode === RepeatMode.CRON) {
      const attached = await attachOrRelease(new RemoteString(this.session), repeatFieldsStringId);
      if (attached.isErr()) return err(attached.error);
      repeatFields = attached.value;
    }

    this._startCondition = startCondition;
    this._startTimestamp = startTimestamp;
    this._startDelay = startDelay;
    this._repeatMode = repeatMode;
    this._repeatInterval = repeatInterval;
    this._repeatFields = this.replaceChild(this._repeatFields, repeatFields, 'owned');
    return ok(undefined);
  }

  async updateSchedulerState(): Promise<Result<void, ObjectApiError>> {
    const snapshot = await this.fetchSchedulerState();
    if (snapshot.isErr()) return err(snapshot.error);
    this.applySchedulerState(snapshot.value);
    return ok(undefined);
  }

  /** A program that never spawned anything has no last process; that is not an error. */
  async updateLastSpawnedProcess(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');
    const message = `Could not get last spawned process of program object ${programId}`;

    const reply = await this.transport.getLastSpawnedProgramProcess(programId, sessionId);
    if (reply.isErr()) return err(Err.transportFailed(message, reply.error));

    const { errorCode, processId, timestamp } = reply.value;
    if (errorCode === ErrorCode.DOES_NOT_EXIST) {
      this._lastSpawnedProcess = this.replaceChild(this._lastSpawnedProcess, null, 'owned');
      this._lastSpawnedTimestamp = null;
      return ok(undefined);
    }
    if (!isSuccess(errorCode)) return err(Err.remote(message, errorCode));

    const process = await attachOrRelease(new RemoteProcess(this.session), processId);
    if (process.isErr()) return err(process.error);

    this._lastSpawnedProcess = this.replaceChild(this._lastSpawnedProcess, process.value, 'owned');
    this._lastSpawnedTimestamp = timestamp;
    return ok(undefined);
  }

  async updateCustomOptions(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');

    const reply = await checked(
      this.transport.getCustomProgramOptionNames(programId, sessionId),
      `Could not get list of custom option names of program object ${programId}`
    );
    if (reply.isErr()) return err(reply.error);

    const names = await attachOrRelease(new RemoteList(this.session), reply.value.namesListId);
    if (names.isErr()) return err(names.error);

    const options = new Map<string, RemoteString>();
    try {
      for (const name of names.value.items ?? []) {
        if (!(name instanceof RemoteString)) {
          this.logger.warn({ programId, kind: name.kind }, 'custom option name is not a string; skipped');
          continue;
        }

        const value = await checked(
          this.transport.getCustomProgramOptionValue(programId, requireAttached(name), sessionId),
          `Could not get custom option value of program object ${programId}`
        );
        if (value.isErr()) return this.dropOptions(options, value.error);

        const attached = await attachOrRelease(new RemoteString(this.session), value.value.valueStringId);
        if (attached.isErr()) return this.dropOptions(options, attached.error);

        const duplicate = options.get(name.toString());
        if (duplicate !== undefined) await duplicate.release();
        options.set(name.toString(), attached.value);
      }
    } finally {
      await names.value.release();
    }

    this.replaceOptions(options);
    return ok(undefined);
  }

  /**
   * Defines a new program named `identifier` and attaches to it, fully refreshed.
   */
  async define(identifier: StringArgument): Promise<Result<this, ObjectApiError>> {
    await this.release();
    const sessionId = this.session.requireSessionId('define program');

    const scope = new ArgumentScope(this.session);
    try {
      const name = await scope.string(identifier);
      if (name.isErr()) return err(name.error);

      const defined = await checked(
        this.transport.defineProgram(name.value.objectId, sessionId),
        'Could not define program object'
      );
      if (defined.isErr()) return err(defined.error);

      return await this.adopt(defined.value.programId, true);
    } finally {
      // the refreshed program holds its own identifier string
      await scope.releaseAllocated();
    }
  }

  /** Deletes the program on the server. The cookie guards against purging the wrong one. */
  async purge(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('purge');
    const purged = await checked(
      this.transport.purgeProgram(programId, purgeCookie(this._identifier?.toString() ?? '')),
      `Could not purge program object ${programId}`
    );
    return purged.map(() => undefined);
  }

  async setCommand(input: CommandInput): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('set command for');

    const scope = new ArgumentScope(this.session);
    const command = await scope.command(input);
    if (command.isErr()) {
      await scope.releaseAllocated();
      return err(command.error);
    }

    const { executable, arguments: args, environment, workingDirectory } = command.value;
    const set = await checked(
      this.transport.setProgramCommand(
        programId,
        executable.objectId,
        args.objectId,
        environment.objectId,
        workingDirectory.objectId
      ),
      `Could not set command for program object ${programId}`
    );
    if (set.isErr()) {
      await scope.releaseAllocated();
      return err(set.error);
    }

    this._executable = this.replaceChild(this._executable, executable.handle, executable.ownership);
    this._arguments = this.replaceChild(this._arguments, args.handle, args.ownership);
    this._environment = this.replaceChild(this._environment, environment.handle, environment.ownership);
    this._workingDirectory = this.replaceChild(
      this._workingDirectory,
      workingDirectory.handle,
      workingDirectory.ownership
    );
    return ok(undefined);
  }

  async setStdioRedirection(
    stdin: StdioTarget,
    stdout: StdioTarget,
    stderr: StdioTarget
  ): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('set stdio redirection for');
    const fileName = (target: StdioTarget): StringArgument | null => {
      if (target.redirection !== StdioRedirection.FILE) return null;
      if (target.fileName === undefined) {
        throw new MisuseError('File redirection requires a file name');
      }
      return target.fileName;
    };
    const requested = [fileName(stdin), fileName(stdout), fileName(stderr)];

    const scope = new ArgumentScope(this.session);
    const resolved: (Resolved<RemoteString> | null)[] = [];
    for (const name of requested) {
      if (name === null) {
        resolved.push(null);
        continue;
      }
      const value = await scope.string(name);
      if (value.isErr()) {
        await scope.releaseAllocated();
        return err(value.error);
      }
      resolved.push(value.value);
    }

    const [stdinName = null, stdoutName = null, stderrName = null] = resolved;
    const set = await checked(
      this.transport.setProgramStdioRedirection(programId, {
        stdinRedirection: stdin.redirection,
        stdinFileNameStringId: stdinName?.objectId ?? NO_OBJECT_ID,
        stdoutRedirection: stdout.redirection,
        stdoutFileNameStringId: stdoutName?.objectId ?? NO_OBJECT_ID,
        stderrRedirection: stderr.redirection,
        stderrFileNameStringId: stderrName?.objectId ?? NO_OBJECT_ID,
      }),
      `Could not set stdio redirection for program object ${programId}`
    );
    if (set.isErr()) {
      await scope.releaseAllocated();
      return err(set.error);
    }

    this._stdinRedirection = stdin.redirection;
    this._stdinFileName = this.replaceChild(this._stdinFileName, stdinName?.handle ?? null, stdinName?.ownership ?? 'owned');
    this._stdoutRedirection = stdout.redirection;
    this._stdoutFileName = this.replaceChild(
      this._stdoutFileName,
      stdoutName?.handle ?? null,
      stdoutName?.ownership ?? 'owned'
    );
    this._stderrRedirection = stderr.redirection;
    this._stderrFileName = this.replaceChild(
      this._stderrFileName,
      stderrName?.handle ?? null,
      stderrName?.ownership ?? 'owned'
    );
    return ok(undefined);
  }

  async setSchedule(input: ScheduleInput): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('set schedule for');
    const cron = input.repeatMode === RepeatMode.CRON;
    if (cron && input.repeatFields === undefined) {
      throw new MisuseError('Cron repeat mode requires repeat fields');
    }

    const scope = new ArgumentScope(this.session);
    let repeatFields: Resolved<RemoteString> | null = null;
    if (cron && input.repeatFields !== undefined) {
      const resolved = await scope.string(input.repeatFields);
      if (resolved.isErr()) return err(resolved.error);
      repeatFields = resolved.value;
    }

    const set = await checked(
      this.transport.setProgramSchedule(programId, {
        startCondition: input.startCondition,
        startTimestamp: input.startTimestamp,
        startDelay: input.startDelay,
        repeatMode: input.repeatMode,
        repeatInterval: input.repeatInterval,
        repeatFieldsStringId: repeatFields?.objectId ?? NO_OBJECT_ID,
      }),
      `Could not set schedule for program object ${programId}`
    );
    if (set.isErr()) {
      await scope.releaseAllocated();
      return err(set.error);
    }

    this._startCondition = input.startCondition;
    this._startTimestamp = input.startTimestamp;
    this._startDelay = input.startDelay;
    this._repeatMode = input.repeatMode;
    this._repeatInterval = input.repeatInterval;
    this._repeatFields = this.replaceChild(
      this._repeatFields,
      repeatFields?.handle ?? null,
      repeatFields?.ownership ?? 'owned'
    );
    return ok(undefined);
  }

  async scheduleNow(): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('schedule');
    const scheduled = await checked(
      this.transport.scheduleProgramNow(programId),
      `Could not schedule program object ${programId} now`
    );
    return scheduled.map(() => undefined);
  }

  async setCustomOptionValue(name: StringArgument, value: StringArgument): Promise<Result<void, ObjectApiError>> {
    const programId = this.requireObjectId('set custom option for');

    const scope = new ArgumentScope(this.session);
    const resolvedName = await scope.string(name);
    if (resolvedName.isErr()) return err(resolvedName.error);
    const resolvedValue = await scope.string(value);
    if (resolvedValue.isErr()) {
      await scope.releaseAllocated();
      return err(resolvedValue.error);
    }

    const set = await checked(
      this.transport.setCustomProgramOptionValue(programId, resolvedName.value.objectId, resolvedValue.value.objectId),
      `Could not set custom option for program object ${programId}`
    );

    const key = typeof name === 'string' ? name : name.toString();
    if (set.isErr()) {
      await scope.releaseAllocated();
      return err(set.error);
    }
    if (resolvedName.value.ownership === 'owned') {
      await resolvedName.value.handle.release();
    }

    const options = this._customOptions ?? new Map<string, RemoteString>();
    const previous = options.get(key) ?? null;
    const next = this.replaceChild(previous, resolvedValue.value.handle, resolvedValue.value.ownership);
    if (next !== null) options.set(key, next);
    this._customOptions = options;
    return ok(undefined);
  }

  /**
   * Parses a custom option with `parse`; a missing option or a `parse` that
   * throws yields `fallback`.
   */
  castCustomOptionValue<T>(name: string, parse: (text: string) => T, fallback: T): T {
    const value = this._customOptions?.get(name);
    if (value === undefined) return fallback;
    try {
      return parse(value.toString());
    } catch {
      return fallback;
    }
  }

  private async fetchSchedulerState(): Promise<Result<SchedulerSnapshot, ObjectApiError>> {
    const programId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update program');

    const reply = await checked(
      this.transport.getProgramSchedulerState(programId, sessionId),
      `Could not get scheduler state of program object ${programId}`
    );
    if (reply.isErr()) return err(reply.error);

    const { state, timestamp, messageStringId } = reply.value;
    if (state !== SchedulerState.ERROR_OCCURRED) {
      return ok({ state, timestamp, message: null });
    }

    const message = await attachOrRelease(new RemoteString(this.session), messageStringId);
    if (message.isErr()) return err(message.error);
    return ok({ state, timestamp, message: message.value });
  }

  private applySchedulerState({ state, timestamp, message }: SchedulerSnapshot): void {
    this._schedulerState = state;
    this._schedulerTimestamp = timestamp;
    this._schedulerMessage = this.replaceChild(this._schedulerMessage, message, 'owned');
  }

  private replaceOptions(options: Map<string, RemoteString>): void {
    for (const [key, previous] of this._customOptions ?? []) {
      if (options.get(key) !== previous) this.replaceChild(previous, null, 'owned');
    }
    for (const value of options.values()) this.own(value);
    this._customOptions = options;
  }

  private async dropOptions(
    options: Map<string, RemoteString>,
    error: ObjectApiError
  ): Promise<Result<void, ObjectApiError>> {
    await Promise.all([...options.values()].map((value) => value.release()));
    return err(error);
  }

  private static async onSchedulerStateChanged(program: RemoteProgram, [programId]: ProgramEvent): Promise<void> {
    if (program.objectId !== programId || !program.session.isAlive) return;

    const snapshot = await program.fetchSchedulerState();
    if (snapshot.isErr()) {
      program.logger.warn({ programId, error: formatObjectApiError(snapshot.error) }, 'scheduler state refresh failed');
      return;
    }
    // detached while the refresh was in flight
    if (program.objectId !== programId) {
      await snapshot.value.message?.release();
      return;
    }

    program.applySchedulerState(snapshot.value);
    program.schedulerStateChangedCallback?.(program);
  }

  private static async onProcessSpawned(program: RemoteProgram, [programId]: ProgramEvent): Promise<void> {
    if (program.objectId !== programId || !program.session.isAlive) return;

    const sessionId = program.session.requireSessionId('update program');
    const reply = await checked(
      program.transport.getLastSpawnedProgramProcess(programId, sessionId),
      `Could not get last spawned process of program object ${programId}`
    );
    if (reply.isErr()) {
      program.logger.warn({ programId, error: formatObjectApiError(reply.error) }, 'spawned process refresh failed');
      return;
    }

    const attached = await attachOrRelease(new RemoteProcess(program.session), reply.value.processId);
    if (attached.isErr()) {
      program.logger.warn({ programId, error: formatObjectApiError(attached.error) }, 'spawned process refresh failed');
    }
    const process = attached.isOk() ? attached.value : null;

    if (program.objectId !== programId) {
      await process?.release();
      return;
    }

    program._lastSpawnedProcess = program.replaceChild(program._lastSpawnedProcess, process, 'owned');
    program._lastSpawnedTimestamp = reply.value.timestamp;
    program.processSpawnedCallback?.(program);
  }
}

/** Sum of the identifier's code points. */
export function purgeCookie(identifier: string): number {
  let cookie = 0;
  for (const character of identifier) {
    cookie += character.codePointAt(0) ?? 0;
  }
  return cookie;
}
