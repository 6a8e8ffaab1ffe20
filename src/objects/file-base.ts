import { ok, err, type Result } from 'neverthrow';
import type { ObjectId } from '../protocol/ids.js';
import { NO_OBJECT_ID } from '../protocol/ids.js';
import { ASYNC_BURST_CHUNKS, CallbackId, FileChunkLimit } from '../protocol/constants.js';
import { isSuccess } from '../protocol/error-codes.js';
import type { FileInfoReply } from '../ports/object-transport.port.js';
import {
  AsyncFileReadPayload,
  AsyncFileWritePayload,
  type AsyncFileReadEvent,
  type AsyncFileWriteEvent,
} from '../connection/event-payloads.js';
import { MisuseError, type ObjectApiError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { checked, checkedUntilEnd, sent, withTransferred } from './checked-call.js';
import { ByteAccumulator, getZeroPaddedChunk } from './chunking.js';
import { RemoteHandle } from './remote-handle.js';

const utf8Encoder = new TextEncoder();

export interface AsyncWriteCallbacks {
  /** Bytes acknowledged so far (including unchecked chunks) and total. */
  readonly onStatus?: (written: number, total: number) => void;
  /** Called exactly once: `null` on success. */
  readonly onComplete?: (error: ObjectApiError | null) => void;
}

export interface AsyncReadResult {
  readonly data: Uint8Array;
  readonly error: ObjectApiError | null;
}

interface AsyncWriteJob {
  readonly data: Uint8Array;
  written: number;
  readonly callbacks: AsyncWriteCallbacks;
}

interface AsyncReadJob {
  readonly data: ByteAccumulator;
  readonly maxLength: number;
  readonly onResult: (result: AsyncReadResult) => void;
  readonly onStatus?: (read: number, maxLength: number) => void;
}

/**
 * Shared body of files and pipes: file info fields plus the synchronous and
 * asynchronous transfer paths.
 *
 * Mid-transfer failures: synchronous transfers stop at the failing chunk and
 * report how many bytes went through (`transferred` on the remote error).
 * The server-side file position is then wherever that chunk left it; nothing
 * here seeks back.
 */
export abstract class FileBase extends RemoteHandle {
  private _type: number | null = null;
  private _flags: number | null = null;
  private _permissions: number | null = null;
  private _uid: number | null = null;
  private _gid: number | null = null;
  private _length: number | null = null;
  private _accessTime: number | null = null;
  private _modificationTime: number | null = null;
  private _statusChangeTime: number | null = null;

  private writeJob: AsyncWriteJob | null = null;
  private readJob: AsyncReadJob | null = null;

  get type(): number | null {
    return this._type;
  }
  get flags(): number | null {
    return this._flags;
  }
  get permissions(): number | null {
    return this._permissions;
  }
  get uid(): number | null {
    return this._uid;
  }
  get gid(): number | null {
    return this._gid;
  }
  get length(): number | null {
    return this._length;
  }
  get accessTime(): number | null {
    return this._accessTime;
  }
  get modificationTime(): number | null {
    return this._modificationTime;
  }
  get statusChangeTime(): number | null {
    return this._statusChangeTime;
  }

  get writeInProgress(): boolean {
    return this.writeJob !== null;
  }

  get readInProgress(): boolean {
    return this.readJob !== null;
  }

  /**
   * Takes ownership of the name string id from a file-info reply. Pipes have no
   * name; the default drops it.
   */
  protected async adoptName(_type: number, nameStringId: ObjectId): Promise<Result<void, ObjectApiError>> {
    if (nameStringId !== NO_OBJECT_ID) {
      await this.session.releaseObject(nameStringId);
    }
    return ok(undefined);
  }

  protected resetFields(): void {
    this._type = null;
    this._flags = null;
    this._permissions = null;
    this._uid = null;
    this._gid = null;
    this._length = null;
    this._accessTime = null;
    this._modificationTime = null;
    this._statusChangeTime = null;
  }

  protected override attachCallbacks(): void {
    this.listen(CallbackId.ASYNC_FILE_WRITE, AsyncFileWritePayload, FileBase.onAsyncWrite);
    this.listen(CallbackId.ASYNC_FILE_READ, AsyncFileReadPayload, FileBase.onAsyncRead);
  }

  /** Pending async operations die with the binding; their callbacks never fire. */
  protected override detachCallbacks(): void {
    this.writeJob = null;
    this.readJob = null;
  }

  async update(): Promise<Result<void, ObjectApiError>> {
    const fileId = this.requireObjectId('update');
    const sessionId = this.session.requireSessionId('update file');

    const info = await checked(
      this.transport.getFileInfo(fileId, sessionId),
      `Could not get information for file object ${fileId}`
    );
    if (info.isErr()) return err(info.error);

    const named = await this.adoptName(info.value.type, info.value.nameStringId);
    if (named.isErr()) return err(named.error);

    this.applyInfo(info.value);
    return ok(undefined);
  }

  protected applyInfo(info: FileInfoReply): void {
    this._type = info.type;
    this._flags = info.flags;
    this._permissions = info.permissions;
    this._uid = info.uid;
    this._gid = info.gid;
    this._length = info.length;
    this._accessTime = info.accessTime;
    this._modificationTime = info.modificationTime;
    this._statusChangeTime = info.statusChangeTime;
  }

  // ===========================================================================
  // Synchronous transfers
  // ===========================================================================

  async write(data: Uint8Array | string): Promise<Result<void, ObjectApiError>> {
    const fileId = this.requireObjectId('write to');
    const bytes = toBytes(data);
    let written = 0;

    while (written < bytes.length) {
      const { chunk, length } = getZeroPaddedChunk(bytes, FileChunkLimit.WRITE, written);
      const reply = await checked(
        this.transport.writeFile(fileId, chunk, length),
        `Could not write to file object ${fileId}`
      );
      if (reply.isErr()) return err(withTransferred(reply.error, written));

      const { lengthWritten } = reply.value;
      if (lengthWritten === 0) return err(Err.stalledTransfer(written));
      written += Math.min(lengthWritten, length);
    }

    return ok(undefined);
  }

  /** Reads up to `length` bytes; fewer at end of file. */
  async read(length: number): Promise<Result<Uint8Array, ObjectApiError>> {
    const fileId = this.requireObjectId('read from');
    const data = new ByteAccumulator(Math.min(length, 4096));

    while (data.length < length) {
      const reply = await checkedUntilEnd(
        this.transport.readFile(fileId, Math.min(length - data.length, FileChunkLimit.READ)),
        `Could not read from file object ${fileId}`
      );
      if (reply.isErr()) return err(withTransferred(reply.error, data.length));
      if (reply.value === null) break;

      const { buffer, lengthRead } = reply.value;
      if (lengthRead === 0) break;
      data.append(buffer.subarray(0, lengthRead));
    }

    return ok(data.toBytes());
  }

  // ===========================================================================
  // Asynchronous transfers
  // ===========================================================================

  /**
   * Starts a pipelined write and returns once the first chunk is on its way.
   * Each burst sends up to `ASYNC_BURST_CHUNKS - 1` unchecked chunks followed
   * by one acknowledged chunk; the acknowledgement event starts the next burst.
   */
  writeAsync(data: Uint8Array | string, callbacks: AsyncWriteCallbacks = {}): void {
    this.requireObjectId('write to');
    if (this.writeJob !== null) {
      throw new MisuseError('Another asynchronous write is already in progress');
    }

    const job: AsyncWriteJob = { data: toBytes(data), written: 0, callbacks };
    this.writeJob = job;
    this.session.track(this.runWriteBurst(job));
  }

  /**
   * Asks the server for up to `maxLength` bytes, delivered by push events.
   * `onResult` fires once with everything received.
   */
  readAsync(
    maxLength: number,
    onResult: (result: AsyncReadResult) => void,
    onStatus?: (read: number, maxLength: number) => void
  ): void {
    const fileId = this.requireObjectId('read from');
    if (this.readJob !== null) {
      throw new MisuseError('Another asynchronous read is already in progress');
    }

    const job: AsyncReadJob = {
      data: new ByteAccumulator(Math.min(maxLength, 4096)),
      maxLength,
      onResult,
      onStatus,
    };
    this.readJob = job;
    this.session.track(this.requestRead(job, fileId));
  }

  private async runWriteBurst(job: AsyncWriteJob): Promise<void> {
    const fileId = this.requireObjectId('write to');
    const message = `Could not write to file object ${fileId}`;
    let unchecked = 0;

    while (unchecked < ASYNC_BURST_CHUNKS - 1 && job.data.length - job.written > FileChunkLimit.WRITE_ASYNC) {
      const { chunk, length } = getZeroPaddedChunk(job.data, FileChunkLimit.WRITE_UNCHECKED, job.written);
      const result = await sent(this.transport.writeFileUnchecked(fileId, chunk, length), message);
      if (this.writeJob !== job) return;
      if (result.isErr()) {
        this.finishWrite(job, result.error);
        return;
      }
      job.written += length;
      unchecked++;
    }

    const { chunk, length } = getZeroPaddedChunk(job.data, FileChunkLimit.WRITE_ASYNC, job.written);
    const result = await sent(this.transport.writeFileAsync(fileId, chunk, length), message);
    if (result.isErr() && this.writeJob === job) {
      this.finishWrite(job, result.error);
    }
  }

  private async requestRead(job: AsyncReadJob, fileId: ObjectId): Promise<void> {
    const result = await sent(
      this.transport.readFileAsync(fileId, job.maxLength),
      `Could not read from file object ${fileId}`
    );
    if (result.isErr() && this.readJob === job) {
      this.finishRead(job, result.error);
    }
  }

  private finishWrite(job: AsyncWriteJob, error: ObjectApiError | null): void {
    if (this.writeJob === job) this.writeJob = null;
    job.callbacks.onComplete?.(error);
  }

  private finishRead(job: AsyncReadJob, error: ObjectApiError | null): void {
    if (this.readJob === job) this.readJob = null;
    job.onResult({ data: job.data.toBytes(), error });
  }

  /** A throwing status callback must not leave the transfer slot occupied. */
  private notify(what: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error({ err: error, objectId: this.objectId }, `${what} callback threw`);
    }
  }

  private static onAsyncWrite(file: FileBase, [fileId, errorCode, lengthWritten]: AsyncFileWriteEvent): void | Promise<void> {
    if (file.objectId !== fileId) return;

    const job = file.writeJob;
    if (job === null) {
      file.logger.debug({ fileId }, 'async write event without pending write');
      return;
    }

    if (!isSuccess(errorCode)) {
      file.finishWrite(job, Err.remote(`Could not write to file object ${fileId}`, errorCode, job.written));
      return;
    }

    job.written += lengthWritten;
    const { onStatus } = job.callbacks;
    if (onStatus !== undefined) file.notify('async write status', () => onStatus(job.written, job.data.length));

    if (job.written >= job.data.length) {
      file.finishWrite(job, null);
      return;
    }

    // the user callback may have detached the file
    if (file.writeJob !== job) return;
    return file.runWriteBurst(job);
  }

  private static onAsyncRead(file: FileBase, [fileId, errorCode, buffer, lengthRead]: AsyncFileReadEvent): void {
    if (file.objectId !== fileId) return;

    const job = file.readJob;
    if (job === null) {
      file.logger.debug({ fileId }, 'async read event without pending read');
      return;
    }

    if (!isSuccess(errorCode)) {
      file.finishRead(job, Err.remote(`Could not read file object ${fileId}`, errorCode, job.data.length));
      return;
    }

    if (lengthRead === 0) {
      file.finishRead(job, null);
      return;
    }

    const remaining = job.maxLength - job.data.length;
    job.data.append(buffer.subarray(0, Math.min(lengthRead, remaining)));
    const { onStatus } = job;
    if (onStatus !== undefined) file.notify('async read status', () => onStatus(job.data.length, job.maxLength));

    if (job.data.length >= job.maxLength && file.readJob === job) {
      file.finishRead(job, null);
    }
  }
}

function toBytes(data: Uint8Array | string): Uint8Array {
  return typeof data === 'string' ? utf8Encoder.encode(data) : data;
}
