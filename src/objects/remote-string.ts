import { ok, err, type Result } from 'neverthrow';
import type { ObjectId } from '../protocol/ids.js';
import { StringChunkLimit } from '../protocol/constants.js';
import type { ObjectTransportPort } from '../ports/object-transport.port.js';
import type { ObjectApiError } from '../errors/app-error.js';
import { checked, checkedUntilEnd, withTransferred } from './checked-call.js';
import { ByteAccumulator, getZeroPaddedChunk } from './chunking.js';
import { RemoteHandle } from './remote-handle.js';

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8');

/**
 * Immutable server string. UTF-8 on the wire; lengths are byte lengths.
 */
export class RemoteString extends RemoteHandle {
  readonly kind = 'string';

  private _data: string | null = null;

  get data(): string | null {
    return this._data;
  }

  override toString(): string {
    return this._data ?? '';
  }

  protected resetFields(): void {
    this._data = null;
  }

  async update(): Promise<Result<void, ObjectApiError>> {
    const objectId = this.requireObjectId('update');
    const read = await readStringBytes(this.transport, objectId);
    if (read.isErr()) return err(read.error);

    this._data = utf8Decoder.decode(read.value);
    return ok(undefined);
  }

  /**
   * Allocates a new server string holding `text` and attaches to it. The first
   * chunk rides on the allocate call.
   */
  async allocate(text: string): Promise<Result<this, ObjectApiError>> {
    await this.release();

    const sessionId = this.session.requireSessionId('allocate string');
    const bytes = utf8Encoder.encode(text);
    const first = getZeroPaddedChunk(bytes, StringChunkLimit.ALLOCATE);

    const allocated = await checked(
      this.transport.allocateString(bytes.length, first.chunk, sessionId),
      'Could not allocate string object'
    );
    if (allocated.isErr()) return err(allocated.error);

    const { stringId } = allocated.value;
    const written = await writeStringBytes(this.transport, stringId, bytes, first.length);
    if (written.isErr()) {
      await this.session.releaseObject(stringId);
      return err(written.error);
    }

    const attached = await this.adopt(stringId, false);
    if (attached.isErr()) return err(attached.error);

    this._data = text;
    return ok(this);
  }
}

/** Writes `bytes` from `offset` on with set-chunk calls, in offset order. */
export async function writeStringBytes(
  transport: ObjectTransportPort,
  stringId: ObjectId,
  bytes: Uint8Array,
  offset: number
): Promise<Result<void, ObjectApiError>> {
  for (let position = offset; position < bytes.length; position += StringChunkLimit.SET_CHUNK) {
    const { chunk } = getZeroPaddedChunk(bytes, StringChunkLimit.SET_CHUNK, position);
    const set = await checked(
      transport.setStringChunk(stringId, position, chunk),
      `Could not set chunk of string object ${stringId}`
    );
    if (set.isErr()) return err(withTransferred(set.error, position));
  }
  return ok(undefined);
}

/**
 * Reads a whole string. Stops early if the server hands back an empty chunk or
 * reports no more data before the announced length is reached.
 */
export async function readStringBytes(
  transport: ObjectTransportPort,
  stringId: ObjectId
): Promise<Result<Uint8Array, ObjectApiError>> {
  const length = await checked(transport.getStringLength(stringId), `Could not get length of string object ${stringId}`);
  if (length.isErr()) return err(length.error);

  const total = length.value.length;
  const bytes = new ByteAccumulator(total);

  while (bytes.length < total) {
    const got = await checkedUntilEnd(
      transport.getStringChunk(stringId, bytes.length),
      `Could not get chunk of string object ${stringId}`
    );
    if (got.isErr()) return err(withTransferred(got.error, bytes.length));
    if (got.value === null) break;

    const take = Math.min(got.value.buffer.length, total - bytes.length);
    if (take === 0) break;
    bytes.append(got.value.buffer.subarray(0, take));
  }

  return ok(bytes.toBytes());
}
