/**
 * Fixed-width chunking for the wire.
 *
 * Every data-carrying call sends a buffer of exactly the limit's width plus the
 * number of meaningful bytes in it. Concatenating the meaningful prefixes of
 * consecutive chunks rebuilds the input.
 */

export interface PaddedChunk {
  /** `maxLength` bytes; bytes past `length` are zero. */
  readonly chunk: Uint8Array;
  readonly length: number;
}

export function getZeroPaddedChunk(data: Uint8Array, maxLength: number, start = 0): PaddedChunk {
  const slice = data.subarray(start, start + maxLength);
  const chunk = new Uint8Array(maxLength);
  chunk.set(slice);
  return { chunk, length: slice.length };
}

/** Chunks covering `data` in offset order. Empty input yields no chunks. */
export function splitIntoChunks(data: Uint8Array, maxLength: number): PaddedChunk[] {
  if (maxLength <= 0) {
    throw new RangeError(`Chunk length must be positive, got ${maxLength}`);
  }

  const chunks: PaddedChunk[] = [];
  for (let offset = 0; offset < data.length; offset += maxLength) {
    chunks.push(getZeroPaddedChunk(data, maxLength, offset));
  }
  return chunks;
}

export function joinChunks(chunks: readonly PaddedChunk[]): Uint8Array {
  const total = chunks.reduce((sum, c) => sum + c.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const { chunk, length } of chunks) {
    out.set(chunk.subarray(0, length), offset);
    offset += length;
  }
  return out;
}

/** Grows by doubling; used to collect chunk payloads of unknown total size. */
export class ByteAccumulator {
  private buffer: Uint8Array;
  private used = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.used;
  }

  append(bytes: Uint8Array): void {
    if (this.used + bytes.length > this.buffer.length) {
      let capacity = this.buffer.length;
      while (capacity < this.used + bytes.length) capacity *= 2;
      const grown = new Uint8Array(capacity);
      grown.set(this.buffer.subarray(0, this.used));
      this.buffer = grown;
    }
    this.buffer.set(bytes, this.used);
    this.used += bytes.length;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.used);
  }
}
