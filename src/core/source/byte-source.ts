import { OutOfRangeError } from '../errors';

/**
 * Seekable, read-only view over bytes
 */
export interface ByteSource {
  readonly size: number;
  /** Exactly `size` bytes at `offset`; throws OutOfRangeError past the end */
  read(offset: number, size: number): Uint8Array;
}

export function checkRange(offset: number, size: number, sourceSize: number): void {
  if (!Number.isInteger(offset) || !Number.isInteger(size) || offset < 0 || size < 0 || offset + size > sourceSize) {
    throw new OutOfRangeError(offset, size, sourceSize);
  }
}

/**
 * In-memory byte source
 */
export class BufferSource implements ByteSource {
  private bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get size(): number {
    return this.bytes.length;
  }

  read(offset: number, size: number): Uint8Array {
    checkRange(offset, size, this.bytes.length);
    return this.bytes.slice(offset, offset + size);
  }
}

export function toByteSource(input: ByteSource | Uint8Array): ByteSource {
  return input instanceof Uint8Array ? new BufferSource(input) : input;
}
