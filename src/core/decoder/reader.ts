import type { ByteRange } from '../types/ast';
import type { ByteSource } from '../source/byte-source';
import type { ByteOrder, IntegerKind } from '../types/field-types';
import { integerWidth } from '../types/field-types';
import { OutOfRangeError, TruncatedInputError } from '../errors';

/**
 * Binary reader with byte-range tracking over a ByteSource
 */
export class BinaryReader {
  private source: ByteSource;
  private pos: number;

  constructor(source: ByteSource, offset = 0) {
    this.source = source;
    this.pos = offset;
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.source.size - this.pos;
  }

  get length(): number {
    return this.source.size;
  }

  private makeRange(start: number): ByteRange {
    return { start, end: this.pos };
  }

  // Raw bytes
  readBytes(length: number): { value: Uint8Array; range: ByteRange } {
    const start = this.pos;
    let value: Uint8Array;
    try {
      value = this.source.read(this.pos, length);
    } catch (error) {
      if (error instanceof OutOfRangeError) {
        throw new TruncatedInputError(length, Math.max(0, this.remaining), { byteOffset: start, cause: error });
      }
      throw error;
    }
    this.pos += length;
    return { value, range: this.makeRange(start) };
  }

  /**
   * Integers up to 32 bits come back as numbers, 64-bit ones as bigints
   */
  readInteger(kind: IntegerKind, byteOrder: ByteOrder): { value: number | bigint; range: ByteRange } {
    const width = integerWidth(kind);
    const { value: bytes, range } = this.readBytes(width);
    const view = new DataView(bytes.buffer, bytes.byteOffset, width);
    const littleEndian = byteOrder === 'little';

    switch (kind) {
      case 'UInt8':
        return { value: view.getUint8(0), range };
      case 'UInt16':
        return { value: view.getUint16(0, littleEndian), range };
      case 'UInt32':
        return { value: view.getUint32(0, littleEndian), range };
      case 'UInt64':
        return { value: view.getBigUint64(0, littleEndian), range };
      case 'Int8':
        return { value: view.getInt8(0), range };
      case 'Int16':
        return { value: view.getInt16(0, littleEndian), range };
      case 'Int32':
        return { value: view.getInt32(0, littleEndian), range };
      case 'Int64':
        return { value: view.getBigInt64(0, littleEndian), range };
    }
  }
}
