import type { StructType } from './schema';
import { SchemaMismatchError } from '../errors';

export type ByteOrder = 'little' | 'big';

export type IntegerKind =
  | 'UInt8'
  | 'UInt16'
  | 'UInt32'
  | 'UInt64'
  | 'Int8'
  | 'Int16'
  | 'Int32'
  | 'Int64';

/**
 * Decodable field types.
 *
 * `Block`, `Text` and `BlockArray` without a length are dynamically sized:
 * they can only be decoded once an enclosing record has cloned them with a
 * concrete size.
 */
export type FieldType =
  // Integers
  | { kind: IntegerKind; byteOrder?: ByteOrder }
  // Raw bytes
  | { kind: 'Block'; length?: number }
  // Single-byte text, NUL bytes included
  | { kind: 'Text'; length?: number }
  // Collections
  | { kind: 'Array'; element: FieldType; count: number }
  | { kind: 'BlockArray'; element: FieldType; byteLength?: number }
  // Composite with resolvable slots
  | StructType;

export type IntegerType = Extract<FieldType, { kind: IntegerKind }>;

const INTEGER_WIDTHS: Record<IntegerKind, number> = {
  UInt8: 1,
  UInt16: 2,
  UInt32: 4,
  UInt64: 8,
  Int8: 1,
  Int16: 2,
  Int32: 4,
  Int64: 8,
};

export function isIntegerKind(kind: string): kind is IntegerKind {
  return Object.prototype.hasOwnProperty.call(INTEGER_WIDTHS, kind);
}

export function isIntegerType(type: FieldType): type is IntegerType {
  return isIntegerKind(type.kind);
}

export function integerWidth(kind: IntegerKind): number {
  return INTEGER_WIDTHS[kind];
}

/** Composite types own child nodes; everything else is a leaf */
export function isComposite(type: FieldType): boolean {
  return type.kind === 'Array' || type.kind === 'BlockArray' || type.kind === 'Struct';
}

/**
 * Size in bytes when it is known without decoding, otherwise undefined
 */
export function fixedSizeOf(type: FieldType): number | undefined {
  switch (type.kind) {
    case 'Block':
    case 'Text':
      return type.length;
    case 'BlockArray':
      return type.byteLength;
    case 'Array': {
      const element = fixedSizeOf(type.element);
      return element === undefined ? undefined : element * type.count;
    }
    case 'Struct': {
      let total = 0;
      for (const slot of type.fields) {
        if (typeof slot.type === 'function') return undefined;
        const size = fixedSizeOf(slot.type);
        if (size === undefined) return undefined;
        total += size;
      }
      return total;
    }
    default:
      return integerWidth(type.kind);
  }
}

export function isDynamicallySized(type: FieldType): boolean {
  switch (type.kind) {
    case 'Block':
    case 'Text':
      return type.length === undefined;
    case 'BlockArray':
      return type.byteLength === undefined;
    default:
      return false;
  }
}

// ============================================================
// Builders
// ============================================================

function clampSize(size: number, what: string): number {
  if (!Number.isInteger(size)) {
    throw new SchemaMismatchError(`${what}: size must be an integer, got ${size}`);
  }
  if (size < 0) {
    console.error(`${what}: invalid size ${size} cannot be < 0, defaulting to 0`);
    return 0;
  }
  return size;
}

export function integer(kind: IntegerKind, byteOrder?: ByteOrder): IntegerType {
  return byteOrder ? { kind, byteOrder } : { kind };
}

export const uint8 = integer('UInt8');
export const uint16 = integer('UInt16');
export const uint32 = integer('UInt32');
export const uint64 = integer('UInt64');
export const int8 = integer('Int8');
export const int16 = integer('Int16');
export const int32 = integer('Int32');
export const int64 = integer('Int64');

/** Raw bytes; omit the length for a payload sized by its record */
export function block(length?: number): FieldType {
  return length === undefined ? { kind: 'Block' } : { kind: 'Block', length: clampSize(length, 'block') };
}

export function text(length?: number): FieldType {
  return length === undefined ? { kind: 'Text' } : { kind: 'Text', length: clampSize(length, 'text') };
}

export function array(element: FieldType, count: number): FieldType {
  return { kind: 'Array', element, count: clampSize(count, 'array') };
}

/** Elements of one type repeated until `byteLength` bytes are used */
export function blockArray(element: FieldType, byteLength?: number): FieldType {
  return byteLength === undefined
    ? { kind: 'BlockArray', element }
    : { kind: 'BlockArray', element, byteLength: clampSize(byteLength, 'blockArray') };
}

/** Copy a type with some of its parameters replaced */
export function clone<T extends FieldType>(type: T, overrides: Partial<T>): T {
  return { ...type, ...overrides };
}

/**
 * Give a dynamically sized type its concrete size
 */
export function withDynamicSize(type: FieldType, size: number): FieldType {
  switch (type.kind) {
    case 'Block':
    case 'Text':
      return { ...type, length: size };
    case 'BlockArray':
      return { ...type, byteLength: size };
    default:
      throw new SchemaMismatchError(`${typeToString(type)} has no size parameter`);
  }
}

// ============================================================
// Leaf values
// ============================================================

export type LeafValue = number | bigint | string | Uint8Array;

const INTEGER_LIMITS: Record<IntegerKind, [bigint, bigint]> = {
  UInt8: [0n, 0xffn],
  UInt16: [0n, 0xffffn],
  UInt32: [0n, 0xffffffffn],
  UInt64: [0n, 0xffffffffffffffffn],
  Int8: [-0x80n, 0x7fn],
  Int16: [-0x8000n, 0x7fffn],
  Int32: [-0x80000000n, 0x7fffffffn],
  Int64: [-0x8000000000000000n, 0x7fffffffffffffffn],
};

/**
 * Check a value against a leaf type and bring it to the stored representation:
 * number for integers up to 32 bits, bigint for 64-bit ones, string for text
 * and a byte array for blocks.
 */
export function normalizeLeafValue(type: FieldType, value: unknown): LeafValue {
  if (isIntegerType(type)) {
    let big: bigint;
    if (typeof value === 'bigint') {
      big = value;
    } else if (typeof value === 'number' && Number.isInteger(value)) {
      big = BigInt(value);
    } else {
      throw new SchemaMismatchError(`${type.kind} expects an integer, got ${describeValue(value)}`);
    }
    const [min, max] = INTEGER_LIMITS[type.kind];
    if (big < min || big > max) {
      throw new SchemaMismatchError(`${big} is out of range for ${type.kind}`);
    }
    return integerWidth(type.kind) === 8 ? big : Number(big);
  }

  switch (type.kind) {
    case 'Text': {
      if (typeof value !== 'string') {
        throw new SchemaMismatchError(`Text expects a string, got ${describeValue(value)}`);
      }
      for (let i = 0; i < value.length; i++) {
        if (value.charCodeAt(i) > 0xff) {
          throw new SchemaMismatchError(`Text character at ${i} does not fit in a single byte`);
        }
      }
      checkLength(type.length, value.length, 'Text');
      return value;
    }
    case 'Block': {
      if (!(value instanceof Uint8Array)) {
        throw new SchemaMismatchError(`Block expects bytes, got ${describeValue(value)}`);
      }
      checkLength(type.length, value.length, 'Block');
      return value;
    }
    default:
      throw new SchemaMismatchError(`${typeToString(type)} is not a leaf type`);
  }
}

function checkLength(expected: number | undefined, actual: number, what: string): void {
  if (expected !== undefined && expected !== actual) {
    throw new SchemaMismatchError(`${what}(${expected}) cannot hold ${actual} byte(s)`);
  }
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) return 'bytes';
  if (Array.isArray(value)) return 'array';
  return value === null ? 'null' : typeof value;
}

/** Text is stored one byte per character */
export function bytesToText(bytes: Uint8Array): string {
  let result = '';
  for (const byte of bytes) result += String.fromCharCode(byte);
  return result;
}

export function textToBytes(value: string): Uint8Array {
  const bytes = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i++) bytes[i] = value.charCodeAt(i);
  return bytes;
}

/** Byte length of a leaf value once encoded */
export function leafSize(type: FieldType, value: LeafValue): number {
  if (isIntegerType(type)) return integerWidth(type.kind);
  if (typeof value === 'string') return value.length;
  if (value instanceof Uint8Array) return value.length;
  throw new SchemaMismatchError(`${typeToString(type)} cannot hold a ${typeof value}`);
}

// ============================================================
// Type strings
// ============================================================

/**
 * Convert a FieldType back to its string representation
 */
export function typeToString(type: FieldType): string {
  switch (type.kind) {
    case 'Block':
    case 'Text':
      return type.length === undefined ? type.kind : `${type.kind}(${type.length})`;
    case 'Array':
      return `Array(${typeToString(type.element)}, ${type.count})`;
    case 'BlockArray':
      return type.byteLength === undefined
        ? `BlockArray(${typeToString(type.element)})`
        : `BlockArray(${typeToString(type.element)}, ${type.byteLength})`;
    case 'Struct':
      return `Struct(${type.name})`;
    default:
      return type.byteOrder ? `${type.kind}(${type.byteOrder})` : type.kind;
  }
}

/**
 * Whether a node of type `actual` may stand where `expected` is declared.
 * With `loose`, size parameters are ignored (they are re-derived on resync).
 */
export function isCompatible(expected: FieldType, actual: FieldType, loose = false): boolean {
  if (expected.kind !== actual.kind) return false;
  switch (expected.kind) {
    case 'Block':
    case 'Text':
      if (loose || expected.length === undefined) return true;
      return (actual.kind === 'Block' || actual.kind === 'Text') && actual.length === expected.length;
    case 'Array':
      return (
        actual.kind === 'Array' &&
        (loose || actual.count === expected.count) &&
        isCompatible(expected.element, actual.element, loose)
      );
    case 'BlockArray':
      return actual.kind === 'BlockArray' && isCompatible(expected.element, actual.element, loose);
    case 'Struct':
      return actual.kind === 'Struct' && actual.name === expected.name;
    default:
      return true;
  }
}
