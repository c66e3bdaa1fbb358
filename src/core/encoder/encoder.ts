import { ParseTree } from '../tree/parse-tree';
import { allocate, type AllocateOptions, type FieldInit } from '../tree/allocate';
import { resolveConfig, type EngineConfig } from '../config';
import type { NodeId, ParseNode } from '../types/ast';
import {
  integerWidth,
  isComposite,
  isIntegerType,
  textToBytes,
  typeToString,
  type ByteOrder,
  type FieldType,
  type IntegerKind,
} from '../types/field-types';
import { SchemaMismatchError } from '../errors';
import { resync } from './resync';

/**
 * Accumulates encoded chunks
 */
class ByteWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;

  writeBytes(bytes: Uint8Array): void {
    this.chunks.push(bytes);
    this.length += bytes.length;
  }

  writeInteger(kind: IntegerKind, value: number | bigint, byteOrder: ByteOrder): void {
    const width = integerWidth(kind);
    const bytes = new Uint8Array(width);
    const view = new DataView(bytes.buffer);
    const littleEndian = byteOrder === 'little';
    const big = typeof value === 'bigint' ? value : BigInt(value);

    switch (kind) {
      case 'UInt8':
        view.setUint8(0, Number(big));
        break;
      case 'UInt16':
        view.setUint16(0, Number(big), littleEndian);
        break;
      case 'UInt32':
        view.setUint32(0, Number(big), littleEndian);
        break;
      case 'UInt64':
        view.setBigUint64(0, big, littleEndian);
        break;
      case 'Int8':
        view.setInt8(0, Number(big));
        break;
      case 'Int16':
        view.setInt16(0, Number(big), littleEndian);
        break;
      case 'Int32':
        view.setInt32(0, Number(big), littleEndian);
        break;
      case 'Int64':
        view.setBigInt64(0, big, littleEndian);
        break;
    }
    this.writeBytes(bytes);
  }

  toBytes(): Uint8Array {
    const result = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}

export interface SerializeOptions {
  config?: Partial<EngineConfig>;
}

/**
 * Serialize a subtree from its stored leaf values, in document order.
 * Length fields are written as stored; call resync first after edits.
 */
export function serialize(tree: ParseTree, id: NodeId, options: SerializeOptions = {}): Uint8Array {
  const config = resolveConfig(options.config);
  const writer = new ByteWriter();
  for (const node of tree.walk(id)) {
    if (!isComposite(node.type)) {
      writeLeaf(writer, node, config.byteOrder);
    }
  }
  return writer.toBytes();
}

function writeLeaf(writer: ByteWriter, node: ParseNode, defaultOrder: ByteOrder): void {
  const { type, value } = node;
  if (isIntegerType(type)) {
    if (typeof value !== 'number' && typeof value !== 'bigint') {
      throw new SchemaMismatchError(`${type.kind} field '${node.name}' holds no integer`, { byteOffset: node.offset });
    }
    writer.writeInteger(type.kind, value, type.byteOrder ?? defaultOrder);
    return;
  }
  if (typeof value === 'string') {
    writer.writeBytes(textToBytes(value));
  } else if (value instanceof Uint8Array) {
    writer.writeBytes(value);
  } else {
    throw new SchemaMismatchError(`${typeToString(type)} field '${node.name}' holds no value`, {
      byteOffset: node.offset,
    });
  }
}

/**
 * Allocate `init` as `type`, bring its lengths up to date and serialize it
 */
export function encode(type: FieldType, init: FieldInit, options: AllocateOptions = {}): Uint8Array {
  const tree = new ParseTree();
  const node = allocate(tree, type, init, options);
  tree.root = node.id;
  resync(tree, node.id);
  return serialize(tree, node.id, { config: options.config });
}
