import { BinaryReader } from './reader';
import { ParseTree } from '../tree/parse-tree';
import { TypeRegistry } from '../registry/type-registry';
import { resolveConfig, type EngineConfig } from '../config';
import { toByteSource, type ByteSource } from '../source/byte-source';
import { createFieldView, resolveSlot, type ResolveContext, type StructType } from '../types/schema';
import { bytesToText, typeToString, type FieldType, type IntegerType } from '../types/field-types';
import type { ParseNode } from '../types/ast';
import {
  LengthMismatchError,
  LimitExceededError,
  OutOfRangeError,
  SchemaMismatchError,
  TruncatedInputError,
} from '../errors';

export interface DecodeOptions {
  /** Byte position of the first field in the source */
  offset?: number;
  registry?: TypeRegistry;
  config?: Partial<EngineConfig>;
  /** Name given to the root node */
  name?: string;
}

/**
 * Schema-driven decoder producing a ParseTree.
 *
 * Fields are decoded strictly in order; a resolver only ever sees the fields
 * of its struct that are already materialized.
 */
export class Decoder {
  protected reader: BinaryReader;
  protected tree = new ParseTree();
  readonly registry: TypeRegistry;
  readonly config: EngineConfig;

  constructor(source: ByteSource | Uint8Array, options: DecodeOptions = {}) {
    this.reader = new BinaryReader(toByteSource(source), options.offset ?? 0);
    this.registry = options.registry ?? new TypeRegistry();
    this.config = resolveConfig(options.config);
  }

  /** Main decode entry point */
  decode(schema: FieldType, name = 'root'): ParseTree {
    this.tree = new ParseTree();
    const root = this.decodeValue(schema, name, 0);
    this.tree.root = root.id;
    this.debug(`decoded ${typeToString(schema)} as ${this.tree.nodeCount} node(s), ${root.size} byte(s)`);
    return this.tree;
  }

  /**
   * Decode a single value based on its type
   */
  private decodeValue(type: FieldType, name: string, depth: number): ParseNode {
    if (depth > this.config.maxDepth) {
      throw new LimitExceededError(`Nesting deeper than ${this.config.maxDepth} at field '${name}'`, {
        byteOffset: this.reader.offset,
      });
    }

    switch (type.kind) {
      case 'Block':
      case 'Text':
        return this.decodeBytes(type, name);
      case 'Array':
        return this.decodeArray(type, name, depth);
      case 'BlockArray':
        return this.decodeBlockArray(type, name, depth);
      case 'Struct':
        return this.decodeStruct(type, name, depth);
      default:
        return this.decodeInteger(type, name);
    }
  }

  private decodeInteger(type: IntegerType, name: string): ParseNode {
    const byteOrder = type.byteOrder ?? this.config.byteOrder;
    const { value, range } = this.reader.readInteger(type.kind, byteOrder);
    return this.tree.create({
      name,
      type: { kind: type.kind, byteOrder },
      offset: range.start,
      size: range.end - range.start,
      value,
    });
  }

  private decodeBytes(type: Extract<FieldType, { kind: 'Block' | 'Text' }>, name: string): ParseNode {
    if (type.length === undefined) {
      throw new SchemaMismatchError(`${type.kind} field '${name}' has no length; it must be sized by its record`, {
        byteOffset: this.reader.offset,
      });
    }
    const { value, range } = this.reader.readBytes(type.length);
    return this.tree.create({
      name,
      type,
      offset: range.start,
      size: type.length,
      value: type.kind === 'Text' ? bytesToText(value) : value,
    });
  }

  private decodeArray(type: Extract<FieldType, { kind: 'Array' }>, name: string, depth: number): ParseNode {
    const start = this.reader.offset;
    this.checkCount(type.count, name, start);
    const node = this.tree.create({ name, type, offset: start, size: 0 });

    for (let i = 0; i < type.count; i++) {
      const child = this.decodeValue(type.element, String(i), depth + 1);
      this.tree.attach(node.id, child.id);
    }

    node.size = this.reader.offset - start;
    return node;
  }

  private decodeBlockArray(type: Extract<FieldType, { kind: 'BlockArray' }>, name: string, depth: number): ParseNode {
    const start = this.reader.offset;
    if (type.byteLength === undefined) {
      throw new SchemaMismatchError(`BlockArray field '${name}' has no byte length; it must be sized by its record`, {
        byteOffset: start,
      });
    }
    const end = start + type.byteLength;
    const node = this.tree.create({ name, type, offset: start, size: 0 });

    let index = 0;
    while (this.reader.offset < end) {
      const child = this.decodeValue(type.element, String(index), depth + 1);
      if (child.size === 0) {
        throw new SchemaMismatchError(`BlockArray '${name}' element ${index} consumed no bytes`, {
          byteOffset: child.offset,
        });
      }
      if (this.reader.offset > end) {
        throw new LengthMismatchError(
          `BlockArray '${name}' element ${index} ends at ${this.reader.offset}, past the block end ${end}`,
          { byteOffset: child.offset },
        );
      }
      this.tree.attach(node.id, child.id);
      index++;
    }
    this.checkCount(index, name, start);

    node.size = this.reader.offset - start;
    return node;
  }

  private decodeStruct(type: StructType, name: string, depth: number): ParseNode {
    const start = this.reader.offset;
    const node = this.tree.create({ name, type, offset: start, size: 0 });
    const decoded: ParseNode[] = [];

    for (const slot of type.fields) {
      const fieldType = resolveSlot(slot, this.context(decoded));
      const child = this.decodeValue(fieldType, slot.name, depth + 1);
      this.tree.attach(node.id, child.id);
      decoded.push(child);
      slot.check?.(child, this.context(decoded));
      if (slot.name === type.lengthField) {
        this.checkAvailable(start, createFieldView(decoded).number(slot.name));
      }
    }

    node.size = this.reader.offset - start;
    if (type.lengthField !== undefined) {
      this.checkLength(node, type.lengthField, decoded);
    }
    return node;
  }

  private context(decoded: readonly ParseNode[]): ResolveContext {
    return {
      fields: createFieldView(decoded),
      registry: this.registry,
      config: this.config,
      offset: this.reader.offset,
    };
  }

  /** Bytes a struct declares for itself must be present in the source */
  private checkAvailable(start: number, declared: number): void {
    const sourceSize = this.reader.length;
    if (start + declared <= sourceSize) return;

    throw new TruncatedInputError(declared - (this.reader.offset - start), Math.max(0, this.reader.remaining), {
      byteOffset: this.reader.offset,
      cause: new OutOfRangeError(start, declared, sourceSize),
    });
  }

  private checkLength(node: ParseNode, lengthField: string, decoded: readonly ParseNode[]): void {
    const declared = createFieldView(decoded).number(lengthField);
    if (declared === node.size) return;

    const message = `'${node.name}' declares ${lengthField}=${declared} but its fields use ${node.size} byte(s)`;
    if (this.config.lengthPolicy === 'verify') {
      throw new LengthMismatchError(message, { byteOffset: node.offset });
    }
    this.debug(`${message} (trusted)`);
  }

  private checkCount(count: number, name: string, offset: number): void {
    const max = this.config.maxArrayCount;
    if (max === 0 || count <= max) return;

    const message = `Array '${name}' has ${count} elements, more than maxArrayCount=${max}`;
    if (this.config.breakOnMaxCount) {
      throw new LimitExceededError(message, { byteOffset: offset });
    }
    console.warn(message);
  }

  private debug(message: string): void {
    if (this.config.debug) {
      console.debug(`[decoder] ${message}`);
    }
  }
}

/**
 * Decode `schema` from a source and return the fully materialized tree
 */
export function decode(schema: FieldType, source: ByteSource | Uint8Array, options: DecodeOptions = {}): ParseTree {
  return new Decoder(source, options).decode(schema, options.name);
}
