import type { ParseTree } from '../tree/parse-tree';
import type { ParseNode } from '../types/ast';
import type { EngineConfig } from '../config';
import type { TypeRegistry } from '../registry/type-registry';
import { Allocator, nodeRef, type FieldInit } from '../tree/allocate';
import { field, struct, type StructType } from '../types/schema';
import {
  fixedSizeOf,
  integerWidth,
  isDynamicallySized,
  uint32,
  uint8,
  withDynamicSize,
  type IntegerType,
} from '../types/field-types';
import { LengthMismatchError, SchemaMismatchError } from '../errors';

export interface RecordLayout {
  /** Struct name of the record, 'record' by default */
  name?: string;
  tagType?: IntegerType;
  lengthType?: IntegerType;
}

/**
 * Tagged record: `tag | length | payload`, where `length` counts the whole
 * record, header included. The payload type is looked up by tag; a
 * dynamically sized payload takes `length - header` bytes.
 */
export function createRecordType(layout: RecordLayout = {}): StructType {
  const tagType = layout.tagType ?? uint8;
  const lengthType = layout.lengthType ?? uint32;
  const headerSize = integerWidth(tagType.kind) + integerWidth(lengthType.kind);

  return struct(
    layout.name ?? 'record',
    [
      // Fail on an unknown tag before the length is read
      field('tag', tagType, (node, ctx) => {
        ctx.registry.lookup(ctx.fields.number('tag'), node.offset + node.size);
      }),
      field('length', lengthType),
      field('payload', (ctx) => {
        const variant = ctx.registry.lookup(ctx.fields.number('tag'));
        if (!isDynamicallySized(variant.payload)) return variant.payload;

        const length = ctx.fields.number('length');
        if (length < headerSize) {
          throw new LengthMismatchError(
            `Record length ${length} is smaller than its ${headerSize}-byte header`,
            { byteOffset: ctx.offset },
          );
        }
        return withDynamicSize(variant.payload, length - headerSize);
      }),
    ],
    { lengthField: 'length' },
  );
}

export const RECORD = createRecordType();

/** Byte size of everything before the payload */
export function recordHeaderSize(recordType: StructType): number {
  let size = 0;
  for (const slot of recordType.fields) {
    if (slot.name === 'payload') return size;
    const slotSize = typeof slot.type === 'function' ? undefined : fixedSizeOf(slot.type);
    if (slotSize === undefined) {
      throw new SchemaMismatchError(`Record header field '${slot.name}' has no fixed size`);
    }
    size += slotSize;
  }
  throw new SchemaMismatchError(`Struct ${recordType.name} has no payload field`);
}

export interface AllocateRecordOptions {
  recordType?: StructType;
  config?: Partial<EngineConfig>;
  name?: string;
}

/**
 * Build a detached record for `tag` whose length field already matches its
 * serialized size
 */
export function allocateRecord(
  tree: ParseTree,
  registry: TypeRegistry,
  tag: number,
  payload: FieldInit,
  options: AllocateRecordOptions = {},
): ParseNode {
  const recordType = options.recordType ?? RECORD;
  const variant = registry.lookup(tag);
  const allocator = new Allocator(tree, { registry, config: options.config });

  const payloadNode = allocator.allocate(variant.payload, payload, 'payload');
  try {
    return allocator.allocate(
      recordType,
      { tag, length: recordHeaderSize(recordType) + payloadNode.size, payload: nodeRef(payloadNode.id) },
      options.name ?? 'record',
    );
  } catch (error) {
    if (tree.has(payloadNode.id) && tree.get(payloadNode.id).parent === null) {
      tree.release(payloadNode.id);
    }
    throw error;
  }
}
