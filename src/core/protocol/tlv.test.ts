import { describe, it, expect } from 'vitest';
import { createRecordType, recordHeaderSize, RECORD } from './record';
import { createTlvRegistry, LIST_PAYLOAD, TAG_LIST } from './tlv';
import { decode } from '../decoder/decoder';
import { encode } from '../encoder/encoder';
import { TypeRegistry } from '../registry/type-registry';
import { block, integer, uint16 } from '../types/field-types';
import { DuplicateTagError } from '../errors';
import { hex } from '../test-helpers';

describe('record layout', () => {
  it('has a five-byte header by default', () => {
    expect(recordHeaderSize(RECORD)).toBe(5);
    expect(createTlvRegistry().lookup(TAG_LIST).payload).toBe(LIST_PAYLOAD);
  });

  it('supports other tag and length widths', () => {
    const custom = createRecordType({ name: 'frame', tagType: uint16, lengthType: integer('UInt16', 'big') });
    const registry = new TypeRegistry('frames').register({ tag: 0x0102, name: 'blob', payload: block() });
    const bytes = hex('02 01 00 06 61 62');

    const tree = decode(custom, bytes, { registry });
    expect(recordHeaderSize(custom)).toBe(4);
    expect(tree.rootNode.type).toBe(custom);
    expect(tree.field(tree.rootNode.id, 'payload').value).toEqual(hex('61 62'));

    expect(encode(custom, { tag: 0x0102, length: 6, payload: hex('61 62') }, { registry })).toEqual(bytes);
  });

  it('refuses config variants that reuse a built-in tag', () => {
    expect(() => createTlvRegistry({ variants: [{ tag: 1, name: 'again', payload: 'Text' }] })).toThrow(
      DuplicateTagError,
    );
  });
});
