import { describe, it, expect } from 'vitest';
import { allocate, nodeRef } from './allocate';
import { ParseTree } from './parse-tree';
import { allocateRecord } from '../protocol/record';
import { createTlvRegistry, TAG_INTEGER, TAG_LIST, TAG_TEXT } from '../protocol/tlv';
import { array, block, text, uint16 } from '../types/field-types';
import { field, struct } from '../types/schema';
import { SchemaMismatchError, UnknownTagError } from '../errors';
import { catchError, hex } from '../test-helpers';

const sized = struct('sized', [
  field('n', uint16),
  field('data', ({ fields }) => block(fields.number('n'))),
]);

describe('allocate', () => {
  it('builds detached leaves at offset 0', () => {
    const tree = new ParseTree();
    const node = allocate(tree, uint16, 5, { name: 'n' });
    expect(node).toMatchObject({
      name: 'n',
      type: { kind: 'UInt16', byteOrder: 'little' },
      offset: 0,
      size: 2,
      value: 5,
      parent: null,
    });
    expect(tree.root).toBeNull();
  });

  it('sizes dynamic leaves from their value', () => {
    const tree = new ParseTree();
    const node = allocate(tree, text(), 'hello');
    expect(node.type).toEqual({ kind: 'Text', length: 5 });
    expect(node.size).toBe(5);
  });

  it('rejects a value of the wrong size for a fixed leaf', () => {
    const tree = new ParseTree();
    expect(() => allocate(tree, text(2), 'abc')).toThrow('Text(2) cannot hold 3 byte(s)');
    expect(tree.nodeCount).toBe(0);
  });

  it('resolves struct slots from the fields allocated before them', () => {
    const tree = new ParseTree();
    const node = allocate(tree, sized, { n: 2, data: hex('aa bb') });
    expect(node.size).toBe(4);
    expect(tree.field(node.id, 'data').type).toEqual({ kind: 'Block', length: 2 });
  });

  it('drops a half-built struct when a field fails', () => {
    const tree = new ParseTree();
    const error = catchError(() => allocate(tree, sized, { n: 3, data: hex('aa bb') }));
    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(tree.nodeCount).toBe(0);
  });

  it.each([
    [{ n: 1 }, "Struct sized is missing field 'data'"],
    [{ n: 1, data: hex('aa'), extra: 1 }, "Struct sized has no field 'extra'"],
    [[1, 2], "Struct sized field 'root' needs an object of field values"],
  ])('rejects struct init %o', (init, message) => {
    expect(() => allocate(new ParseTree(), sized, init)).toThrow(message);
  });

  it('needs exactly count values for an array', () => {
    const tree = new ParseTree();
    expect(allocate(tree, array(uint16, 2), [1, 2]).size).toBe(4);
    expect(() => allocate(tree, array(uint16, 2), [1])).toThrow("Array(UInt16, 2) field 'root' got 1 value(s)");
  });
});

describe('allocateRecord', () => {
  const registry = createTlvRegistry();

  it('builds a text record with a matching length', () => {
    const tree = new ParseTree();
    const record = allocateRecord(tree, registry, TAG_TEXT, 'hello world');
    expect(record.size).toBe(16);
    expect(tree.children(record.id).map((n) => [n.name, n.value])).toEqual([
      ['tag', 1],
      ['length', 16],
      ['payload', 'hello world'],
    ]);
  });

  it('builds a list around detached records', () => {
    const tree = new ParseTree();
    const a = allocateRecord(tree, registry, TAG_INTEGER, 1);
    const b = allocateRecord(tree, registry, TAG_TEXT, 'xy');
    const list = allocateRecord(tree, registry, TAG_LIST, { count: 2, elements: [nodeRef(a.id), nodeRef(b.id)] });

    expect(list.size).toBe(5 + 4 + 9 + 7);
    expect(tree.field(list.id, 'length').value).toBe(25);
    expect(a.parent).toBe(tree.at(list.id, ['payload', 'elements']).id);
    expect(b.name).toBe('1');
  });

  it('refuses to place a node that already has a parent', () => {
    const tree = new ParseTree();
    const a = allocateRecord(tree, registry, TAG_INTEGER, 1);
    allocateRecord(tree, registry, TAG_LIST, { count: 1, elements: [nodeRef(a.id)] });
    const error = catchError(() =>
      allocateRecord(tree, registry, TAG_LIST, { count: 1, elements: [nodeRef(a.id)] }),
    );
    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({ message: `Node ${a.id} is already part of a tree` });
  });

  it('hands adopted nodes back when the list fails', () => {
    const tree = new ParseTree();
    const a = allocateRecord(tree, registry, TAG_INTEGER, 1);
    expect(() =>
      allocateRecord(tree, registry, TAG_LIST, { count: 2, elements: [nodeRef(a.id), 'oops'] }),
    ).toThrow(SchemaMismatchError);

    expect(tree.has(a.id)).toBe(true);
    expect(a.parent).toBeNull();
    expect(tree.nodeCount).toBe(4);
  });

  it('fails for a tag the registry does not know', () => {
    expect(() => allocateRecord(new ParseTree(), registry, 42, 1)).toThrow(UnknownTagError);
  });
});
