import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createSessionStore } from './session';
import { TAG_TEXT } from '../core/protocol/tlv';
import { SchemaMismatchError, UnknownTagError } from '../core/errors';
import { hex, integerRecord, listRecord, textRecord } from '../core/test-helpers';

describe('session store', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts empty', () => {
    const state = createSessionStore().getState();
    expect(state.tree).toBeNull();
    expect(state.registry.tags()).toEqual([0, 1, 2]);
    expect(state.config.lengthPolicy).toBe('trust');
  });

  it('loads and decodes bytes', () => {
    const store = createSessionStore();
    const bytes = integerRecord(7);
    store.getState().load(bytes);

    const { tree, rawData, error, revision } = store.getState();
    expect(error).toBeNull();
    expect(rawData).toBe(bytes);
    expect(revision).toBe(1);
    expect(tree?.rootNode.size).toBe(9);
  });

  it('records a decode failure', () => {
    const store = createSessionStore();
    store.getState().load(integerRecord(7));
    store.getState().load(hex('05 05 00 00 00'));

    const { tree, error } = store.getState();
    expect(tree).toBeNull();
    expect(error).toBeInstanceOf(UnknownTagError);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('edits a list and serializes the resynced document', () => {
    const store = createSessionStore();
    store.getState().load(listRecord(integerRecord(1), integerRecord(2), integerRecord(3)));

    const tree = store.getState().tree;
    if (!tree) throw new Error('expected a tree');
    const elements = tree.at(tree.rootNode.id, ['payload', 'elements']);

    const id = store.getState().allocateRecord(TAG_TEXT, 'hello world');
    expect(id).not.toBeNull();
    expect(store.getState().dirty).toBe(false);
    if (id === null) return;

    store.getState().replace(elements.id, 1, id);
    expect(store.getState().dirty).toBe(true);
    expect(store.getState().error).toBeNull();

    expect(store.getState().serialize()).toEqual(
      listRecord(integerRecord(1), textRecord('hello world'), integerRecord(3)),
    );
    expect(store.getState().dirty).toBe(false);
    expect(tree.child(elements.id, 2).offset).toBe(34);
  });

  it('keeps the tree when an edit fails', () => {
    const store = createSessionStore();
    store.getState().load(integerRecord(7));
    const tree = store.getState().tree;
    if (!tree) throw new Error('expected a tree');

    store.getState().setValue(tree.field(tree.rootNode.id, 'payload').id, 'seven');

    expect(store.getState().tree).toBe(tree);
    expect(store.getState().error).toBeInstanceOf(SchemaMismatchError);
    expect(store.getState().dirty).toBe(false);
    expect(console.error).toHaveBeenCalledWith('Session set value failed:', store.getState().error);
  });

  it('checks tag edits against the session registry', () => {
    const store = createSessionStore({ config: { variants: [{ tag: 3, name: 'other', payload: 'UInt32' }] } });
    store.getState().load(integerRecord(7));
    const tree = store.getState().tree;
    if (!tree) throw new Error('expected a tree');
    const tag = tree.field(tree.rootNode.id, 'tag');

    store.getState().setValue(tag.id, 9);
    expect(store.getState().error).toBeInstanceOf(SchemaMismatchError);
    expect(tag.value).toBe(0);

    store.getState().setValue(tag.id, 3);
    expect(store.getState().error).toBeNull();
    expect(store.getState().serialize()).toEqual(hex('03 09 00 00 00 07 00 00 00'));
  });

  it('refuses edits with no document', () => {
    const store = createSessionStore();
    store.getState().setValue(0, 1);
    expect(store.getState().error?.message).toBe('Cannot set value: no document loaded');
    expect(store.getState().serialize()).toBeNull();
  });

  it('notifies subscribers on every change', () => {
    const store = createSessionStore();
    const listener = vi.fn();
    store.subscribe(listener);

    store.getState().load(textRecord('ab'));
    const tree = store.getState().tree;
    if (!tree) throw new Error('expected a tree');
    store.getState().setValue(tree.field(tree.rootNode.id, 'payload').id, 'abc');
    store.getState().resync();

    expect(listener).toHaveBeenCalledTimes(3);
    expect(store.getState().revision).toBe(3);
    expect(tree.field(tree.rootNode.id, 'length').value).toBe(8);
  });

  describe('loadFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tlvscope-session-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('decodes a file from disk', () => {
      const file = path.join(dir, 'doc.bin');
      fs.writeFileSync(file, textRecord('file'));
      const store = createSessionStore();
      store.getState().loadFile(file);

      const { tree, rawData } = store.getState();
      if (!tree) throw new Error('expected a tree');
      expect(rawData).toEqual(textRecord('file'));
      expect(tree.at(tree.rootNode.id, ['payload']).value).toBe('file');
    });

    it('records a missing file as an error', () => {
      const store = createSessionStore();
      store.getState().loadFile(path.join(dir, 'missing.bin'));
      expect(store.getState().tree).toBeNull();
      expect(store.getState().error?.message).toMatch(/ENOENT/);
    });
  });
});
