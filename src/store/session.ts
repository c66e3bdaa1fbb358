import { createStore } from 'zustand/vanilla';
import { decode } from '../core/decoder/decoder';
import { ParseTree } from '../core/tree/parse-tree';
import { allocate, type FieldInit } from '../core/tree/allocate';
import { replace, setValue } from '../core/tree/mutate';
import { resync } from '../core/encoder/resync';
import { serialize } from '../core/encoder/encoder';
import { withFileSource } from '../core/source/file-source';
import { allocateRecord, RECORD } from '../core/protocol/record';
import { createTlvRegistry } from '../core/protocol/tlv';
import { resolveConfig, type EngineConfig } from '../core/config';
import type { TypeRegistry } from '../core/registry/type-registry';
import type { FieldType } from '../core/types/field-types';
import type { NodeId } from '../core/types/ast';
import { toError } from '../core/errors';

export interface SessionState {
  schema: FieldType;
  registry: TypeRegistry;
  config: EngineConfig;

  // Data
  rawData: Uint8Array | null;
  tree: ParseTree | null;
  error: Error | null;
  /** Edits applied since the last resync */
  dirty: boolean;
  /** Bumped on every change to the tree, which is mutated in place */
  revision: number;
  activeNodeId: NodeId | null;

  // Actions
  load: (data: Uint8Array) => void;
  loadFile: (filePath: string) => void;
  setActiveNode: (id: NodeId | null) => void;
  allocate: (type: FieldType, init: FieldInit) => NodeId | null;
  allocateRecord: (tag: number, payload: FieldInit) => NodeId | null;
  replace: (parentId: NodeId, index: number, newChildId: NodeId) => void;
  setValue: (nodeId: NodeId, value: unknown) => void;
  resync: () => void;
  /** Current bytes of the document, resynced first when edits are pending */
  serialize: () => Uint8Array | null;
}

export interface SessionOptions {
  schema?: FieldType;
  registry?: TypeRegistry;
  config?: Partial<EngineConfig>;
}

/** State after a successful decode */
const getSuccessState = (data: Uint8Array, tree: ParseTree) => ({
  rawData: data,
  tree,
  error: null,
  dirty: false,
  activeNodeId: null,
});

/** State after a failed decode */
const getErrorState = (error: Error) => ({
  error,
  rawData: null,
  tree: null,
  dirty: false,
  activeNodeId: null,
});

/**
 * Editing session over one decoded document
 */
export function createSessionStore(options: SessionOptions = {}) {
  const config = resolveConfig(options.config);

  return createStore<SessionState>()((set, get) => {
    /** Run an edit against the loaded tree, recording a failure as the session error */
    function edit<T>(action: string, fn: (tree: ParseTree) => T, changesDocument = true): T | null {
      const { tree } = get();
      if (!tree) {
        set({ error: new Error(`Cannot ${action}: no document loaded`) });
        return null;
      }
      try {
        const result = fn(tree);
        set((state) => ({ error: null, dirty: state.dirty || changesDocument, revision: state.revision + 1 }));
        return result;
      } catch (error) {
        console.error(`Session ${action} failed:`, error);
        set({ error: toError(error) });
        return null;
      }
    }

    return {
      schema: options.schema ?? RECORD,
      registry: options.registry ?? createTlvRegistry(config),
      config,
      rawData: null,
      tree: null,
      error: null,
      dirty: false,
      revision: 0,
      activeNodeId: null,

      load: (data) => {
        const { schema, registry } = get();
        try {
          const tree = decode(schema, data, { registry, config });
          set((state) => ({ ...getSuccessState(data, tree), revision: state.revision + 1 }));
        } catch (error) {
          console.error('Decode failed:', error);
          set(getErrorState(toError(error)));
        }
      },

      loadFile: (filePath) => {
        const { schema, registry } = get();
        try {
          const { data, tree } = withFileSource(filePath, (source) => ({
            data: source.read(0, source.size),
            tree: decode(schema, source, { registry, config }),
          }));
          set((state) => ({ ...getSuccessState(data, tree), revision: state.revision + 1 }));
        } catch (error) {
          console.error('File load failed:', error);
          set(getErrorState(toError(error)));
        }
      },

      setActiveNode: (id) => set({ activeNodeId: id }),

      allocate: (type, init) =>
        edit('allocate', (tree) => allocate(tree, type, init, { registry: get().registry, config }).id, false),

      allocateRecord: (tag, payload) =>
        edit('allocate record', (tree) => allocateRecord(tree, get().registry, tag, payload, { config }).id, false),

      replace: (parentId, index, newChildId) => {
        edit('replace', (tree) => replace(tree, parentId, index, newChildId, { registry: get().registry, config }));
      },

      setValue: (nodeId, value) => {
        edit('set value', (tree) => setValue(tree, nodeId, value, { registry: get().registry, config }));
      },

      resync: () => {
        const { tree } = get();
        if (!tree || tree.root === null) return;
        const root = tree.root;
        try {
          resync(tree, root);
          set((state) => ({ dirty: false, error: null, revision: state.revision + 1 }));
        } catch (error) {
          console.error('Resync failed:', error);
          set({ error: toError(error) });
        }
      },

      serialize: () => {
        if (get().dirty) get().resync();
        const { tree, dirty } = get();
        if (!tree || tree.root === null || dirty) return null;
        return serialize(tree, tree.root, { config });
      },
    };
  });
}

export type SessionStore = ReturnType<typeof createSessionStore>;
