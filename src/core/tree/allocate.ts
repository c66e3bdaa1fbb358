import type { ParseTree } from './parse-tree';
import type { NodeId, ParseNode } from '../types/ast';
import { TypeRegistry } from '../registry/type-registry';
import { resolveConfig, type EngineConfig } from '../config';
import { createFieldView, resolveSlot, type ResolveContext, type StructType } from '../types/schema';
import {
  integerWidth,
  isCompatible,
  isDynamicallySized,
  leafSize,
  normalizeLeafValue,
  typeToString,
  withDynamicSize,
  type FieldType,
  type IntegerType,
  type LeafValue,
} from '../types/field-types';
import { SchemaMismatchError } from '../errors';

const NODE_REF = Symbol('nodeRef');

/** Places an already allocated, detached node into a new composite */
export interface NodeRef {
  readonly [NODE_REF]: NodeId;
}

export function nodeRef(id: NodeId): NodeRef {
  return { [NODE_REF]: id };
}

/**
 * Value used to build a node: a leaf value, a list for arrays, an object of
 * field inits for structs, or a reference to a detached node.
 */
export type FieldInit = LeafValue | NodeRef | readonly FieldInit[] | { readonly [name: string]: FieldInit };

export interface AllocateOptions {
  registry?: TypeRegistry;
  config?: Partial<EngineConfig>;
  /** Name given to the new node */
  name?: string;
}

function isNodeRef(init: FieldInit): init is NodeRef {
  return typeof init === 'object' && !(init instanceof Uint8Array) && NODE_REF in init;
}

function isInitList(init: FieldInit): init is readonly FieldInit[] {
  return Array.isArray(init);
}

function isInitObject(init: FieldInit): init is { readonly [name: string]: FieldInit } {
  return typeof init === 'object' && !(init instanceof Uint8Array) && !Array.isArray(init) && !isNodeRef(init);
}

/**
 * Builds detached nodes from values, with no byte source behind them.
 * Offsets start at 0 and are fixed by resync once the node is placed.
 */
export class Allocator {
  readonly registry: TypeRegistry;
  readonly config: EngineConfig;
  private tree: ParseTree;
  private adopted = new Set<NodeId>();

  constructor(tree: ParseTree, options: AllocateOptions = {}) {
    this.tree = tree;
    this.registry = options.registry ?? new TypeRegistry();
    this.config = resolveConfig(options.config);
  }

  allocate(type: FieldType, init: FieldInit, name: string): ParseNode {
    if (isNodeRef(init)) {
      return this.adopt(type, init[NODE_REF], name);
    }

    switch (type.kind) {
      case 'Block':
      case 'Text':
        return this.allocateBytes(type, init, name);
      case 'Array':
      case 'BlockArray':
        return this.allocateList(type, init, name);
      case 'Struct':
        return this.allocateStruct(type, init, name);
      default:
        return this.allocateInteger(type, init, name);
    }
  }

  private adopt(type: FieldType, id: NodeId, name: string): ParseNode {
    const node = this.tree.get(id);
    if (node.parent !== null || this.tree.root === id) {
      throw new SchemaMismatchError(`Node ${id} is already part of a tree`);
    }
    if (!isCompatible(type, node.type)) {
      throw new SchemaMismatchError(`Cannot place ${typeToString(node.type)} where ${typeToString(type)} is expected`);
    }
    node.name = name;
    this.adopted.add(id);
    return node;
  }

  private allocateInteger(type: IntegerType, init: FieldInit, name: string): ParseNode {
    const byteOrder = type.byteOrder ?? this.config.byteOrder;
    return this.tree.create({
      name,
      type: { kind: type.kind, byteOrder },
      offset: 0,
      size: integerWidth(type.kind),
      value: normalizeLeafValue(type, init),
    });
  }

  private allocateBytes(type: Extract<FieldType, { kind: 'Block' | 'Text' }>, init: FieldInit, name: string): ParseNode {
    const value = normalizeLeafValue(type, init);
    const size = leafSize(type, value);
    return this.tree.create({
      name,
      type: isDynamicallySized(type) ? withDynamicSize(type, size) : type,
      offset: 0,
      size,
      value,
    });
  }

  private allocateList(type: Extract<FieldType, { kind: 'Array' | 'BlockArray' }>, init: FieldInit, name: string): ParseNode {
    if (!isInitList(init)) {
      throw new SchemaMismatchError(`${typeToString(type)} field '${name}' needs a list of values`);
    }
    if (type.kind === 'Array' && init.length !== type.count) {
      throw new SchemaMismatchError(`${typeToString(type)} field '${name}' got ${init.length} value(s)`);
    }

    const node = this.tree.create({ name, type, offset: 0, size: 0 });
    return this.fill(node, () => {
      init.forEach((item, i) => {
        const child = this.allocate(type.element, item, String(i));
        this.tree.attach(node.id, child.id);
        node.size += child.size;
      });
      if (type.kind === 'BlockArray') {
        if (type.byteLength !== undefined && type.byteLength !== node.size) {
          throw new SchemaMismatchError(`${typeToString(type)} field '${name}' got ${node.size} byte(s)`);
        }
        node.type = withDynamicSize(type, node.size);
      }
    });
  }

  private allocateStruct(type: StructType, init: FieldInit, name: string): ParseNode {
    if (!isInitObject(init)) {
      throw new SchemaMismatchError(`Struct ${type.name} field '${name}' needs an object of field values`);
    }
    const known = new Set(type.fields.map((slot) => slot.name));
    for (const key of Object.keys(init)) {
      if (!known.has(key)) {
        throw new SchemaMismatchError(`Struct ${type.name} has no field '${key}'`);
      }
    }

    const node = this.tree.create({ name, type, offset: 0, size: 0 });
    return this.fill(node, () => {
      const allocated: ParseNode[] = [];
      for (const slot of type.fields) {
        if (!Object.prototype.hasOwnProperty.call(init, slot.name)) {
          throw new SchemaMismatchError(`Struct ${type.name} is missing field '${slot.name}'`);
        }
        const fieldType = resolveSlot(slot, this.context(allocated));
        const child = this.allocate(fieldType, init[slot.name], slot.name);
        this.tree.attach(node.id, child.id);
        allocated.push(child);
        node.size += child.size;
        slot.check?.(child, this.context(allocated));
      }
    });
  }

  /** Run `build` and drop the half-built node if it throws */
  private fill(node: ParseNode, build: () => void): ParseNode {
    try {
      build();
    } catch (error) {
      this.discard(node);
      throw error;
    }
    return node;
  }

  /** Release a half-built node; nodes it adopted go back to being detached */
  private discard(node: ParseNode): void {
    for (const id of this.adopted) {
      if (id === node.id || !this.tree.has(id) || !this.tree.isAncestor(node.id, id)) continue;
      const adopted = this.tree.get(id);
      if (adopted.parent !== null) {
        const parent = this.tree.get(adopted.parent);
        parent.children = parent.children.filter((childId) => childId !== id);
        adopted.parent = null;
      }
      this.adopted.delete(id);
    }
    this.tree.release(node.id);
  }

  private context(allocated: readonly ParseNode[]): ResolveContext {
    return {
      fields: createFieldView(allocated),
      registry: this.registry,
      config: this.config,
      offset: 0,
    };
  }
}

/**
 * Build a detached node of `type` from `init`
 */
export function allocate(tree: ParseTree, type: FieldType, init: FieldInit, options: AllocateOptions = {}): ParseNode {
  return new Allocator(tree, options).allocate(type, init, options.name ?? 'root');
}
