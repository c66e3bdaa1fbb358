import type { NodeId, NodePath, ParseNode } from '../types/ast';
import type { FieldType, LeafValue } from '../types/field-types';
import { isComposite, typeToString } from '../types/field-types';
import { TlvError } from '../errors';

export interface NodeInit {
  name: string;
  type: FieldType;
  offset: number;
  size: number;
  value?: LeafValue;
}

/**
 * Arena of parse nodes addressed by integer id.
 *
 * Children are owned through their ids; parents are plain back-links. A node
 * removed with `release` takes its whole subtree with it.
 */
export class ParseTree {
  private nodes = new Map<NodeId, ParseNode>();
  private nextId = 0;

  /** Root of the decoded document, null for a tree of detached nodes only */
  root: NodeId | null = null;

  get nodeCount(): number {
    return this.nodes.size;
  }

  create(init: NodeInit): ParseNode {
    const node: ParseNode = {
      id: this.nextId++,
      name: init.name,
      type: init.type,
      offset: init.offset,
      size: init.size,
      value: init.value,
      parent: null,
      children: [],
      dirty: false,
    };
    this.nodes.set(node.id, node);
    return node;
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  get(id: NodeId): ParseNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new TlvError(`Node ${id} does not exist in this tree`);
    }
    return node;
  }

  get rootNode(): ParseNode {
    if (this.root === null) {
      throw new TlvError('Tree has no root');
    }
    return this.get(this.root);
  }

  /** Append an owned child to a composite node */
  attach(parentId: NodeId, childId: NodeId): void {
    const parent = this.get(parentId);
    const child = this.get(childId);
    if (!isComposite(parent.type)) {
      throw new TlvError(`${typeToString(parent.type)} node ${parentId} cannot own children`);
    }
    child.parent = parentId;
    parent.children.push(childId);
  }

  children(id: NodeId): ParseNode[] {
    return this.get(id).children.map((childId) => this.get(childId));
  }

  child(id: NodeId, index: number): ParseNode {
    const node = this.get(id);
    const childId = node.children[index];
    if (childId === undefined) {
      throw new TlvError(`Node ${id} has no child at index ${index}`);
    }
    return this.get(childId);
  }

  /** Struct child by field name */
  field(id: NodeId, name: string): ParseNode {
    for (const childId of this.get(id).children) {
      const child = this.get(childId);
      if (child.name === name) return child;
    }
    throw new TlvError(`Node ${id} has no field '${name}'`);
  }

  /**
   * Follow a path of field names and array indexes from `id`
   */
  at(id: NodeId, path: NodePath): ParseNode {
    let node = this.get(id);
    for (const segment of path) {
      node = typeof segment === 'number' ? this.child(node.id, segment) : this.field(node.id, segment);
    }
    return node;
  }

  /** Whether `ancestor` is `id` itself or lies on its parent chain */
  isAncestor(ancestor: NodeId, id: NodeId): boolean {
    let current: NodeId | null = id;
    while (current !== null) {
      if (current === ancestor) return true;
      current = this.get(current).parent;
    }
    return false;
  }

  /**
   * Pre-order walk over a subtree
   */
  *walk(id: NodeId): Generator<ParseNode> {
    const node = this.get(id);
    yield node;
    for (const childId of node.children) {
      yield* this.walk(childId);
    }
  }

  /** Remove a subtree from the arena */
  release(id: NodeId): void {
    const ids = [...this.walk(id)].map((n) => n.id);
    for (const nodeId of ids) this.nodes.delete(nodeId);
    if (this.root !== null && ids.includes(this.root)) this.root = null;
  }
}
