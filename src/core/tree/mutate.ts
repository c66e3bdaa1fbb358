import type { ParseTree } from './parse-tree';
import type { NodeId, ParseNode } from '../types/ast';
import { TypeRegistry } from '../registry/type-registry';
import { resolveConfig, type EngineConfig } from '../config';
import { createFieldView, type ResolveContext } from '../types/schema';
import {
  isComposite,
  isCompatible,
  isDynamicallySized,
  leafSize,
  normalizeLeafValue,
  typeToString,
  withDynamicSize,
  type FieldType,
} from '../types/field-types';
import { SchemaMismatchError, toError } from '../errors';

export interface EditOptions {
  /** Registry the document was decoded with; tag checks and resolvers look variants up here */
  registry?: TypeRegistry;
  config?: Partial<EngineConfig>;
}

interface Expectation {
  type: FieldType;
  /** Size parameters are free: the slot's type is resolved per instance */
  loose: boolean;
}

/**
 * What a node's position in its parent allows. Array elements follow the
 * element type, fixed struct slots their declared type; a resolver slot only
 * pins the kind of the node currently there.
 */
function expectationFor(tree: ParseTree, node: ParseNode): Expectation {
  if (node.parent === null) {
    return { type: node.type, loose: true };
  }
  const parent = tree.get(node.parent);
  switch (parent.type.kind) {
    case 'Array':
    case 'BlockArray':
      return { type: parent.type.element, loose: false };
    case 'Struct': {
      const slot = parent.type.fields[parent.children.indexOf(node.id)];
      if (!slot || typeof slot.type === 'function') {
        return { type: node.type, loose: true };
      }
      return { type: slot.type, loose: false };
    }
    default:
      throw new SchemaMismatchError(`${typeToString(parent.type)} node ${parent.id} cannot own children`);
  }
}

function unsized(type: FieldType): FieldType {
  if (type.kind === 'Block') return { kind: 'Block' };
  if (type.kind === 'Text') return { kind: 'Text' };
  return type;
}

/** Resolved type of a later field still describes the node already there */
function keepsShape(expected: FieldType, actual: FieldType): boolean {
  if (expected.kind === 'Array' && actual.kind === 'Array' && expected.count !== actual.count) return false;
  return isCompatible(expected, actual, true);
}

/**
 * Run the check of the slot at `index` and the resolvers of every later slot
 * as if `candidate` stood there. Sizes may differ (resync re-derives them);
 * kinds and array counts may not.
 */
function checkDependents(
  tree: ParseTree,
  parent: ParseNode,
  index: number,
  candidate: ParseNode,
  options: EditOptions,
): void {
  if (parent.type.kind !== 'Struct') return;
  const { name: structName, fields: slots } = parent.type;
  const nodes = tree.children(parent.id).map((node, i) => (i === index ? candidate : node));
  const registry = options.registry ?? new TypeRegistry();
  const config = resolveConfig(options.config);

  const context = (count: number): ResolveContext => {
    const before = nodes.slice(0, count);
    return {
      fields: createFieldView(before),
      registry,
      config,
      offset: before.reduce((offset, node) => offset + node.size, parent.offset),
    };
  };

  try {
    slots[index]?.check?.(candidate, context(index + 1));
    for (let i = index + 1; i < slots.length; i++) {
      const slot = slots[i];
      const existing = nodes[i];
      if (!slot || !existing || typeof slot.type !== 'function') continue;

      const resolved = slot.type(context(i));
      if (!keepsShape(resolved, existing.type)) {
        throw new SchemaMismatchError(
          `'${existing.name}' would become ${typeToString(resolved)} but holds ${typeToString(existing.type)}`,
        );
      }
    }
  } catch (error) {
    throw new SchemaMismatchError(
      `Cannot change '${candidate.name}' of ${structName}: ${toError(error).message}`,
      { byteOffset: candidate.offset, cause: error },
    );
  }
}

/** Mark a node and every ancestor as needing resync */
export function markDirty(tree: ParseTree, id: NodeId): void {
  let current: NodeId | null = id;
  while (current !== null) {
    const node = tree.get(current);
    node.dirty = true;
    current = node.parent;
  }
}

/**
 * Put a detached node in place of the child at `index`.
 *
 * The old subtree is released; sizes, length fields and offsets stay stale
 * until resync. Later fields of a struct that resolve from the replaced one
 * must keep their shape.
 */
export function replace(
  tree: ParseTree,
  parentId: NodeId,
  index: number,
  newChildId: NodeId,
  options: EditOptions = {},
): ParseNode {
  const parent = tree.get(parentId);
  if (!isComposite(parent.type)) {
    throw new SchemaMismatchError(`${typeToString(parent.type)} node ${parentId} has no children to replace`);
  }
  const old = tree.child(parentId, index);
  const replacement = tree.get(newChildId);

  if (replacement.parent !== null || tree.root === newChildId) {
    throw new SchemaMismatchError(`Node ${newChildId} is already part of a tree; allocate or detach it first`);
  }
  if (tree.isAncestor(newChildId, parentId)) {
    throw new SchemaMismatchError(`Node ${newChildId} contains node ${parentId} and cannot become its child`);
  }

  const { type, loose } = expectationFor(tree, old);
  if (!isCompatible(type, replacement.type, loose)) {
    throw new SchemaMismatchError(
      `Cannot replace '${old.name}' of ${typeToString(parent.type)}: expected ${typeToString(type)}, got ${typeToString(replacement.type)}`,
      { byteOffset: old.offset },
    );
  }
  checkDependents(tree, parent, index, { ...replacement, name: old.name, offset: old.offset }, options);

  replacement.name = old.name;
  replacement.offset = old.offset;
  tree.release(old.id);
  parent.children[index] = newChildId;
  replacement.parent = parentId;

  for (const node of tree.walk(newChildId)) node.dirty = true;
  markDirty(tree, parentId);
  return replacement;
}

/**
 * Overwrite a leaf value. Text and block leaves whose slot is not fixed in
 * size may grow or shrink. A value that later fields of its struct resolve
 * from (a tag, a count) may only change to one they still agree with.
 */
export function setValue(tree: ParseTree, nodeId: NodeId, value: unknown, options: EditOptions = {}): ParseNode {
  const node = tree.get(nodeId);
  if (isComposite(node.type)) {
    throw new SchemaMismatchError(`${typeToString(node.type)} node ${nodeId} has no value of its own`);
  }

  const { type, loose } = expectationFor(tree, node);
  const target = loose || isDynamicallySized(type) ? unsized(node.type) : node.type;

  const normalized = normalizeLeafValue(target, value);
  const size = leafSize(node.type, normalized);
  const candidate: ParseNode = {
    ...node,
    value: normalized,
    size,
    type: size === node.size ? node.type : withDynamicSize(node.type, size),
  };
  if (node.parent !== null) {
    const parent = tree.get(node.parent);
    checkDependents(tree, parent, parent.children.indexOf(nodeId), candidate, options);
  }

  node.value = candidate.value;
  node.size = candidate.size;
  node.type = candidate.type;
  markDirty(tree, nodeId);
  return node;
}
