import type { ParseTree } from '../tree/parse-tree';
import type { NodeId, ParseNode } from '../types/ast';
import { isComposite, normalizeLeafValue, withDynamicSize } from '../types/field-types';

/**
 * Post-order: composite sizes become the sum of their children. Every struct
 * with a length field gets that field set to its size, and every count field
 * the number of elements of its array.
 */
export function recomputeLength(tree: ParseTree, id: NodeId): number {
  return recompute(tree, tree.get(id));
}

function recompute(tree: ParseTree, node: ParseNode): number {
  if (!isComposite(node.type)) return node.size;

  let total = 0;
  for (const child of tree.children(node.id)) {
    total += recompute(tree, child);
  }
  node.size = total;

  if (node.type.kind === 'BlockArray') {
    node.type = withDynamicSize(node.type, total);
  } else if (node.type.kind === 'Struct') {
    for (const [countField, arrayField] of Object.entries(node.type.countFields ?? {})) {
      const countNode = tree.field(node.id, countField);
      countNode.value = normalizeLeafValue(countNode.type, tree.field(node.id, arrayField).children.length);
    }
    if (node.type.lengthField !== undefined) {
      const lengthNode = tree.field(node.id, node.type.lengthField);
      lengthNode.value = normalizeLeafValue(lengthNode.type, total);
    }
  }
  return total;
}

/**
 * Pre-order: children of a composite are laid out back to back from the
 * composite's own offset
 */
export function resyncOffsets(tree: ParseTree, rootId: NodeId): void {
  const stack: ParseNode[] = [tree.get(rootId)];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    let offset = node.offset;
    for (const child of tree.children(node.id)) {
      child.offset = offset;
      offset += child.size;
      stack.push(child);
    }
  }
}

/**
 * Bring lengths and offsets of a subtree up to date and clear its dirty flags
 */
export function resync(tree: ParseTree, rootId: NodeId): void {
  recomputeLength(tree, rootId);
  resyncOffsets(tree, rootId);
  for (const node of tree.walk(rootId)) node.dirty = false;
}
