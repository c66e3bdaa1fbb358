import type { ParseTree } from './tree/parse-tree';
import type { ByteRange, NodeId } from './types/ast';
import { typeToString, type LeafValue } from './types/field-types';
import { OutOfRangeError } from './errors';

export interface HexDumpOptions {
  bytesPerLine?: number;
  /** Address printed for the first byte */
  baseOffset?: number;
}

function hexBytes(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(' ');
}

/** Lines of hex, each prefixed with the address of its first byte */
export function hexDump(data: Uint8Array, options: HexDumpOptions = {}): string {
  const { bytesPerLine = 16, baseOffset = 0 } = options;
  let result = '';
  for (let start = 0; start < data.length; start += bytesPerLine) {
    const address = (baseOffset + start).toString(16).padStart(4, '0');
    result += `${address}: ${hexBytes(data.subarray(start, start + bytesPerLine))}\n`;
  }
  return result;
}

/**
 * Dump the bytes a node covers in the buffer it was decoded from, addressed
 * as in that buffer
 */
export function hexDumpRange(data: Uint8Array, range: ByteRange, bytesPerLine = 16): string {
  if (range.start < 0 || range.end < range.start || range.end > data.length) {
    throw new OutOfRangeError(range.start, range.end - range.start, data.length);
  }
  return hexDump(data.subarray(range.start, range.end), { bytesPerLine, baseOffset: range.start });
}

export function formatValue(value: LeafValue): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Uint8Array) return `<${hexBytes(value)}>`;
  return String(value);
}

/**
 * One line per node, indented by depth:
 * `name: Type @offset+size = value`, with a `*` on dirty nodes
 */
export function describeTree(tree: ParseTree, id: NodeId, depth = 0): string {
  const node = tree.get(id);
  const value = node.value === undefined ? '' : ` = ${formatValue(node.value)}`;
  const dirty = node.dirty ? ' *' : '';
  let result = `${'  '.repeat(depth)}${node.name}: ${typeToString(node.type)} @${node.offset}+${node.size}${value}${dirty}\n`;
  for (const childId of node.children) {
    result += describeTree(tree, childId, depth + 1);
  }
  return result;
}
