import type { FieldType, LeafValue } from './field-types';

/**
 * Byte range for tracking positions in binary data
 */
export interface ByteRange {
  start: number; // Inclusive
  end: number;   // Exclusive
}

/** Index of a node inside its ParseTree arena */
export type NodeId = number;

/**
 * Node of a decoded (or allocated) tree.
 *
 * `parent` and `children` hold arena ids, so a node never owns a reference to
 * its parent. Leaves carry a value; composites derive theirs from children.
 */
export interface ParseNode {
  readonly id: NodeId;
  name: string;
  type: FieldType;
  offset: number;
  size: number;
  value: LeafValue | undefined;
  parent: NodeId | null;
  children: NodeId[];
  /** Set by mutation, cleared by resync */
  dirty: boolean;
}

export function rangeOf(node: ParseNode): ByteRange {
  return { start: node.offset, end: node.offset + node.size };
}

/** Path segment: a struct field name or an array index */
export type NodePath = ReadonlyArray<string | number>;
