import type { EngineConfig } from '../config';
import type { TypeRegistry } from '../registry/type-registry';
import type { ParseNode } from './ast';
import type { FieldType, LeafValue } from './field-types';
import { SchemaMismatchError } from '../errors';

/**
 * Read-only view over the fields of a struct that are already materialized.
 * Only strictly earlier fields are visible to a resolver.
 */
export interface FieldView {
  readonly names: readonly string[];
  has(name: string): boolean;
  node(name: string): ParseNode;
  value(name: string): LeafValue;
  /** Integer value of an earlier field as a safe JS number */
  number(name: string): number;
}

export interface ResolveContext {
  readonly fields: FieldView;
  readonly registry: TypeRegistry;
  readonly config: EngineConfig;
  /** Offset at which the next field begins */
  readonly offset: number;
}

export type FieldResolver = (ctx: ResolveContext) => FieldType;

export interface FieldSlot {
  readonly name: string;
  readonly type: FieldType | FieldResolver;
  /** Runs right after the field is materialized, before any later field */
  readonly check?: (node: ParseNode, ctx: ResolveContext) => void;
}

export interface StructType {
  readonly kind: 'Struct';
  readonly name: string;
  readonly fields: readonly FieldSlot[];
  /** Field holding the serialized size of the whole struct */
  readonly lengthField?: string;
  /** Count field name to the array field whose element count it holds */
  readonly countFields?: Readonly<Record<string, string>>;
}

export interface StructOptions {
  lengthField?: string;
  countFields?: Record<string, string>;
}

/**
 * Define a struct schema. Field names must be unique and the length field,
 * when given, must name one of the slots.
 */
export function struct(name: string, fields: FieldSlot[], options: StructOptions = {}): StructType {
  const seen = new Set<string>();
  for (const slot of fields) {
    if (seen.has(slot.name)) {
      throw new SchemaMismatchError(`Duplicate field '${slot.name}' in struct ${name}`);
    }
    seen.add(slot.name);
  }
  if (options.lengthField !== undefined && !seen.has(options.lengthField)) {
    throw new SchemaMismatchError(`Length field '${options.lengthField}' is not a field of struct ${name}`);
  }
  for (const [countField, arrayField] of Object.entries(options.countFields ?? {})) {
    if (!seen.has(countField) || !seen.has(arrayField)) {
      throw new SchemaMismatchError(`Count field '${countField}' of '${arrayField}' is not a field of struct ${name}`);
    }
  }
  return {
    kind: 'Struct',
    name,
    fields,
    ...(options.lengthField === undefined ? {} : { lengthField: options.lengthField }),
    ...(options.countFields === undefined ? {} : { countFields: options.countFields }),
  };
}

export function field(name: string, type: FieldType | FieldResolver, check?: FieldSlot['check']): FieldSlot {
  return check ? { name, type, check } : { name, type };
}

export function resolveSlot(slot: FieldSlot, ctx: ResolveContext): FieldType {
  return typeof slot.type === 'function' ? slot.type(ctx) : slot.type;
}

/**
 * Build a FieldView over the given nodes, in slot order
 */
export function createFieldView(nodes: readonly ParseNode[]): FieldView {
  const byName = new Map<string, ParseNode>();
  for (const node of nodes) byName.set(node.name, node);

  function node(name: string): ParseNode {
    const found = byName.get(name);
    if (!found) {
      throw new SchemaMismatchError(`Field '${name}' is not decoded before the field that reads it`);
    }
    return found;
  }

  function value(name: string): LeafValue {
    const found = node(name);
    if (found.value === undefined) {
      throw new SchemaMismatchError(`Field '${name}' is composite and has no scalar value`);
    }
    return found.value;
  }

  return {
    names: nodes.map((n) => n.name),
    has: (name) => byName.has(name),
    node,
    value,
    number(name: string): number {
      const v = value(name);
      if (typeof v === 'number') return v;
      if (typeof v === 'bigint' && v <= BigInt(Number.MAX_SAFE_INTEGER) && v >= BigInt(Number.MIN_SAFE_INTEGER)) {
        return Number(v);
      }
      throw new SchemaMismatchError(`Field '${name}' does not hold a safe integer`);
    },
  };
}
