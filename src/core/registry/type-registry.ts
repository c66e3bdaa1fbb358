import type { FieldType } from '../types/field-types';
import type { VariantDefinition } from '../config';
import { parseType } from '../parser/type-parser';
import { ConfigError, DuplicateTagError, SchemaMismatchError, UnknownTagError, toError } from '../errors';

/**
 * Payload description bound to a tag. A dynamically sized payload
 * (Block, Text or BlockArray without a length) is sized by its record.
 */
export interface VariantDescriptor {
  readonly tag: number;
  readonly name: string;
  readonly payload: FieldType;
}

/**
 * Tag to variant mapping. Registries are plain objects owned by the caller,
 * so several protocol families can coexist.
 */
export class TypeRegistry implements Iterable<VariantDescriptor> {
  readonly name: string;
  private variants = new Map<number, VariantDescriptor>();

  constructor(name = 'default') {
    this.name = name;
  }

  register(descriptor: VariantDescriptor): this {
    const { tag } = descriptor;
    if (!Number.isInteger(tag) || tag < 0) {
      throw new SchemaMismatchError(`Variant '${descriptor.name}' needs a non-negative integer tag, got ${tag}`);
    }
    const existing = this.variants.get(tag);
    if (existing) {
      throw new DuplicateTagError(tag, existing.name);
    }
    this.variants.set(tag, descriptor);
    return this;
  }

  registerAll(descriptors: Iterable<VariantDescriptor>): this {
    for (const descriptor of descriptors) this.register(descriptor);
    return this;
  }

  /** Register variants whose payloads are written as type strings */
  registerDefinitions(definitions: Iterable<VariantDefinition>): this {
    for (const { tag, name, payload } of definitions) {
      let type: FieldType;
      try {
        type = parseType(payload);
      } catch (error) {
        throw new ConfigError(`Variant '${name}' (tag ${tag}) has an invalid payload type: ${toError(error).message}`, {
          cause: error,
        });
      }
      this.register({ tag, name, payload: type });
    }
    return this;
  }

  lookup(tag: number, byteOffset?: number): VariantDescriptor {
    const variant = this.variants.get(tag);
    if (!variant) {
      throw new UnknownTagError(tag, { byteOffset, registry: this.name });
    }
    return variant;
  }

  has(tag: number): boolean {
    return this.variants.has(tag);
  }

  tags(): number[] {
    return [...this.variants.keys()].sort((a, b) => a - b);
  }

  get size(): number {
    return this.variants.size;
  }

  [Symbol.iterator](): Iterator<VariantDescriptor> {
    return this.variants.values();
  }

  static fromDefinitions(definitions: Iterable<VariantDefinition>, name?: string): TypeRegistry {
    return new TypeRegistry(name).registerDefinitions(definitions);
  }
}
