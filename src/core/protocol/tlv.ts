import { decode, type DecodeOptions } from '../decoder/decoder';
import { TypeRegistry, type VariantDescriptor } from '../registry/type-registry';
import type { ParseTree } from '../tree/parse-tree';
import type { ByteSource } from '../source/byte-source';
import type { EngineConfig } from '../config';
import { field, struct } from '../types/schema';
import { array, text, uint32 } from '../types/field-types';
import { RECORD } from './record';

export const TAG_INTEGER = 0;
export const TAG_TEXT = 1;
export const TAG_LIST = 2;

/** `count: UInt32` followed by exactly `count` records */
export const LIST_PAYLOAD = struct(
  'list',
  [field('count', uint32), field('elements', ({ fields }) => array(RECORD, fields.number('count')))],
  { countFields: { count: 'elements' } },
);

export const TLV_VARIANTS: readonly VariantDescriptor[] = [
  { tag: TAG_INTEGER, name: 'integer', payload: uint32 },
  { tag: TAG_TEXT, name: 'text', payload: text() },
  { tag: TAG_LIST, name: 'list', payload: LIST_PAYLOAD },
];

/**
 * Registry with the integer, text and list variants plus any variants
 * declared in the config
 */
export function createTlvRegistry(config: Partial<EngineConfig> = {}): TypeRegistry {
  return new TypeRegistry('tlv')
    .registerAll(TLV_VARIANTS)
    .registerDefinitions(config.variants ?? []);
}

/**
 * Decode one record, with the TLV registry unless another is given
 */
export function decodeRecord(source: ByteSource | Uint8Array, options: DecodeOptions = {}): ParseTree {
  return decode(RECORD, source, {
    ...options,
    registry: options.registry ?? createTlvRegistry(options.config),
  });
}
