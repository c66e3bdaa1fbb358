export * from './core/errors';
export * from './core/config';
export * from './core/types/field-types';
export * from './core/types/schema';
export * from './core/types/ast';
export { parseType } from './core/parser/type-parser';
export { TypeRegistry, type VariantDescriptor } from './core/registry/type-registry';
export { BufferSource, toByteSource, type ByteSource } from './core/source/byte-source';
export { FileSource, withFileSource } from './core/source/file-source';
export { ParseTree, type NodeInit } from './core/tree/parse-tree';
export { Decoder, decode, type DecodeOptions } from './core/decoder/decoder';
export { Allocator, allocate, nodeRef, type AllocateOptions, type FieldInit, type NodeRef } from './core/tree/allocate';
export { markDirty, replace, setValue, type EditOptions } from './core/tree/mutate';
export { encode, serialize, type SerializeOptions } from './core/encoder/encoder';
export { recomputeLength, resync, resyncOffsets } from './core/encoder/resync';
export * from './core/protocol/record';
export * from './core/protocol/tlv';
export { describeTree, formatValue, hexDump, hexDumpRange, type HexDumpOptions } from './core/dump';
export { createSessionStore, type SessionOptions, type SessionState, type SessionStore } from './store/session';
