import fs from 'node:fs';
import path from 'node:path';
import type { ByteOrder } from './types/field-types';
import { ConfigError } from './errors';

export type LengthPolicy = 'trust' | 'verify';

/**
 * Variant declared in a config file; the payload is a type string
 * such as `UInt16` or `Array(UInt8, 4)`.
 */
export interface VariantDefinition {
  tag: number;
  name: string;
  payload: string;
}

export interface EngineConfig {
  /** Byte order of integer fields that do not declare one */
  byteOrder: ByteOrder;
  /** 'trust' sizes payloads from length fields; 'verify' also cross-checks them */
  lengthPolicy: LengthPolicy;
  /** Largest array count accepted without a warning; 0 disables the check */
  maxArrayCount: number;
  /** Fail instead of warning when maxArrayCount is exceeded */
  breakOnMaxCount: boolean;
  /** Deepest nesting of composite fields */
  maxDepth: number;
  /** Trace decoding with console.debug */
  debug: boolean;
  /** Extra variants to register on top of the built-in protocol */
  variants: VariantDefinition[];
}

export const DEFAULT_CONFIG: EngineConfig = {
  byteOrder: 'little',
  lengthPolicy: 'trust',
  maxArrayCount: 0,
  breakOnMaxCount: false,
  maxDepth: 64,
  debug: false,
  variants: [],
};

export const CONFIG_FILE = 'tlvscope.config.json';

/**
 * Merge an override over the defaults, validating every value
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  validateConfig(config);
  return config;
}

/**
 * Load config.json-style settings from the working directory.
 * A missing file yields the defaults; an unreadable or malformed one throws.
 */
export function loadConfig(configPath = path.join(process.cwd(), CONFIG_FILE)): EngineConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return { ...DEFAULT_CONFIG };
    throw new ConfigError(`Cannot read ${configPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON`, { cause: error });
  }
  return resolveConfig(parseConfigObject(parsed, configPath));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known keys out of a parsed JSON object
 */
function parseConfigObject(input: unknown, source: string): Partial<EngineConfig> {
  if (!isRecord(input)) {
    throw new ConfigError(`${source} must contain a JSON object`);
  }
  const config: Partial<EngineConfig> = {};

  const { byteOrder, lengthPolicy, maxArrayCount, breakOnMaxCount, maxDepth, debug, variants } = input;
  if (byteOrder !== undefined) {
    if (byteOrder !== 'little' && byteOrder !== 'big') {
      throw new ConfigError(`byteOrder must be 'little' or 'big', got ${JSON.stringify(byteOrder)}`);
    }
    config.byteOrder = byteOrder;
  }
  if (lengthPolicy !== undefined) {
    if (lengthPolicy !== 'trust' && lengthPolicy !== 'verify') {
      throw new ConfigError(`lengthPolicy must be 'trust' or 'verify', got ${JSON.stringify(lengthPolicy)}`);
    }
    config.lengthPolicy = lengthPolicy;
  }
  if (maxArrayCount !== undefined) config.maxArrayCount = expectNumber(maxArrayCount, 'maxArrayCount');
  if (maxDepth !== undefined) config.maxDepth = expectNumber(maxDepth, 'maxDepth');
  if (breakOnMaxCount !== undefined) config.breakOnMaxCount = expectBoolean(breakOnMaxCount, 'breakOnMaxCount');
  if (debug !== undefined) config.debug = expectBoolean(debug, 'debug');
  if (variants !== undefined) {
    if (!Array.isArray(variants)) {
      throw new ConfigError('variants must be an array');
    }
    config.variants = variants.map((v, i) => parseVariant(v, i));
  }
  return config;
}

function parseVariant(input: unknown, index: number): VariantDefinition {
  if (!isRecord(input)) {
    throw new ConfigError(`variants[${index}] must be an object`);
  }
  const { tag, name, payload } = input;
  if (typeof name !== 'string' || typeof payload !== 'string') {
    throw new ConfigError(`variants[${index}] needs string 'name' and 'payload'`);
  }
  return { tag: expectNumber(tag, `variants[${index}].tag`), name, payload };
}

function expectNumber(value: unknown, key: string): number {
  if (typeof value !== 'number') {
    throw new ConfigError(`${key} must be a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function expectBoolean(value: unknown, key: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be a boolean, got ${JSON.stringify(value)}`);
  }
  return value;
}

function validateConfig(config: EngineConfig): void {
  if (!Number.isInteger(config.maxArrayCount) || config.maxArrayCount < 0) {
    throw new ConfigError(`maxArrayCount must be a non-negative integer, got ${config.maxArrayCount}`);
  }
  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 1) {
    throw new ConfigError(`maxDepth must be a positive integer, got ${config.maxDepth}`);
  }
  for (const variant of config.variants) {
    if (!Number.isInteger(variant.tag) || variant.tag < 0 || variant.tag > 0xff) {
      throw new ConfigError(`Variant '${variant.name}' has invalid tag ${variant.tag}`);
    }
  }
}
