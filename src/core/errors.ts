/**
 * Errors raised while decoding, encoding or editing tagged records.
 */

type ErrorOptions = { byteOffset?: number; cause?: unknown };

export class TlvError extends Error {
  override readonly name: string = 'TlvError';
  readonly byteOffset?: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.byteOffset = options?.byteOffset;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, TlvError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    return this.byteOffset !== undefined ? `byte offset ${this.byteOffset}` : '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.name}: ${this.message} (${loc})` : `${this.name}: ${this.message}`;
  }
}

/** Base class for failures against the bytes being decoded */
export class DecodeError extends TlvError {
  override readonly name: string = 'DecodeError';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

export class UnknownTagError extends DecodeError {
  override readonly name = 'UnknownTagError';
  readonly tag: number;

  constructor(tag: number, options?: ErrorOptions & { registry?: string }) {
    const where = options?.registry ? ` in registry '${options.registry}'` : '';
    super(`Unknown tag ${tag}${where}`, options);
    this.tag = tag;
    Object.setPrototypeOf(this, UnknownTagError.prototype);
  }
}

export class TruncatedInputError extends DecodeError {
  override readonly name = 'TruncatedInputError';
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number, options?: ErrorOptions) {
    super(`Truncated input: need ${needed} byte(s), ${available} available`, options);
    this.needed = needed;
    this.available = available;
    Object.setPrototypeOf(this, TruncatedInputError.prototype);
  }
}

export class LengthMismatchError extends DecodeError {
  override readonly name = 'LengthMismatchError';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, LengthMismatchError.prototype);
  }
}

export class DuplicateTagError extends TlvError {
  override readonly name = 'DuplicateTagError';
  readonly tag: number;

  constructor(tag: number, existing: string) {
    super(`Tag ${tag} is already bound to '${existing}'`);
    this.tag = tag;
    Object.setPrototypeOf(this, DuplicateTagError.prototype);
  }
}

export class SchemaMismatchError extends TlvError {
  override readonly name = 'SchemaMismatchError';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, SchemaMismatchError.prototype);
  }
}

export class OutOfRangeError extends TlvError {
  override readonly name = 'OutOfRangeError';
  constructor(offset: number, size: number, sourceSize: number) {
    super(`Read of ${size} byte(s) at ${offset} is outside a source of ${sourceSize} byte(s)`, {
      byteOffset: offset,
    });
    Object.setPrototypeOf(this, OutOfRangeError.prototype);
  }
}

export class LimitExceededError extends TlvError {
  override readonly name = 'LimitExceededError';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, LimitExceededError.prototype);
  }
}

export class ConfigError extends TlvError {
  override readonly name = 'ConfigError';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** Normalize anything thrown into an Error */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
