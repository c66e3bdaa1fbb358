import { describe, it, expect } from 'vitest';
import { DecodeError, TlvError, TruncatedInputError, UnknownTagError, toError } from './errors';

describe('errors', () => {
  it('keeps the class chain for instanceof', () => {
    const error = new UnknownTagError(3, { byteOffset: 1 });
    expect(error).toBeInstanceOf(UnknownTagError);
    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toBeInstanceOf(TlvError);
    expect(error.name).toBe('UnknownTagError');
  });

  it('formats the byte offset', () => {
    const error = new TruncatedInputError(4, 1, { byteOffset: 5 });
    expect(error.location).toBe('byte offset 5');
    expect(error.toString()).toBe('TruncatedInputError: Truncated input: need 4 byte(s), 1 available (byte offset 5)');
    expect(new TlvError('plain').toString()).toBe('TlvError: plain');
  });

  it('carries a cause', () => {
    const cause = new Error('inner');
    expect(new DecodeError('outer', { cause }).cause).toBe(cause);
  });

  it('normalizes thrown values', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});
