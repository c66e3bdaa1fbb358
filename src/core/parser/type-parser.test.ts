import { describe, it, expect, vi } from 'vitest';
import { parseType } from './type-parser';
import { tokenize } from './type-lexer';
import { typeToString } from '../types/field-types';

describe('tokenize', () => {
  it('splits names, numbers and punctuation', () => {
    expect(tokenize('Array(UInt16(big), 4)')).toEqual([
      { type: 'IDENTIFIER', value: 'Array' },
      { type: 'LPAREN' },
      { type: 'IDENTIFIER', value: 'UInt16' },
      { type: 'LPAREN' },
      { type: 'IDENTIFIER', value: 'big' },
      { type: 'RPAREN' },
      { type: 'COMMA' },
      { type: 'NUMBER', value: 4 },
      { type: 'RPAREN' },
    ]);
  });

  it('reads hex and negative numbers', () => {
    expect(tokenize('0x10 -3 -0x2')).toEqual([
      { type: 'NUMBER', value: 16 },
      { type: 'NUMBER', value: -3 },
      { type: 'NUMBER', value: -2 },
    ]);
  });

  it('rejects unexpected characters', () => {
    expect(() => tokenize('Block[4]')).toThrow("Unexpected character '['");
  });
});

describe('parseType', () => {
  it.each([
    ['UInt8', { kind: 'UInt8' }],
    ['Int64', { kind: 'Int64' }],
    ['UInt32(big)', { kind: 'UInt32', byteOrder: 'big' }],
    ['Block', { kind: 'Block' }],
    ['Block(16)', { kind: 'Block', length: 16 }],
    ['Text(0x08)', { kind: 'Text', length: 8 }],
    ['Array(UInt16, 4)', { kind: 'Array', element: { kind: 'UInt16' }, count: 4 }],
    ['BlockArray(Int32)', { kind: 'BlockArray', element: { kind: 'Int32' } }],
    [
      'BlockArray(Array(UInt8, 2), 6)',
      { kind: 'BlockArray', element: { kind: 'Array', element: { kind: 'UInt8' }, count: 2 }, byteLength: 6 },
    ],
  ])('parses %s', (input, expected) => {
    expect(parseType(input)).toEqual(expected);
  });

  it.each(['UInt16(big)', 'Text(3)', 'Array(Block(2), 5)', 'BlockArray(UInt64(little), 24)'])(
    'prints %s back unchanged',
    (input) => {
      expect(typeToString(parseType(input))).toBe(input);
    },
  );

  it.each([
    ['Float32', 'Unknown simple type: Float32'],
    ['toString', 'Unknown simple type: toString'],
    ['Array(UInt8)', 'Expected COMMA, got RPAREN'],
    ['UInt8(middle)', "Expected byte order 'little' or 'big'"],
    ['Block(4) Text', 'Unexpected tokens after type'],
    ['Array', 'Array needs an element type'],
    ['Struct(x)', 'Struct types cannot be written as a type string'],
    ['Text(', 'Unexpected end of type string'],
  ])('rejects %s', (input, message) => {
    expect(() => parseType(input)).toThrow(message);
  });

  it('clamps a negative size to 0 and logs it', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(parseType('Block(-4)')).toEqual({ kind: 'Block', length: 0 });
    expect(error).toHaveBeenCalledWith('block: invalid size -4 cannot be < 0, defaulting to 0');
    error.mockRestore();
  });
});
