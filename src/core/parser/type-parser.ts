import { tokenize, type Token } from './type-lexer';
import { array, block, blockArray, integer, isIntegerKind, text, type FieldType } from '../types/field-types';

/**
 * Parse a field type string into a structured type object.
 *
 * Grammar: `UInt8`..`Int64` with an optional `(little|big)`, `Block`,
 * `Block(n)`, `Text`, `Text(n)`, `Array(T, n)`, `BlockArray(T)` and
 * `BlockArray(T, n)`. Structs have no string form.
 */
export function parseType(typeString: string): FieldType {
  const tokens = tokenize(typeString);
  let pos = 0;

  function peek(): Token | undefined {
    return tokens[pos];
  }

  function consume(): Token {
    if (pos >= tokens.length) {
      throw new Error(`Unexpected end of type string: ${typeString}`);
    }
    return tokens[pos++];
  }

  function expect(type: Token['type']): Token {
    const t = consume();
    if (t.type !== type) {
      throw new Error(`Expected ${type}, got ${t.type} in type string: ${typeString}`);
    }
    return t;
  }

  function expectNumber(): number {
    const t = consume();
    if (t.type !== 'NUMBER') {
      throw new Error(`Expected NUMBER, got ${t.type} in type string: ${typeString}`);
    }
    return t.value;
  }

  function parseTypeExpr(): FieldType {
    const token = consume();
    if (token.type !== 'IDENTIFIER') {
      throw new Error(`Expected type name, got ${token.type} in type string: ${typeString}`);
    }

    const typeName = token.value;

    // If next token is not LPAREN, it's a simple type
    if (peek()?.type !== 'LPAREN') {
      if (isIntegerKind(typeName)) return integer(typeName);
      if (typeName === 'Block') return block();
      if (typeName === 'Text') return text();
      if (typeName === 'BlockArray' || typeName === 'Array') {
        throw new Error(`${typeName} needs an element type in type string: ${typeString}`);
      }
      throw new Error(`Unknown simple type: ${typeName}`);
    }

    // Parameterized types
    consume(); // LPAREN

    if (isIntegerKind(typeName)) {
      const orderToken = consume();
      const order = orderToken.type === 'IDENTIFIER' ? orderToken.value : '';
      if (order !== 'little' && order !== 'big') {
        throw new Error(`Expected byte order 'little' or 'big' for ${typeName} in type string: ${typeString}`);
      }
      expect('RPAREN');
      return integer(typeName, order);
    }

    switch (typeName) {
      case 'Block': {
        const length = expectNumber();
        expect('RPAREN');
        return block(length);
      }

      case 'Text': {
        const length = expectNumber();
        expect('RPAREN');
        return text(length);
      }

      case 'Array': {
        const element = parseTypeExpr();
        expect('COMMA');
        const count = expectNumber();
        expect('RPAREN');
        return array(element, count);
      }

      case 'BlockArray': {
        const element = parseTypeExpr();
        if (peek()?.type === 'COMMA') {
          consume();
          const byteLength = expectNumber();
          expect('RPAREN');
          return blockArray(element, byteLength);
        }
        expect('RPAREN');
        return blockArray(element);
      }

      case 'Struct':
        throw new Error(`Struct types cannot be written as a type string: ${typeString}`);

      default:
        throw new Error(`Unknown parameterized type: ${typeName}`);
    }
  }

  const result = parseTypeExpr();
  if (pos < tokens.length) {
    throw new Error(`Unexpected tokens after type in type string: ${typeString}`);
  }
  return result;
}
