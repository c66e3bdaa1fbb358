/**
 * Token types for field type string lexer
 */
export type Token =
  | { type: 'IDENTIFIER'; value: string }
  | { type: 'LPAREN' }
  | { type: 'RPAREN' }
  | { type: 'COMMA' }
  | { type: 'NUMBER'; value: number };

/**
 * Tokenize a field type string such as `Array(UInt16(big), 4)`
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    // Skip whitespace
    if (/\s/.test(input[i])) {
      i++;
      continue;
    }

    // Single char tokens
    if (input[i] === '(') {
      tokens.push({ type: 'LPAREN' });
      i++;
      continue;
    }
    if (input[i] === ')') {
      tokens.push({ type: 'RPAREN' });
      i++;
      continue;
    }
    if (input[i] === ',') {
      tokens.push({ type: 'COMMA' });
      i++;
      continue;
    }

    // Number; negative sizes are clamped by the type builders
    if (/[0-9]/.test(input[i]) || (input[i] === '-' && i + 1 < input.length && /[0-9]/.test(input[i + 1]))) {
      let sign = 1;
      if (input[i] === '-') {
        sign = -1;
        i++;
      }
      let digits = '';
      if (input.startsWith('0x', i) || input.startsWith('0X', i)) {
        digits += '0x';
        i += 2;
        while (i < input.length && /[0-9a-fA-F]/.test(input[i])) {
          digits += input[i];
          i++;
        }
      } else {
        while (i < input.length && /[0-9]/.test(input[i])) {
          digits += input[i];
          i++;
        }
      }
      tokens.push({ type: 'NUMBER', value: sign * Number(digits) });
      continue;
    }

    // Identifier (type names, byte orders)
    if (/[a-zA-Z_]/.test(input[i])) {
      let ident = '';
      while (i < input.length && /[a-zA-Z0-9_]/.test(input[i])) {
        ident += input[i];
        i++;
      }
      tokens.push({ type: 'IDENTIFIER', value: ident });
      continue;
    }

    throw new Error(`Unexpected character '${input[i]}' at position ${i} in type string: ${input}`);
  }

  return tokens;
}
