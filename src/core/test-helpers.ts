/**
 * Byte builders shared by the unit tests. They write the wire layout by hand
 * so tests do not depend on the encoder under test.
 */

/** Parse `'02 24 00 00 00'` style hex into bytes */
export function hex(input: string): Uint8Array {
  const digits = input.replace(/\s+/g, '');
  if (digits.length % 2 !== 0) {
    throw new Error(`Odd number of hex digits: ${input}`);
  }
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

export function u32le(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value, true);
  return bytes;
}

function record(tag: number, payload: Uint8Array): Uint8Array {
  return concat(Uint8Array.of(tag), u32le(5 + payload.length), payload);
}

export function integerRecord(value: number): Uint8Array {
  return record(0, u32le(value));
}

export function textRecord(value: string): Uint8Array {
  return record(1, Uint8Array.from(value, (c) => c.charCodeAt(0)));
}

export function listRecord(...elements: Uint8Array[]): Uint8Array {
  return record(2, concat(u32le(elements.length), ...elements));
}

/** Run `fn` and return what it throws */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
