import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BufferSource, toByteSource } from './byte-source';
import { FileSource, withFileSource } from './file-source';
import { OutOfRangeError, TlvError } from '../errors';
import { hex } from '../test-helpers';

describe('BufferSource', () => {
  const source = new BufferSource(hex('00 01 02 03 04'));

  it('reads exact ranges', () => {
    expect(source.size).toBe(5);
    expect(Array.from(source.read(1, 3))).toEqual([1, 2, 3]);
    expect(source.read(5, 0).length).toBe(0);
  });

  it('returns copies', () => {
    const bytes = hex('aa bb');
    const copy = new BufferSource(bytes).read(0, 2);
    copy[0] = 0;
    expect(bytes[0]).toBe(0xaa);
  });

  it.each([
    [4, 2],
    [-1, 1],
    [6, 0],
  ])('throws OutOfRangeError for %i+%i', (offset, size) => {
    expect(() => source.read(offset, size)).toThrow(OutOfRangeError);
  });

  it('wraps plain bytes and passes sources through', () => {
    const wrapped = toByteSource(hex('ff'));
    expect(wrapped).toBeInstanceOf(BufferSource);
    expect(toByteSource(source)).toBe(source);
  });
});

describe('FileSource', () => {
  let dir: string;
  let file: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tlvscope-'));
    file = path.join(dir, 'data.bin');
    fs.writeFileSync(file, hex('10 20 30 40'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads ranges from disk', () => {
    const result = withFileSource(file, (source) => ({
      size: source.size,
      middle: Array.from(source.read(1, 2)),
    }));
    expect(result).toEqual({ size: 4, middle: [0x20, 0x30] });
  });

  it('refuses reads past the end', () => {
    withFileSource(file, (source) => {
      expect(() => source.read(3, 2)).toThrow(OutOfRangeError);
    });
  });

  it('refuses reads once closed', () => {
    const source = new FileSource(file);
    source.close();
    expect(() => source.read(0, 1)).toThrow(TlvError);
    expect(() => source.read(0, 1)).toThrow('is closed');
  });

  it('throws when the file does not exist', () => {
    expect(() => new FileSource(path.join(dir, 'missing.bin'))).toThrow(/ENOENT/);
  });
});
