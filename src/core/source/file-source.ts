import fs from 'node:fs';
import { checkRange, type ByteSource } from './byte-source';
import { TlvError } from '../errors';

/**
 * Byte source reading ranges from an open file descriptor.
 * Prefer `withFileSource`, which closes the file when done.
 */
export class FileSource implements ByteSource {
  readonly path: string;
  readonly size: number;
  private fd: number | null;

  constructor(filePath: string) {
    this.path = filePath;
    const fd = fs.openSync(filePath, 'r');
    let size: number;
    try {
      size = fs.fstatSync(fd).size;
    } catch (error) {
      fs.closeSync(fd);
      throw error;
    }
    this.fd = fd;
    this.size = size;
  }

  read(offset: number, size: number): Uint8Array {
    if (this.fd === null) {
      throw new TlvError(`File source ${this.path} is closed`);
    }
    checkRange(offset, size, this.size);
    const buffer = Buffer.alloc(size);
    let done = 0;
    while (done < size) {
      const n = fs.readSync(this.fd, buffer, done, size - done, offset + done);
      if (n === 0) {
        throw new TlvError(`Unexpected end of ${this.path} at ${offset + done}`);
      }
      done += n;
    }
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.length);
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Open a file source, run `fn` with it and close the file afterwards
 */
export function withFileSource<T>(filePath: string, fn: (source: FileSource) => T): T {
  const source = new FileSource(filePath);
  try {
    return fn(source);
  } finally {
    source.close();
  }
}
