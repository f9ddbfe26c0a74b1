import { constants } from 'fs';
import { access, open } from 'fs/promises';
import type { FileDescriptor, FileSystem } from './types.ts';

export const nodeFileSystem: FileSystem = {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code === 'ENOENT' || code === 'ENOTDIR') return false;
      // Present but not inspectable (EACCES and friends): let open() report it
      return true;
    }
  },

  async open(path: string): Promise<FileDescriptor> {
    const handle = await open(path, 'r');
    return {
      stat: () => handle.stat(),
      read: async (buffer, position, length) => {
        const { bytesRead } = await handle.read(buffer, 0, length, position);
        return bytesRead;
      },
      close: () => handle.close(),
    };
  },
};

/**
 * An opened regular file owned by a single request.
 *
 * The read marker stays within [0, size] and reads never go past size. The descriptor is
 * closed at most once no matter how many times close() is called.
 */
export class FileResource {
  readonly path: string;
  readonly size: number;
  readonly mtime: Date;
  private readonly descriptor: FileDescriptor;
  private position = 0;
  private closing: Promise<void> | undefined;

  private constructor(path: string, descriptor: FileDescriptor, size: number, mtime: Date) {
    this.path = path;
    this.descriptor = descriptor;
    this.size = size;
    this.mtime = mtime;
  }

  /**
   * Open path for reading and capture its size and modification time.
   * The descriptor is closed again if stat fails.
   */
  static async open(fileSystem: FileSystem, path: string): Promise<{ file: FileResource; isFile: boolean }> {
    const descriptor = await fileSystem.open(path);
    try {
      const stats = await descriptor.stat();
      return { file: new FileResource(path, descriptor, stats.size, stats.mtime), isFile: stats.isFile() };
    } catch (error) {
      await descriptor.close();
      throw error;
    }
  }

  get marker(): number {
    return this.position;
  }

  set marker(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > this.size) {
      throw new RangeError(`Marker ${value} is outside [0, ${this.size}] for ${this.path}`);
    }
    this.position = value;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  /**
   * Read up to count bytes at the marker and advance it by the bytes actually read.
   * Returns an empty buffer at end of file.
   */
  async readSome(count: number): Promise<Buffer> {
    if (this.closed) {
      throw new Error(`Read from closed file ${this.path}`);
    }
    const length = Math.min(count, this.size - this.position);
    if (length <= 0) return Buffer.alloc(0);

    const buffer = Buffer.allocUnsafe(length);
    const bytesRead = await this.descriptor.read(buffer, this.position, length);
    this.position += bytesRead;
    return buffer.subarray(0, bytesRead);
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.descriptor.close();
    }
    return this.closing;
  }
}
