import { open, type FileHandle } from 'fs/promises';
import type { Readable } from 'stream';
import { FileOperationError } from '../../core/errors.js';
import type { IAttachmentSource } from '../../core/interfaces/IAttachmentSource.js';

/**
 * File-backed attachment source with its own read cursor
 */
export class FileAttachmentSource implements IAttachmentSource {
  private position = 0;

  private constructor(
    readonly name: string,
    readonly size: number,
    private handle: FileHandle
  ) {}

  static async open(filePath: string): Promise<FileAttachmentSource> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (error) {
      throw new FileOperationError('open reference', filePath, error);
    }

    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new Error('not a regular file');
      }
      return new FileAttachmentSource(filePath, stats.size, handle);
    } catch (error) {
      await handle.close();
      throw new FileOperationError('stat reference', filePath, error);
    }
  }

  async read(buffer: Buffer): Promise<number> {
    try {
      const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, this.position);
      this.position += bytesRead;
      return bytesRead;
    } catch (error) {
      throw new FileOperationError('read reference', this.name, error);
    }
  }

  async rewind(): Promise<void> {
    this.position = 0;
  }

  stream(): Readable {
    return this.handle.createReadStream({ start: this.position, autoClose: false });
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
