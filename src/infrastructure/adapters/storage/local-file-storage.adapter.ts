import { Injectable, Logger } from '@nestjs/common';
import { createWriteStream } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { FileStoragePort } from '../../../application/ports/output/file-storage.port';

/**
 * Local File Storage Adapter
 * Implements FileStoragePort on the local filesystem
 */
@Injectable()
export class LocalFileStorageAdapter implements FileStoragePort {
  private readonly logger = new Logger(LocalFileStorageAdapter.name);

  async ensureDirectory(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async writeStream(path: string, stream: Readable): Promise<number> {
    await pipeline(stream, createWriteStream(path));

    const { size } = await stat(path);
    this.logger.debug(`Wrote ${size} bytes to ${path}`);
    return size;
  }
}
