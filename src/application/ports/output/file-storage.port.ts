import { Readable } from 'stream';

/**
 * File Storage Port (Driven Port)
 * Interface for the local destination directory
 */
export interface FileStoragePort {
  /**
   * Create the directory and any missing parents
   */
  ensureDirectory(path: string): Promise<void>;

  /**
   * Write a stream to a file, replacing any existing file, and return the bytes written
   */
  writeStream(path: string, stream: Readable): Promise<number>;
}
