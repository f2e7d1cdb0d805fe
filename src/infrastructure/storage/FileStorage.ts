import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { config } from '../../config/index';
import { logger } from '../logging/Logger';

/**
 * A file written to storage
 */
export interface SavedFile {
  filePath: string;
  bytesWritten: number;
}

/**
 * File storage interface
 */
export interface IFileStorage {
  save(fileName: string, data: Readable): Promise<SavedFile>;
  getPath(fileName: string): string;
}

/**
 * File-based storage for downloaded recordings.
 * Relative names resolve under the base directory, absolute paths are kept.
 * A file only appears at its final path once the whole stream is written.
 */
export class FileStorage implements IFileStorage {
  private readonly baseDir: string;

  constructor(baseDir?: string) {
    this.baseDir = path.resolve(process.cwd(), baseDir || config.storage.recordingsOutputDir);
  }

  /**
   * Get the full path for a file
   */
  getPath(fileName: string): string {
    return path.resolve(this.baseDir, fileName);
  }

  /**
   * Write a stream to a file, replacing any file already there.
   * The data goes to `<path>.part` first and is renamed when complete.
   */
  async save(fileName: string, data: Readable): Promise<SavedFile> {
    const filePath = this.getPath(fileName);
    const partPath = `${filePath}.part`;

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });

      const output = createWriteStream(partPath);
      await pipeline(data, output);
      await fs.rename(partPath, filePath);

      logger.info('File saved successfully', {
        filePath,
        size: output.bytesWritten,
      });

      return { filePath, bytesWritten: output.bytesWritten };
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      logger.error('Failed to save file', cause, { filePath });

      data.destroy();
      await fs.rm(partPath, { force: true }).catch((rmError: unknown) => {
        logger.warn('Failed to remove partial file', {
          partPath,
          reason: rmError instanceof Error ? rmError.message : String(rmError),
        });
      });
      throw error;
    }
  }
}

/**
 * Default file storage instance
 */
export const fileStorage = new FileStorage();

export default fileStorage;
