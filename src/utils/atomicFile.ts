import * as crypto from 'crypto';
import * as fs from 'fs';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
  /** File permission bits of the written file (e.g. 0o600 for secrets) */
  mode?: number;
}

/**
 * Atomic file operations using the tmp-file-then-rename pattern.
 *
 * The target is never observed half-written, and two processes writing the
 * same file leave one complete version rather than a mix.
 */
export class AtomicFileWriter {
  private static getTempPath(filePath: string): string {
    return `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;
  }

  /**
   * Write `data` to `filePath` atomically.
   *
   * @throws Error if the write or the rename fails; the temp file is removed
   */
  static async writeAsync(
    filePath: string,
    data: string,
    options: AtomicWriteOptions = {}
  ): Promise<void> {
    const tmpPath = this.getTempPath(filePath);
    const writeOptions: { encoding: BufferEncoding; mode?: number } = {
      encoding: options.encoding ?? 'utf-8',
    };
    if (options.mode !== undefined) {
      writeOptions.mode = options.mode;
    }

    try {
      await fs.promises.writeFile(tmpPath, data, writeOptions);
      await fs.promises.rename(tmpPath, filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }
  }
}
