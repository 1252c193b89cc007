/**
 * FileCommitter - the disk side of a reinjection
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, ReinjectionError } from '../core/errors';
import { Result } from '../core/types';
import { log } from '../ipc/protocol';

export class FileCommitter {
  /**
   * @param backupDir - Where backups go; beside the original file when omitted
   */
  constructor(private backupDir?: string) {}

  /**
   * Write to a temp file in the same directory, then rename over the target
   */
  async writeAtomic(filePath: string, bytes: Buffer): Promise<void> {
    const tempPath = path.join(
      path.dirname(filePath),
      `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
    );

    try {
      await fs.promises.writeFile(tempPath, bytes);
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Copy a file to a timestamped backup and return the backup path. A random
   * suffix keeps same-named files from different directories apart.
   */
  async backup(filePath: string): Promise<string> {
    const dir = this.backupDir ?? path.dirname(filePath);
    await fs.promises.mkdir(dir, { recursive: true });

    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const suffix = crypto.randomBytes(4).toString('hex');
    const backupPath = path.join(dir, `${path.basename(filePath)}.${stamp}.${suffix}.bak`);
    await fs.promises.copyFile(filePath, backupPath);
    return backupPath;
  }

  async restore(backupPath: string, filePath: string): Promise<void> {
    await fs.promises.copyFile(backupPath, filePath);
    log(`[FileCommitter] Restored ${filePath} from ${backupPath}`);
  }

  /**
   * Back up, write, read back and verify. On mismatch the backup is restored.
   */
  async commitSafe(
    filePath: string,
    bytes: Buffer,
    verify: (written: Buffer) => boolean
  ): Promise<Result<{ backupPath: string }, ReinjectionError>> {
    const backupPath = await this.backup(filePath);

    try {
      await this.writeAtomic(filePath, bytes);
      const written = await fs.promises.readFile(filePath);

      if (written.equals(bytes) && verify(written)) {
        return { success: true, data: { backupPath } };
      }
    } catch (error) {
      log(`[FileCommitter] Write of ${filePath} failed: ${errorMessage(error)}`);
    }

    await this.restore(backupPath, filePath);
    return {
      success: false,
      error: new ReinjectionError('VerificationFailed', `read-back of ${filePath} did not verify`),
    };
  }

  /**
   * Plain commit: back up, then write atomically
   */
  async commit(filePath: string, bytes: Buffer): Promise<string> {
    const backupPath = await this.backup(filePath);
    await this.writeAtomic(filePath, bytes);
    return backupPath;
  }
}
