/**
 * Tracks which files were already translated, by content hash
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from '../core/errors';
import { log } from '../ipc/protocol';

export const REGISTRY_FILE_NAME = 'processed_files.json';

const RegistrySchema = z.record(z.string());

export function sha256(bytes: Buffer): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

export class ProcessedFileRegistry {
  private hashes: Map<string, string> = new Map();
  private filePath: string;

  constructor(outputDir: string) {
    this.filePath = path.join(outputDir, REGISTRY_FILE_NAME);
    this.load();
  }

  /**
   * True when the file was processed before and its content has not changed since
   */
  isUnchanged(filePath: string, bytes: Buffer): boolean {
    return this.hashes.get(path.resolve(filePath)) === sha256(bytes);
  }

  record(filePath: string, bytes: Buffer): void {
    this.hashes.set(path.resolve(filePath), sha256(bytes));
  }

  get size(): number {
    return this.hashes.size;
  }

  async save(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const data = Object.fromEntries(this.hashes);
    await fs.promises.writeFile(this.filePath, JSON.stringify(data, null, 2), 'utf-8');
  }

  private load(): void {
    try {
      if (!fs.existsSync(this.filePath)) {
        return;
      }
      const parsed = RegistrySchema.safeParse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
      if (!parsed.success) {
        log(`[Registry] Ignoring malformed ${this.filePath}`);
        return;
      }
      this.hashes = new Map(Object.entries(parsed.data));
    } catch (error) {
      log(`[Registry] Failed to load ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
