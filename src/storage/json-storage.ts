import { mkdir, readFile, writeFile, unlink, access, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';
import { PersistenceError, errorMessage } from '../core/errors.js';

export interface JSONStorageConfig {
  /** Directory holding one <key>.json file per key */
  basePath: string;
  /** Keep the previous version as <key>.backup.json (default: true) */
  createBackup?: boolean;
  logger?: Logger;
}

/**
 * JSON file storage.
 *
 * Writes go to a temp file that is renamed over the target, so a reader
 * sees either the old or the new document. A primary file that no longer
 * parses falls back to the backup.
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger?.child({ component: 'json-storage' });
  }

  private getPath(key: string): string {
    return join(this.basePath, `${key}.json`);
  }

  private getBackupPath(key: string): string {
    return join(this.basePath, `${key}.backup.json`);
  }

  private getTempPath(key: string): string {
    return join(this.basePath, `${key}.tmp.json`);
  }

  async load(key: string): Promise<unknown> {
    const path = this.getPath(key);

    try {
      const content = await readFile(path, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }

      if (error instanceof SyntaxError) {
        const backup = await this.loadBackup(key);
        if (backup !== null) {
          this.logger?.warn({ key, error: error.message }, 'Primary file unreadable, loaded backup');
          return backup;
        }
      }

      throw new PersistenceError(`Failed to load "${key}": ${errorMessage(error)}`);
    }
  }

  private async loadBackup(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.getBackupPath(key), 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      this.logger?.debug({ key, error: errorMessage(error) }, 'No usable backup');
      return null;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    const path = this.getPath(key);
    const tempPath = this.getTempPath(key);

    try {
      await mkdir(this.basePath, { recursive: true });
      await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

      if (this.createBackup && (await this.exists(key))) {
        await rename(path, this.getBackupPath(key));
      }

      await rename(tempPath, path);
    } catch (error) {
      throw new PersistenceError(`Failed to save "${key}": ${errorMessage(error)}`);
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.getPath(key));
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.getPath(key));
      return true;
    } catch {
      return false;
    }
  }
}

export function createJSONStorage(
  basePath: string,
  options?: Partial<Omit<JSONStorageConfig, 'basePath'>>
): JSONStorage {
  return new JSONStorage({
    basePath,
    ...options,
  });
}
